import { isRecordLike } from "../api/http";
import { InvalidEventError } from "../errors";
import type { SourceRepo, StarEvent } from "../types";

function readString(record: Record<string, unknown>, key: string, field: string): string {
  const value = record[key];
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new InvalidEventError(field, "expected a non-empty string");
  }

  return value;
}

function parseSourceRepo(value: unknown): SourceRepo {
  if (!isRecordLike(value)) {
    throw new InvalidEventError("repository", "expected an object");
  }

  const owner = value.owner;
  if (!isRecordLike(owner)) {
    throw new InvalidEventError("repository.owner", "expected an object");
  }

  const id = value.id;
  if (typeof id !== "number" || !Number.isInteger(id) || id < 0) {
    throw new InvalidEventError("repository.id", "expected a non-negative integer");
  }

  const isPrivate = value.private;
  if (typeof isPrivate !== "boolean") {
    throw new InvalidEventError("repository.private", "expected a boolean");
  }

  const size = value.size ?? 0;
  if (typeof size !== "number" || !Number.isFinite(size) || size < 0) {
    throw new InvalidEventError("repository.size", "expected a non-negative number");
  }

  const url = readString(value, "clone_url", "repository.clone_url");
  if (!/^https?:\/\//.test(url)) {
    throw new InvalidEventError("repository.clone_url", "expected an http(s) URL");
  }

  const ownerLogin = readString(owner, "login", "repository.owner.login");
  const name = readString(value, "name", "repository.name");
  const fullName = readString(value, "full_name", "repository.full_name");
  if (fullName !== `${ownerLogin}/${name}`) {
    throw new InvalidEventError("repository.full_name", `does not match ${ownerLogin}/${name}`);
  }

  return {
    url,
    owner: ownerLogin,
    name,
    fullName,
    id,
    defaultBranch: readString(value, "default_branch", "repository.default_branch"),
    private: isPrivate,
    sizeKb: size
  };
}

/**
 * Builds a StarEvent from a `watch` or `star` delivery body. The clone URL
 * is the source identity used for dedupe.
 */
export function parseStarEvent(
  eventType: string,
  deliveryId: string,
  payload: unknown
): StarEvent {
  if (!isRecordLike(payload)) {
    throw new InvalidEventError("payload", "expected a JSON object");
  }

  return {
    eventType,
    action: readString(payload, "action", "action"),
    deliveryId,
    sourceRepo: parseSourceRepo(payload.repository)
  };
}
