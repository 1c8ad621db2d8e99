import type { StarEvent } from "../types";

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "https:" || url.protocol === "http:";
  } catch {
    return false;
  }
}

/**
 * Contract check on events handed to the orchestrator. A non-null result
 * means the receiver let a malformed event through; it is a defect, not a
 * sync failure.
 */
export function findEventDefect(event: StarEvent): string | null {
  if (!isNonEmptyString(event.eventType)) {
    return "eventType is empty";
  }

  if (!isNonEmptyString(event.action)) {
    return "action is empty";
  }

  if (!isNonEmptyString(event.deliveryId)) {
    return "deliveryId is empty";
  }

  const repo = event.sourceRepo;
  if (!isNonEmptyString(repo.url) || !isHttpUrl(repo.url)) {
    return "sourceRepo.url is not an http(s) URL";
  }

  if (!isNonEmptyString(repo.owner) || !isNonEmptyString(repo.name)) {
    return "sourceRepo owner and name are required";
  }

  if (repo.fullName !== `${repo.owner}/${repo.name}`) {
    return "sourceRepo.fullName does not match owner/name";
  }

  if (!Number.isInteger(repo.id) || repo.id < 0) {
    return "sourceRepo.id must be a non-negative integer";
  }

  if (!Number.isFinite(repo.sizeKb) || repo.sizeKb < 0) {
    return "sourceRepo.sizeKb must be a non-negative number";
  }

  return null;
}
