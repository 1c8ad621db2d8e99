import { UnavailableError } from "../errors";
import {
  errorFromResponse,
  fetchWithTimeout,
  isRecordLike,
  normalizeBaseUrl,
  withCredentials,
  type HttpClientDependencies
} from "./http";

const HOST = "GitHub";

export interface RepoMetadata {
  id: number;
  name: string;
  fullName: string;
  owner: string;
  cloneUrl: string;
  htmlUrl: string;
  defaultBranch: string;
  private: boolean;
  sizeKb: number;
  description: string | null;
}

export interface SourceHostClient {
  fetchRepoMetadata: (fullName: string) => Promise<RepoMetadata>;
  authenticatedCloneUrl: (cloneUrl: string) => string;
}

export interface GitHubClientConfig {
  apiUrl: string;
  token: string;
  timeoutMs: number;
}

function readString(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  if (typeof value !== "string" || value.length === 0) {
    throw new UnavailableError(HOST, `repository payload is missing '${key}'`);
  }

  return value;
}

export function parseRepoMetadata(payload: unknown): RepoMetadata {
  if (!isRecordLike(payload)) {
    throw new UnavailableError(HOST, "repository payload is not an object");
  }

  const owner = payload.owner;
  if (!isRecordLike(owner)) {
    throw new UnavailableError(HOST, "repository payload is missing 'owner'");
  }

  const id = payload.id;
  if (typeof id !== "number" || !Number.isInteger(id)) {
    throw new UnavailableError(HOST, "repository payload is missing 'id'");
  }

  const size = payload.size;
  const description = payload.description;

  return {
    id,
    name: readString(payload, "name"),
    fullName: readString(payload, "full_name"),
    owner: readString(owner, "login"),
    cloneUrl: readString(payload, "clone_url"),
    htmlUrl: readString(payload, "html_url"),
    defaultBranch: readString(payload, "default_branch"),
    private: payload.private === true,
    sizeKb: typeof size === "number" && size >= 0 ? size : 0,
    description: typeof description === "string" ? description : null
  };
}

export function buildRepoUrl(apiUrl: string, fullName: string): URL {
  const [owner = "", name = ""] = fullName.split("/");
  return new URL(
    `repos/${encodeURIComponent(owner)}/${encodeURIComponent(name)}`,
    normalizeBaseUrl(apiUrl)
  );
}

export function createGitHubClient(
  config: GitHubClientConfig,
  dependencies: HttpClientDependencies = {}
): SourceHostClient {
  const fetchImpl = dependencies.fetchImpl ?? fetch;
  const now = dependencies.now ?? Date.now;

  const headers: Record<string, string> = {
    Accept: "application/vnd.github+json",
    "X-GitHub-Api-Version": "2022-11-28",
    "User-Agent": "star-mirror"
  };
  if (config.token) {
    headers.Authorization = `Bearer ${config.token}`;
  }

  return {
    async fetchRepoMetadata(fullName: string): Promise<RepoMetadata> {
      return fetchWithTimeout(
        HOST,
        fetchImpl,
        buildRepoUrl(config.apiUrl, fullName),
        { method: "GET", headers },
        config.timeoutMs,
        async (response) => {
          if (!response.ok) {
            throw await errorFromResponse(HOST, fullName, response, now());
          }

          return parseRepoMetadata(await response.json());
        }
      );
    },
    authenticatedCloneUrl(cloneUrl: string): string {
      return withCredentials(cloneUrl, "x-access-token", config.token);
    }
  };
}
