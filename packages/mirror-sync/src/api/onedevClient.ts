import { ConflictError, UnavailableError } from "../errors";
import { appendTimestampSuffix } from "../sync/naming";
import type { ConflictPolicy } from "../types";
import {
  errorFromResponse,
  fetchWithTimeout,
  isRecordLike,
  normalizeBaseUrl,
  withCredentials,
  type HttpClientDependencies
} from "./http";

const HOST = "OneDev";

export interface DestinationRepo {
  id: number;
  name: string;
  url: string;
}

export interface DestinationHostClient {
  createOrGetRepo: (
    desiredName: string,
    conflictPolicy: ConflictPolicy,
    description?: string
  ) => Promise<DestinationRepo>;
  /** Looks up a project this service created earlier; 404 is `NotFoundError`. */
  getRepo: (name: string) => Promise<DestinationRepo>;
  authenticatedGitUrl: (name: string) => string;
}

export interface OneDevClientConfig {
  apiUrl: string;
  token: string;
  timeoutMs: number;
}

type CreateResult =
  | { kind: "created"; repo: DestinationRepo }
  | { kind: "exists" };

/** OneDev answers a create with the bare project id; older builds wrap it. */
export function parseProjectId(payload: unknown): number {
  if (typeof payload === "number" && Number.isInteger(payload)) {
    return payload;
  }

  if (isRecordLike(payload) && typeof payload.id === "number") {
    return payload.id;
  }

  throw new UnavailableError(HOST, "project payload has no numeric id");
}

export function createOneDevClient(
  config: OneDevClientConfig,
  dependencies: HttpClientDependencies = {}
): DestinationHostClient {
  const fetchImpl = dependencies.fetchImpl ?? fetch;
  const now = dependencies.now ?? Date.now;
  const baseUrl = normalizeBaseUrl(config.apiUrl);

  const headers = {
    Accept: "application/json",
    Authorization: `Bearer ${config.token}`,
    "Content-Type": "application/json"
  };

  const projectUrl = (name: string): string => new URL(name, baseUrl).toString();

  const createProject = async (name: string, description: string): Promise<CreateResult> => {
    return fetchWithTimeout(
      HOST,
      fetchImpl,
      new URL("api/projects", baseUrl),
      {
        method: "POST",
        headers,
        body: JSON.stringify({
          name,
          description,
          codeManagement: true,
          issueManagement: false
        })
      },
      config.timeoutMs,
      async (response): Promise<CreateResult> => {
        if (response.status === 409) {
          return { kind: "exists" };
        }

        if (!response.ok) {
          throw await errorFromResponse(HOST, name, response, now());
        }

        const id = parseProjectId(await response.json());
        return { kind: "created", repo: { id, name, url: projectUrl(name) } };
      }
    );
  };

  const getProject = (name: string): Promise<DestinationRepo> =>
    fetchWithTimeout(
      HOST,
      fetchImpl,
      new URL(`api/projects/${encodeURIComponent(name)}`, baseUrl),
      { method: "GET", headers },
      config.timeoutMs,
      async (response) => {
        if (!response.ok) {
          throw await errorFromResponse(HOST, name, response, now());
        }

        const id = parseProjectId(await response.json());
        return { id, name, url: projectUrl(name) };
      }
    );

  return {
    async createOrGetRepo(
      desiredName: string,
      conflictPolicy: ConflictPolicy,
      description = "Mirrored from GitHub"
    ): Promise<DestinationRepo> {
      const first = await createProject(desiredName, description);
      if (first.kind === "created") {
        return first.repo;
      }

      switch (conflictPolicy) {
        case "reuse":
          return getProject(desiredName);
        case "suffix": {
          const suffixedName = appendTimestampSuffix(desiredName, now());
          const second = await createProject(suffixedName, description);
          if (second.kind === "created") {
            return second.repo;
          }

          throw new ConflictError(suffixedName);
        }
        case "fail":
          throw new ConflictError(desiredName);
      }
    },
    getRepo: getProject,
    authenticatedGitUrl(name: string): string {
      return withCredentials(`${projectUrl(name)}.git`, "oauth2", config.token);
    }
  };
}
