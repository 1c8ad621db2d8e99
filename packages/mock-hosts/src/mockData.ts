export interface MockRepo {
  id: number;
  name: string;
  full_name: string;
  owner: { login: string; type: string };
  html_url: string;
  clone_url: string;
  default_branch: string;
  private: boolean;
  size: number;
  description: string | null;
}

export interface MockProject {
  id: number;
  name: string;
  description: string;
}

export interface MockResponse {
  statusCode: number;
  payload: unknown;
}

export interface MockHostsState {
  repos: Map<string, MockRepo>;
  projects: Map<string, MockProject>;
  nextProjectId: number;
}

const MOCK_OWNERS = ["acme", "globex", "initech"];

export function buildMockRepos(total: number, gitBaseUrl: string): MockRepo[] {
  const repos: MockRepo[] = [];
  const base = gitBaseUrl.replace(/\/+$/, "");

  for (let index = 0; index < total; index += 1) {
    const owner = MOCK_OWNERS[index % MOCK_OWNERS.length] ?? "acme";
    const name = `repo-${index.toString().padStart(3, "0")}`;

    repos.push({
      id: 1000 + index,
      name,
      full_name: `${owner}/${name}`,
      owner: { login: owner, type: "Organization" },
      html_url: `${base}/${owner}/${name}`,
      clone_url: `${base}/${owner}/${name}.git`,
      default_branch: "main",
      private: index % 5 === 0,
      size: (index + 1) * 128,
      description: `Mock repository ${index}`
    });
  }

  return repos;
}

export function createMockHostsState(repos: MockRepo[]): MockHostsState {
  return {
    repos: new Map(repos.map((repo) => [repo.full_name.toLowerCase(), repo])),
    projects: new Map(),
    nextProjectId: 1
  };
}

function parseJsonObject(body: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(body);
    return typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)
      ? { ...parsed }
      : null;
  } catch {
    return null;
  }
}

function createProject(state: MockHostsState, body: string): MockResponse {
  const input = parseJsonObject(body);
  const name = input?.name;
  if (typeof name !== "string" || name.length === 0) {
    return { statusCode: 400, payload: { error: "Project name is required" } };
  }

  if (state.projects.has(name)) {
    return { statusCode: 409, payload: { error: `Project '${name}' already exists` } };
  }

  const description = typeof input?.description === "string" ? input.description : "";
  const project: MockProject = { id: state.nextProjectId, name, description };
  state.nextProjectId += 1;
  state.projects.set(name, project);

  return { statusCode: 201, payload: project.id };
}

/**
 * Speaks the GitHub `GET /repos/{owner}/{repo}` call and the OneDev
 * project create/get calls; everything else is 404.
 */
export function routeMockRequest(
  state: MockHostsState,
  method: string,
  pathname: string,
  body: string
): MockResponse {
  if (pathname === "/health") {
    return { statusCode: 200, payload: { status: "ok" } };
  }

  const repoMatch = /^\/repos\/([^/]+)\/([^/]+)$/.exec(pathname);
  if (repoMatch && method === "GET") {
    const fullName = `${decodeURIComponent(repoMatch[1] ?? "")}/${decodeURIComponent(repoMatch[2] ?? "")}`;
    const repo = state.repos.get(fullName.toLowerCase());
    return repo === undefined
      ? { statusCode: 404, payload: { message: "Not Found" } }
      : { statusCode: 200, payload: repo };
  }

  if (pathname === "/api/projects" && method === "POST") {
    return createProject(state, body);
  }

  const projectMatch = /^\/api\/projects\/([^/]+)$/.exec(pathname);
  if (projectMatch && method === "GET") {
    const project = state.projects.get(decodeURIComponent(projectMatch[1] ?? ""));
    return project === undefined
      ? { statusCode: 404, payload: { error: "Project not found" } }
      : { statusCode: 200, payload: project };
  }

  return { statusCode: 404, payload: { error: "Not Found" } };
}
