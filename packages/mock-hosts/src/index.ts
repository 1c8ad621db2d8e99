import { createServer, type ServerResponse } from "node:http";

import { buildMockRepos, createMockHostsState, routeMockRequest } from "./mockData";

const port = Number.parseInt(process.env.PORT ?? "3100", 10);
const totalRepos = Number.parseInt(process.env.MOCK_TOTAL_REPOS ?? "30", 10);
const gitBaseUrl = process.env.MOCK_GIT_BASE_URL ?? "https://github.com";

const state = createMockHostsState(buildMockRepos(totalRepos, gitBaseUrl));

function writeJson(
  response: ServerResponse,
  statusCode: number,
  payload: unknown
): void {
  response.statusCode = statusCode;
  response.setHeader("Content-Type", "application/json");
  response.end(JSON.stringify(payload));
}

const server = createServer((request, response) => {
  if (!request.url) {
    writeJson(response, 400, { error: "Missing URL" });
    return;
  }

  const url = new URL(request.url, `http://localhost:${port}`);
  const method = request.method ?? "GET";
  const chunks: Buffer[] = [];

  request.on("data", (chunk: Buffer) => {
    chunks.push(chunk);
  });
  request.on("end", () => {
    const result = routeMockRequest(
      state,
      method,
      url.pathname,
      Buffer.concat(chunks).toString("utf8")
    );
    writeJson(response, result.statusCode, result.payload);
  });
});

server.listen(port, "0.0.0.0", () => {
  console.log(`mock hosts listening on port ${port} with ${state.repos.size} repositories`);
});
