import {
  createServer,
  type IncomingHttpHeaders,
  type IncomingMessage,
  type Server,
  type ServerResponse
} from "node:http";

import type { SyncRecordStore } from "./db/store";
import { getErrorMessage } from "./errors";
import { formatLine, type Logger } from "./logger";
import { createMetrics, type MirrorMetrics } from "./metrics";
import type { WebhookReceiver } from "./webhook/receiver";

export interface HttpRequest {
  method: string;
  path: string;
  headers: IncomingHttpHeaders;
  body: Buffer;
}

export interface HttpResponse {
  statusCode: number;
  /** Objects are sent as JSON; strings as-is under `contentType`. */
  body: Record<string, unknown> | string;
  contentType?: string;
}

export interface ServerDependencies {
  receiver: WebhookReceiver;
  store: SyncRecordStore;
  logger: Logger;
  metrics?: MirrorMetrics;
}

const RECENT_ATTEMPT_LOGS = 20;
const MAX_BODY_BYTES = 25 * 1024 * 1024;

function writeResponse(response: ServerResponse, result: HttpResponse): void {
  response.statusCode = result.statusCode;

  if (typeof result.body === "string") {
    response.setHeader("Content-Type", result.contentType ?? "text/plain; charset=utf-8");
    response.end(result.body);
    return;
  }

  response.setHeader("Content-Type", "application/json");
  response.end(JSON.stringify(result.body));
}

function readBody(request: IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    request.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new Error(`request body exceeds ${MAX_BODY_BYTES} bytes`));
        request.destroy();
        return;
      }

      chunks.push(chunk);
    });
    request.on("end", () => {
      resolve(Buffer.concat(chunks));
    });
    request.on("error", reject);
  });
}

export function createRequestHandler(
  dependencies: ServerDependencies
): (request: HttpRequest) => Promise<HttpResponse> {
  const { receiver, store } = dependencies;
  const metrics = dependencies.metrics ?? createMetrics();

  return async (request) => {
    if (request.path === "/metrics") {
      if (request.method !== "GET") {
        return { statusCode: 405, body: { error: "Method Not Allowed" } };
      }

      try {
        await store.ping();
        metrics.databaseHealth.set(1);
      } catch {
        metrics.databaseHealth.set(0);
      }

      return {
        statusCode: 200,
        body: await metrics.registry.metrics(),
        contentType: metrics.registry.contentType
      };
    }

    if (request.path === "/health") {
      if (request.method !== "GET") {
        return { statusCode: 405, body: { error: "Method Not Allowed" } };
      }

      try {
        await store.ping();
        return { statusCode: 200, body: { status: "ok", database: "connected" } };
      } catch (error) {
        return {
          statusCode: 503,
          body: { status: "unhealthy", database: "disconnected", error: getErrorMessage(error) }
        };
      }
    }

    if (request.path === "/webhooks/github") {
      if (request.method !== "POST") {
        return { statusCode: 405, body: { error: "Method Not Allowed" } };
      }

      return receiver.receive({ headers: request.headers, body: request.body });
    }

    const repositoryMatch = /^\/repositories\/(\d+)$/.exec(request.path);
    if (repositoryMatch && request.method === "GET") {
      const id = Number.parseInt(repositoryMatch[1] ?? "", 10);
      const record = await store.findById(id);
      if (record === null) {
        return { statusCode: 404, body: { error: `Repository ${id} not found` } };
      }

      const attempts = await store.listAttemptLogs(id, RECENT_ATTEMPT_LOGS);
      return { statusCode: 200, body: { record, attempts } };
    }

    return { statusCode: 404, body: { error: "Not Found" } };
  };
}

export function createHttpServer(dependencies: ServerDependencies): Server {
  const handle = createRequestHandler(dependencies);
  const { logger } = dependencies;

  return createServer((request, response) => {
    if (!request.url || !request.method) {
      writeResponse(response, { statusCode: 400, body: { error: "Missing URL" } });
      return;
    }

    const url = new URL(request.url, "http://localhost");
    const method = request.method;

    readBody(request)
      .then((body) => handle({ method, path: url.pathname, headers: request.headers, body }))
      .then((result) => {
        writeResponse(response, result);
      })
      .catch((error: unknown) => {
        logger.error(formatLine("request failed", { method, path: url.pathname }), error);
        if (!response.headersSent) {
          writeResponse(response, { statusCode: 500, body: { error: "Internal server error" } });
        }
      });
  });
}
