import { randomUUID } from "node:crypto";
import { createServer as createHttpServer, type Server as NodeHttpServer, type ServerResponse } from "node:http";

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";

import type { StructuredLogger } from "./logger.js";
import type { HttpRuntimeOptions } from "./serverOptions.js";

export interface HttpServerHandle {
  close: () => Promise<void>;
  /** Port actually bound (useful when `0` was requested). */
  port: number;
}

/** Extra facts reported by `/healthz`. */
export interface HttpHealthDetails {
  profile: string;
  tools: readonly string[];
}

function respondJson(response: ServerResponse, status: number, payload: unknown): void {
  const body = JSON.stringify(payload);
  response.statusCode = status;
  response.setHeader("Content-Type", "application/json; charset=utf-8");
  response.setHeader("Cache-Control", "no-store");
  response.end(body, "utf8");
}

function extractListeningPort(server: NodeHttpServer): number {
  const address = server.address();
  return address !== null && typeof address === "object" ? address.port : 0;
}

/**
 * Exposes {@link server} over the streamable HTTP transport. `/healthz`
 * answers without touching the MCP session; any path other than the
 * configured endpoint receives a JSON-RPC "method not found" error.
 */
export async function startHttpServer(
  server: McpServer,
  options: HttpRuntimeOptions,
  logger: StructuredLogger,
  health: HttpHealthDetails,
): Promise<HttpServerHandle> {
  const httpTransport = new StreamableHTTPServerTransport({
    sessionIdGenerator: options.stateless ? undefined : () => randomUUID(),
    enableJsonResponse: options.enableJson,
  });

  httpTransport.onerror = (error) => {
    logger.error("http_transport_error", { message: error.message });
  };
  httpTransport.onclose = () => {
    logger.warn("http_transport_closed");
  };

  await server.connect(httpTransport);

  const httpServer = createHttpServer(async (request, response) => {
    const requestUrl = new URL(request.url ?? "/", `http://${request.headers.host ?? "localhost"}`);

    if (requestUrl.pathname === "/healthz") {
      respondJson(response, 200, { status: "ok", profile: health.profile, tools: health.tools });
      return;
    }

    if (requestUrl.pathname !== options.path) {
      logger.warn("http_unknown_path", { path: requestUrl.pathname, method: request.method ?? "UNKNOWN" });
      respondJson(response, 404, {
        jsonrpc: "2.0",
        id: null,
        error: { code: -32601, message: "Method not found" },
      });
      return;
    }

    try {
      await httpTransport.handleRequest(request, response);
    } catch (error) {
      logger.error("http_request_failure", { message: error instanceof Error ? error.message : String(error) });
      if (!response.headersSent) {
        respondJson(response, 500, { jsonrpc: "2.0", id: null, error: { code: -32603, message: "Internal error" } });
      } else {
        response.end();
      }
    }
  });

  httpServer.on("error", (error) => {
    logger.error("http_server_error", { message: error.message });
  });

  httpServer.on("clientError", (error, socket) => {
    logger.warn("http_client_error", { message: error.message });
    socket.end("HTTP/1.1 400 Bad Request\r\n\r\n");
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(options.port, options.host, () => {
      httpServer.off("error", reject);
      logger.info("http_listening", {
        host: options.host,
        port: extractListeningPort(httpServer),
        requested_port: options.port,
        path: options.path,
        json: options.enableJson,
        stateless: options.stateless,
      });
      resolve();
    });
  });

  return {
    close: async () => {
      await httpTransport.close();
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      });
    },
    port: extractListeningPort(httpServer),
  };
}
