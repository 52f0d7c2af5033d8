import { createServer as createHttpServer, type IncomingMessage, type Server as NodeHttpServer } from "node:http";
import { createReadStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import { Buffer } from "node:buffer";
import process from "node:process";

import type { StructuredLogger } from "./logger.js";
import { applySecurityHeaders, ensureRequestId } from "./http/headers.js";
import { readJsonBody } from "./http/body.js";
import type { ApiResult, ApiRouter } from "./http/routes.js";
import { resolveClientId } from "./http/sessions.js";

/**
 * Subset of `ServerResponse` the handler writes to. Tests substitute an
 * in-memory writable.
 */
export interface HttpResponseLike extends NodeJS.WritableStream {
  statusCode: number;
  readonly headersSent: boolean;
  setHeader(name: string, value: number | string | readonly string[]): unknown;
}

export interface HttpServerHandle {
  close: () => Promise<void>;
  /** Actual port bound by the HTTP server (useful when `0` was requested). */
  port: number;
}

export interface HttpServerOptions {
  readonly host: string;
  readonly port: number;
}

export interface RequestHandlerOptions {
  readonly router: ApiRouter;
  readonly logger: StructuredLogger;
  /** {@link ApiRouter.runMaintenance} runs on every Nth request. */
  readonly cleanupInterval: number;
}

export type RequestHandler = (req: IncomingMessage, res: HttpResponseLike) => Promise<void>;

/** `Content-Disposition` value carrying an ASCII fallback and the UTF-8 name. */
export function attachmentDisposition(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]|["\\]/g, "_");
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(filename)}`;
}

function computeDurationMs(startedAt: bigint): number {
  const elapsed = process.hrtime.bigint() - startedAt;
  return Number(elapsed / 1_000_000n);
}

function sendJson(res: HttpResponseLike, status: number, payload: unknown): void {
  const body = JSON.stringify(payload);
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.setHeader("Content-Length", Buffer.byteLength(body, "utf8"));
  res.end(body, "utf8");
}

/**
 * Builds the request listener: security headers and request id first, then
 * the periodic cleanup, then routing. `/api/*` requests get a client cookie.
 */
export function createRequestHandler(options: RequestHandlerOptions): RequestHandler {
  const { router, logger } = options;
  let requestCount = 0;

  const writeResult = async (res: HttpResponseLike, result: ApiResult, requestId: string): Promise<void> => {
    switch (result.kind) {
      case "json":
        sendJson(res, result.status, result.body);
        return;
      case "attachment":
        res.statusCode = result.status;
        res.setHeader("Content-Type", `${result.contentType}; charset=utf-8`);
        res.setHeader("Content-Disposition", `attachment; filename=${result.filename}`);
        res.end(result.body, "utf8");
        return;
      case "file":
        res.statusCode = 200;
        res.setHeader("Content-Type", result.contentType);
        res.setHeader("Content-Disposition", attachmentDisposition(result.filename));
        try {
          await pipeline(createReadStream(result.path), res);
        } catch (error) {
          logger.warn("http_file_stream_failed", { request_id: requestId, path: result.path, error });
        }
        return;
    }
  };

  return async (req, res) => {
    const startedAt = process.hrtime.bigint();
    applySecurityHeaders(res);
    const requestId = ensureRequestId(req, res);
    const method = (req.method ?? "GET").toUpperCase();

    requestCount += 1;
    if (requestCount % options.cleanupInterval === 0) {
      try {
        await router.runMaintenance();
      } catch (error) {
        logger.warn("jobs_cleanup_failed", { request_id: requestId, error });
      }
    }

    let pathname: string;
    try {
      pathname = new URL(req.url ?? "/", "http://localhost").pathname;
    } catch {
      sendJson(res, 400, { error: "Invalid request URL" });
      return;
    }

    if (pathname === "/healthz") {
      sendJson(res, 200, { ok: true });
      return;
    }

    if (!pathname.startsWith("/api/")) {
      sendJson(res, 404, { error: "Resource not found" });
      return;
    }

    const clientId = resolveClientId(req, res);
    const result = await router.dispatch({
      method,
      pathname,
      clientId,
      readBody: async () => (await readJsonBody(req)).parsed,
    });
    await writeResult(res, result, requestId);

    logger.debug("http_request", {
      request_id: requestId,
      method,
      path: pathname,
      status: res.statusCode,
      duration_ms: computeDurationMs(startedAt),
    });
  };
}

function extractListeningPort(server: NodeHttpServer): number {
  const address = server.address();
  if (typeof address === "object" && address && typeof address.port === "number") {
    return address.port;
  }
  return 0;
}

/**
 * Binds the API on {@link options}. Handler failures that escape the router
 * are logged and answered with a 500 when nothing was sent yet.
 */
export async function startHttpServer(
  handlerOptions: RequestHandlerOptions,
  options: HttpServerOptions,
): Promise<HttpServerHandle> {
  const { logger } = handlerOptions;
  const handler = createRequestHandler(handlerOptions);

  const httpServer = createHttpServer((req, res) => {
    handler(req, res).catch((error: unknown) => {
      logger.error("http_request_failure", { path: req.url ?? "/", error });
      if (!res.headersSent) {
        sendJson(res, 500, { error: "Internal server error" });
      } else {
        res.end();
      }
    });
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
      });
      resolve();
    });
  });

  return {
    close: async () => {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
        httpServer.closeIdleConnections();
      });
    },
    port: extractListeningPort(httpServer),
  };
}
