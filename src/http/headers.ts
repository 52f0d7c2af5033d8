import type { IncomingMessage } from "node:http";
import { randomUUID } from "node:crypto";

import type { HttpResponseLike } from "../httpServer.js";

/**
 * Security headers applied to every HTTP response. Tests exercise the helper
 * through {@link HttpResponseLike} doubles.
 */
export function applySecurityHeaders(res: HttpResponseLike): void {
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.setHeader("X-Frame-Options", "DENY");
  res.setHeader("Referrer-Policy", "no-referrer");
}

/**
 * Guarantees that the request/response pair carries a stable correlation id.
 * Identifiers provided by reverse proxies are preserved, otherwise a fresh
 * UUID is minted.
 */
export function ensureRequestId(req: IncomingMessage, res: HttpResponseLike): string {
  const incoming = req.headers["x-request-id"];
  const requestId = typeof incoming === "string" && incoming.trim() ? incoming.trim() : randomUUID();
  res.setHeader("x-request-id", requestId);
  return requestId;
}

/**
 * Extracts one cookie from the `Cookie` header. Returns `null` when the cookie
 * is absent or empty.
 */
export function readCookie(req: IncomingMessage, name: string): string | null {
  const header = req.headers.cookie;
  if (!header) {
    return null;
  }
  for (const part of header.split(";")) {
    const separator = part.indexOf("=");
    if (separator < 0) {
      continue;
    }
    if (part.slice(0, separator).trim() !== name) {
      continue;
    }
    const value = part.slice(separator + 1).trim();
    return value.length > 0 ? value : null;
  }
  return null;
}
