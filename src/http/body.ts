import type { IncomingMessage } from "node:http";
import { Buffer } from "node:buffer";

import { HttpError } from "./errors.js";

/** Largest request body accepted by the API (64 KiB). */
export const MAX_JSON_BODY_BYTES = 64 * 1024;

/** Structured JSON payload returned by {@link readJsonBody}. */
export interface JsonBody {
  /** Parsed JSON value, `undefined` when the request carried no body. */
  readonly parsed: unknown;
  /** Number of bytes read from the underlying socket. */
  readonly bytes: number;
}

/**
 * Reads and parses a JSON payload from an {@link IncomingMessage} stream while
 * enforcing an upper bound on the number of bytes accepted.
 *
 * @throws {HttpError} 413 when the limit is breached, 400 on malformed JSON.
 */
export async function readJsonBody(req: IncomingMessage, maxBytes = MAX_JSON_BODY_BYTES): Promise<JsonBody> {
  const buffers: Buffer[] = [];
  let totalBytes = 0;

  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    totalBytes += buffer.length;

    if (totalBytes > maxBytes) {
      throw new HttpError(413, "Payload Too Large");
    }

    buffers.push(buffer);
  }

  const raw = Buffer.concat(buffers).toString("utf8");
  if (raw.trim().length === 0) {
    return { parsed: undefined, bytes: totalBytes };
  }
  try {
    return { parsed: JSON.parse(raw), bytes: totalBytes };
  } catch {
    throw new HttpError(400, "Invalid JSON payload.");
  }
}
