import type { IncomingMessage } from "node:http";
import { randomUUID } from "node:crypto";

import type { HttpResponseLike } from "../httpServer.js";
import { readCookie } from "./headers.js";

/** Cookie carrying the anonymous client identifier. */
export const CLIENT_COOKIE = "mediaferry_client";

const CLIENT_ID_PATTERN = /^[A-Za-z0-9-]{8,64}$/;

/**
 * Remembers which downloads each browser started. Purely a view: forgetting an
 * entry never touches the job itself. A client whose list becomes empty is
 * dropped, so the registry only holds ids of jobs the manager still knows.
 */
export class ClientSessions {
  private readonly downloads = new Map<string, string[]>();

  track(clientId: string, downloadId: string): void {
    const entries = this.downloads.get(clientId);
    if (!entries) {
      this.downloads.set(clientId, [downloadId]);
      return;
    }
    if (!entries.includes(downloadId)) {
      entries.push(downloadId);
    }
  }

  /** Download ids in the order the client started them. */
  downloadsFor(clientId: string): string[] {
    return [...(this.downloads.get(clientId) ?? [])];
  }

  forget(clientId: string, downloadId: string): boolean {
    const entries = this.downloads.get(clientId);
    if (!entries) {
      return false;
    }
    const index = entries.indexOf(downloadId);
    if (index < 0) {
      return false;
    }
    entries.splice(index, 1);
    if (entries.length === 0) {
      this.downloads.delete(clientId);
    }
    return true;
  }

  forgetAll(clientId: string): void {
    this.downloads.delete(clientId);
  }

  /** Removes {@link downloadIds} from every client. Returns how many entries were dropped. */
  forgetDownloads(downloadIds: Iterable<string>): number {
    const gone = new Set(downloadIds);
    if (gone.size === 0) {
      return 0;
    }
    let removed = 0;
    for (const [clientId, entries] of this.downloads) {
      const kept = entries.filter((id) => !gone.has(id));
      removed += entries.length - kept.length;
      if (kept.length === 0) {
        this.downloads.delete(clientId);
      } else if (kept.length !== entries.length) {
        this.downloads.set(clientId, kept);
      }
    }
    return removed;
  }

  /** Number of clients with at least one tracked download. */
  get clientCount(): number {
    return this.downloads.size;
  }
}

/**
 * Returns the client id carried by the request cookie, issuing a new one (and
 * the matching `Set-Cookie` header) when it is missing or malformed.
 */
export function resolveClientId(req: IncomingMessage, res: HttpResponseLike): string {
  const existing = readCookie(req, CLIENT_COOKIE);
  if (existing && CLIENT_ID_PATTERN.test(existing)) {
    return existing;
  }
  const clientId = randomUUID();
  res.setHeader("Set-Cookie", `${CLIENT_COOKIE}=${clientId}; Path=/; HttpOnly; SameSite=Lax`);
  return clientId;
}
