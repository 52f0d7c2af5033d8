import { randomUUID } from "node:crypto";
import { stat } from "node:fs/promises";
import path from "node:path";
import type { z } from "zod";

import type { FetchEngine, MediaFormat, MediaPreview, PlaylistEntry, SubtitleTrack } from "../engine/types.js";
import { aggregateStatistics, exportHistoryCsv, exportHistoryJson } from "../history.js";
import { ConfigurationError, JobValidationError } from "../jobs/errors.js";
import type { DownloadManager } from "../jobs/manager.js";
import { type JobSnapshot, isTerminalStatus } from "../jobs/types.js";
import type { StructuredLogger } from "../logger.js";
import { TimedCache } from "../utils/timedCache.js";
import { HttpError, badRequest, notFound } from "./errors.js";
import {
  ClearHistorySchema,
  DownloadIdSchema,
  DownloadSubtitlesSchema,
  DragAndDropSchema,
  MAX_BATCH_URLS,
  SelectDirectorySchema,
  SpeedLimitSchema,
  StartDownloadSchema,
  VideoInfoSchema,
} from "./schemas.js";
import type { ClientSessions } from "./sessions.js";

/** Output formats advertised by `/api/options`. */
export const SUPPORTED_FORMATS = ["mp4", "mp3", "webm", "m4a", "wav", "aac", "flac"] as const;

/** Extractor name fragments listed by `/api/supported_sites`. */
const POPULAR_SITES = [
  "youtube",
  "twitter",
  "instagram",
  "tiktok",
  "facebook",
  "vimeo",
  "dailymotion",
  "twitch",
  "reddit",
  "pinterest",
  "linkedin",
  "soundcloud",
  "bandcamp",
] as const;

const MAX_LISTED_SITES = 50;
const VIDEO_INFO_TTL_MS = 10 * 60 * 1000;
const VIDEO_INFO_MAX_ENTRIES = 64;
const SUPPORTED_SITES_TTL_MS = 60 * 60 * 1000;

/** Body of `/api/video_info`. */
export interface VideoInfoPayload {
  readonly title: string | null;
  readonly uploader: string | null;
  readonly duration: number | null;
  readonly view_count: number | null;
  readonly description: string | null;
  readonly website: string | null;
  readonly thumbnail: string | null;
  readonly formats: readonly MediaFormat[];
  readonly entries: readonly PlaylistEntry[];
  readonly subtitles: Readonly<Record<string, readonly SubtitleTrack[]>>;
}

export interface SupportedSite {
  readonly name: string;
}

const MIME_TYPES: Record<string, string> = {
  ".mp4": "video/mp4",
  ".mkv": "video/x-matroska",
  ".webm": "video/webm",
  ".mp3": "audio/mpeg",
  ".m4a": "audio/mp4",
  ".wav": "audio/wav",
  ".aac": "audio/aac",
  ".flac": "audio/flac",
  ".ogg": "audio/ogg",
  ".opus": "audio/opus",
};

/** Request as seen by the router once the transport resolved the client. */
export interface ApiRequest {
  readonly method: string;
  readonly pathname: string;
  readonly clientId: string;
  /** Reads and parses the JSON body; `undefined` when empty. */
  readonly readBody: () => Promise<unknown>;
}

export type ApiResult =
  | { readonly kind: "json"; readonly status: number; readonly body: unknown }
  | {
      readonly kind: "attachment";
      readonly status: number;
      readonly body: string;
      readonly contentType: string;
      readonly filename: string;
    }
  | { readonly kind: "file"; readonly path: string; readonly filename: string; readonly contentType: string };

export interface ApiRouterOptions {
  readonly manager: DownloadManager;
  /** Answers the preview, subtitle and extractor routes, which never create jobs. */
  readonly engine: FetchEngine;
  readonly sessions: ClientSessions;
  readonly logger: StructuredLogger;
  readonly maxParallelDownloads: number;
  /** Set when the download root came from explicit configuration. */
  readonly directorySelected?: boolean;
  readonly clock?: () => number;
}

type RouteHandler = (request: ApiRequest, params: readonly string[]) => Promise<ApiResult>;

interface Route {
  readonly method: "GET" | "POST";
  readonly pattern: RegExp;
  readonly handler: RouteHandler;
}

function json(body: unknown, status = 200): ApiResult {
  return { kind: "json", status, body };
}

export function guessMimeType(filename: string): string {
  return MIME_TYPES[path.extname(filename).toLowerCase()] ?? "application/octet-stream";
}

/** Last listed thumbnail when none is marked as preferred; plain http links are upgraded. */
function preferredThumbnail(preview: MediaPreview): string | null {
  const thumbnail = preview.thumbnail ?? preview.thumbnails[preview.thumbnails.length - 1] ?? null;
  if (thumbnail !== null && thumbnail.startsWith("http://")) {
    return `https://${thumbnail.slice("http://".length)}`;
  }
  return thumbnail;
}

function toVideoInfoPayload(preview: MediaPreview): VideoInfoPayload {
  return {
    title: preview.title,
    uploader: preview.uploader,
    duration: preview.duration,
    view_count: preview.view_count,
    description: preview.description,
    website: preview.extractor_key,
    thumbnail: preferredThumbnail(preview),
    formats: preview.formats,
    entries: preview.entries,
    subtitles: preview.subtitles,
  };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Validates {@link payload} and turns the first issue into a 400. */
function parseBody<T extends z.ZodTypeAny>(schema: T, payload: unknown): z.output<T> {
  if (typeof payload !== "object" || payload === null || Array.isArray(payload)) {
    throw badRequest("Request must include a JSON body.");
  }
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw badRequest(result.error.issues[0]?.message ?? "Invalid JSON payload.");
  }
  return result.data;
}

/**
 * JSON API mounted under `/api/`. Route handlers only translate between HTTP
 * payloads and {@link DownloadManager} calls; the transport concerns (headers,
 * cookies, streaming) live in the HTTP server.
 */
export class ApiRouter {
  private readonly manager: DownloadManager;
  private readonly engine: FetchEngine;
  private readonly videoInfoCache: TimedCache<VideoInfoPayload>;
  private readonly siteCache: TimedCache<SupportedSite[]>;
  private readonly sessions: ClientSessions;
  private readonly logger: StructuredLogger;
  private readonly maxParallelDownloads: number;
  private readonly clock: () => number;
  private readonly startedAt: number;
  private directorySelected: boolean;
  private readonly routes: Route[];

  constructor(options: ApiRouterOptions) {
    this.manager = options.manager;
    this.engine = options.engine;
    this.sessions = options.sessions;
    this.logger = options.logger;
    this.maxParallelDownloads = options.maxParallelDownloads;
    this.clock = options.clock ?? (() => Date.now());
    this.startedAt = this.clock();
    this.videoInfoCache = new TimedCache<VideoInfoPayload>({ ttlMs: VIDEO_INFO_TTL_MS, maxEntries: VIDEO_INFO_MAX_ENTRIES, now: this.clock });
    this.siteCache = new TimedCache<SupportedSite[]>({ ttlMs: SUPPORTED_SITES_TTL_MS, maxEntries: 1, now: this.clock });
    this.directorySelected = options.directorySelected ?? false;
    this.routes = [
      { method: "POST", pattern: /^\/api\/start_download$/, handler: (req) => this.startDownload(req) },
      { method: "GET", pattern: /^\/api\/progress\/([^/]+)$/, handler: (_req, [id]) => this.progress(id) },
      { method: "GET", pattern: /^\/api\/download_file\/([^/]+)$/, handler: (_req, [id]) => this.downloadFile(id) },
      { method: "GET", pattern: /^\/api\/my_downloads$/, handler: (req) => this.myDownloads(req) },
      { method: "POST", pattern: /^\/api\/cancel_download$/, handler: (req) => this.cancelDownload(req) },
      { method: "POST", pattern: /^\/api\/retry_download$/, handler: (req) => this.retryDownload(req) },
      { method: "POST", pattern: /^\/api\/clear_history$/, handler: (req) => this.clearHistory(req) },
      { method: "POST", pattern: /^\/api\/drag_and_drop$/, handler: (req) => this.dragAndDrop(req) },
      { method: "POST", pattern: /^\/api\/set_speed_limit$/, handler: (req) => this.setSpeedLimit(req) },
      { method: "GET", pattern: /^\/api\/download_directory$/, handler: async () => this.downloadDirectory() },
      { method: "POST", pattern: /^\/api\/download_directory\/select$/, handler: (req) => this.selectDirectory(req) },
      { method: "GET", pattern: /^\/api\/export_history_json$/, handler: async (req) => this.exportJson(req) },
      { method: "GET", pattern: /^\/api\/export_history_csv$/, handler: async (req) => this.exportCsv(req) },
      { method: "GET", pattern: /^\/api\/system_stats$/, handler: async () => this.systemStats() },
      { method: "GET", pattern: /^\/api\/options$/, handler: async () => this.options() },
      { method: "POST", pattern: /^\/api\/video_info$/, handler: (req) => this.videoInfo(req) },
      { method: "GET", pattern: /^\/api\/supported_sites$/, handler: () => this.supportedSites() },
      { method: "POST", pattern: /^\/api\/download_subtitles$/, handler: (req) => this.downloadSubtitles(req) },
    ];
  }

  /**
   * Periodic housekeeping: reclaims expired jobs, drops their ids from every
   * client list and purges stale preview entries. Returns the reclaimed ids.
   */
  async runMaintenance(): Promise<string[]> {
    const removed = await this.manager.cleanupExpired();
    this.sessions.forgetDownloads(removed);
    const purged = this.videoInfoCache.purgeExpired() + this.siteCache.purgeExpired();
    if (purged > 0) {
      this.logger.debug("preview_cache_purged", { entries: purged });
    }
    return removed;
  }

  /**
   * Resolves and runs the handler for {@link request}. Failures become JSON
   * error bodies: 4xx carry their message, anything unexpected is logged and
   * reported as a 500.
   */
  async dispatch(request: ApiRequest): Promise<ApiResult> {
    let pathMatched = false;
    for (const route of this.routes) {
      const match = route.pattern.exec(request.pathname);
      if (!match) {
        continue;
      }
      pathMatched = true;
      if (route.method !== request.method) {
        continue;
      }
      try {
        const params = match.slice(1).map((segment) => decodeURIComponent(segment));
        return await route.handler(request, params);
      } catch (error) {
        return this.toErrorResult(error, request);
      }
    }
    if (pathMatched) {
      return json({ error: "Method not allowed" }, 405);
    }
    return json({ error: "Resource not found" }, 404);
  }

  private toErrorResult(error: unknown, request: ApiRequest): ApiResult {
    if (error instanceof URIError) {
      return json({ error: "Resource not found" }, 404);
    }
    if (error instanceof JobValidationError) {
      return json({ error: error.message }, 400);
    }
    if (error instanceof HttpError) {
      const message = error.status === 404 ? "Resource not found" : error.message;
      return json({ ...error.details, error: message }, error.status);
    }
    this.logger.error("http_unhandled_error", {
      method: request.method,
      path: request.pathname,
      error,
    });
    return json({ error: "Internal server error" }, 500);
  }

  private requireJob(id: string): JobSnapshot {
    const snapshot = this.manager.get(id);
    if (!snapshot) {
      throw notFound(`Download ${id} not found.`);
    }
    return snapshot;
  }

  /** Snapshots of the client's jobs; ids the manager no longer knows are forgotten. */
  private sessionSnapshots(clientId: string): JobSnapshot[] {
    const snapshots: JobSnapshot[] = [];
    for (const id of this.sessions.downloadsFor(clientId)) {
      const snapshot = this.manager.get(id);
      if (snapshot) {
        snapshots.push(snapshot);
      } else {
        this.sessions.forget(clientId, id);
      }
    }
    return snapshots;
  }

  private async startDownload(request: ApiRequest): Promise<ApiResult> {
    const input = parseBody(StartDownloadSchema, await request.readBody());
    const downloadId = randomUUID();
    const job = this.manager.submit({
      id: downloadId,
      url: input.url,
      formatType: input.format,
      formatId: input.format_id ?? null,
      playlistUrls: input.playlist_urls,
      requestedBy: request.clientId,
    });
    this.sessions.track(request.clientId, downloadId);
    return json({ download_id: downloadId, job }, 202);
  }

  private async progress(id: string): Promise<ApiResult> {
    return json(this.requireJob(id));
  }

  private async downloadFile(id: string): Promise<ApiResult> {
    this.requireJob(id);
    const file = this.manager.resolveFile(id);
    if (!file) {
      throw badRequest("Download not completed yet.");
    }
    try {
      const info = await stat(file.path);
      if (!info.isFile()) {
        throw notFound("File not found on server.");
      }
    } catch (error) {
      if (error instanceof HttpError) {
        throw error;
      }
      throw notFound("File not found on server.");
    }
    const filename = file.filename || path.basename(file.path);
    return { kind: "file", path: file.path, filename, contentType: guessMimeType(filename) };
  }

  private async myDownloads(request: ApiRequest): Promise<ApiResult> {
    return json({ downloads: this.sessionSnapshots(request.clientId) });
  }

  private async cancelDownload(request: ApiRequest): Promise<ApiResult> {
    const { download_id: id } = parseBody(DownloadIdSchema, await request.readBody());
    const snapshot = this.requireJob(id);
    if (isTerminalStatus(snapshot.status)) {
      throw badRequest("Download cannot be cancelled in its current state.");
    }
    this.manager.cancel(id);
    return json({ message: "Download cancelled", job: this.manager.get(id) ?? snapshot });
  }

  private async retryDownload(request: ApiRequest): Promise<ApiResult> {
    const { download_id: id } = parseBody(DownloadIdSchema, await request.readBody());
    const snapshot = this.requireJob(id);
    if (snapshot.status !== "failed" && snapshot.status !== "cancelled") {
      throw badRequest("Only failed or cancelled downloads can be retried.");
    }
    const job = this.manager.retry(id);
    if (!job) {
      throw notFound("Unable to retry download.");
    }
    return json({ message: "Download restarted", job });
  }

  private async clearHistory(request: ApiRequest): Promise<ApiResult> {
    const body = await request.readBody();
    const { download_id: id } = ClearHistorySchema.parse(typeof body === "object" && body !== null ? body : {});

    if (id) {
      this.sessions.forget(request.clientId, id);
      const snapshot = this.manager.get(id);
      if (snapshot && isTerminalStatus(snapshot.status) && (await this.manager.clear(id))) {
        this.sessions.forgetDownloads([id]);
      }
      return json({ message: `Download ${id} removed` });
    }

    this.sessions.forgetAll(request.clientId);
    return json({ message: "History cleared" });
  }

  private async dragAndDrop(request: ApiRequest): Promise<ApiResult> {
    const { urls } = parseBody(DragAndDropSchema, await request.readBody());
    const downloads: Array<{ url: string; download_id: string }> = [];
    for (const entry of urls.slice(0, MAX_BATCH_URLS)) {
      const url = typeof entry === "string" ? entry.trim() : "";
      if (url.length === 0) {
        continue;
      }
      const downloadId = randomUUID();
      this.manager.submit({ id: downloadId, url, formatType: "video", requestedBy: request.clientId });
      this.sessions.track(request.clientId, downloadId);
      downloads.push({ url, download_id: downloadId });
    }
    return json({ message: `Processing ${downloads.length} URLs`, downloads });
  }

  private async setSpeedLimit(request: ApiRequest): Promise<ApiResult> {
    const { speed_limit: limit } = parseBody(SpeedLimitSchema, await request.readBody());
    if (limit <= 0) {
      this.manager.setRateLimit(null);
      return json({ message: "Speed limit disabled" });
    }
    this.manager.setRateLimit(limit);
    return json({ message: `Speed limit set to ${limit} KB/s` });
  }

  private downloadDirectory(): ApiResult {
    return json({ directory: this.manager.getDownloadRoot(), user_selected: this.directorySelected });
  }

  private async selectDirectory(request: ApiRequest): Promise<ApiResult> {
    const body = await request.readBody();
    const { path: requested } = SelectDirectorySchema.parse(typeof body === "object" && body !== null ? body : {});

    if (typeof requested !== "string" || requested.length === 0) {
      throw new HttpError(501, "Folder selection dialog is not available on this system.", {
        code: "dialog_unavailable",
      });
    }
    if (requested.trim().length === 0) {
      throw badRequest("Path cannot be empty.");
    }

    try {
      const directory = await this.manager.setDownloadRoot(requested);
      this.directorySelected = true;
      return json({ directory, user_selected: true });
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.logger.error("download_directory_rejected", { path: requested, error });
        throw badRequest(error.message);
      }
      throw error;
    }
  }

  private exportJson(request: ApiRequest): ApiResult {
    return {
      kind: "attachment",
      status: 200,
      body: exportHistoryJson(this.sessionSnapshots(request.clientId)),
      contentType: "application/json",
      filename: "download_history.json",
    };
  }

  private exportCsv(request: ApiRequest): ApiResult {
    return {
      kind: "attachment",
      status: 200,
      body: exportHistoryCsv(this.sessionSnapshots(request.clientId)),
      contentType: "text/csv",
      filename: "download_history.csv",
    };
  }

  private systemStats(): ApiResult {
    const snapshots = this.manager.list();
    return json({
      ...aggregateStatistics(snapshots),
      server_uptime: Math.floor((this.clock() - this.startedAt) / 1000),
      worker_pool: this.manager.getPoolStatistics(),
      active_jobs: snapshots.filter((snapshot) => snapshot.status === "preparing" || snapshot.status === "downloading"),
    });
  }

  private options(): ApiResult {
    const rateLimit = this.manager.getRateLimit();
    return json({
      max_parallel_downloads: this.maxParallelDownloads,
      speed_limit: rateLimit === null ? null : rateLimit / 1024,
      supported_formats: SUPPORTED_FORMATS,
      default_download_folder: this.manager.getDownloadRoot(),
      download_folder_selected: this.directorySelected,
      history_export_formats: ["json", "csv"],
      max_batch_urls: MAX_BATCH_URLS,
    });
  }

  private async videoInfo(request: ApiRequest): Promise<ApiResult> {
    const { url } = parseBody(VideoInfoSchema, await request.readBody());
    const cached = this.videoInfoCache.get(url);
    if (cached) {
      this.logger.debug("video_info_cache_hit", { url });
      return json(cached);
    }

    const startedAt = this.clock();
    let preview: MediaPreview | null;
    try {
      preview = await this.engine.preview(url);
    } catch (error) {
      this.logger.warn("video_info_failed", { url, message: describeError(error) });
      throw badRequest(describeError(error));
    }
    if (!preview) {
      throw badRequest("No media information found.");
    }
    const payload = toVideoInfoPayload(preview);
    this.videoInfoCache.set(url, payload);
    this.logger.info("video_info_fetched", { url, duration_ms: this.clock() - startedAt });
    return json(payload);
  }

  private async supportedSites(): Promise<ApiResult> {
    const cached = this.siteCache.get("sites");
    if (cached) {
      return json({ sites: cached });
    }

    let names: string[];
    try {
      names = await this.engine.listExtractors();
    } catch (error) {
      throw badRequest(describeError(error));
    }
    const sites: SupportedSite[] = [];
    for (const name of names) {
      const lowered = name.toLowerCase();
      if (POPULAR_SITES.some((site) => lowered.includes(site))) {
        sites.push({ name });
      }
      if (sites.length >= MAX_LISTED_SITES) {
        break;
      }
    }
    this.siteCache.set("sites", sites);
    return json({ sites });
  }

  private async downloadSubtitles(request: ApiRequest): Promise<ApiResult> {
    const { url, language } = parseBody(DownloadSubtitlesSchema, await request.readBody());
    let title: string | null;
    try {
      title = await this.engine.fetchSubtitles(url, { language, directory: this.manager.getDownloadRoot() });
    } catch (error) {
      throw badRequest(describeError(error));
    }
    return json({ message: "Subtitles processed", title });
  }
}
