import { basename } from "node:path";

import { JobValidationError, friendlyErrorMessage } from "./errors.js";
import {
  isTerminalStatus,
  type FormatKind,
  type JobParameters,
  type JobSnapshot,
  type JobStatus,
  type JsonValue,
  type ProgressReport,
} from "./types.js";

/** Note recorded in `error` when a caller cancels the job. */
export const CANCELLED_BY_USER = "Download cancelled by user";

/** Position of the entry being fetched when the job walks a playlist. */
export interface EntryPosition {
  readonly index: number;
  readonly count: number;
}

const SINGLE_ENTRY: EntryPosition = { index: 0, count: 1 };

export interface DownloadJobOptions {
  /** Clock used for every timestamp; injectable for deterministic tests. */
  readonly clock?: () => number;
}

interface MutableJobState {
  status: JobStatus;
  progress: number;
  filename: string;
  filePath: string | null;
  filesize: number;
  downloaded: number;
  speed: number;
  eta: number;
  error: string | null;
  metadata: Record<string, JsonValue>;
  updatedAt: number;
  completedAt: number | null;
  cancelRequested: boolean;
  workingDirectory: string | null;
}

function clampPercent(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.max(0, Math.min(100, value));
}

function isJsonObject(value: JsonValue | undefined): value is { readonly [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nonNegative(value: number | null | undefined): number {
  return typeof value === "number" && Number.isFinite(value) && value > 0 ? value : 0;
}

/**
 * One tracked fetch request.
 *
 * Every mutator is synchronous and completes its update before returning, so
 * each method body is a critical section on the event loop: pollers never
 * observe a half-applied progress report, and reports for different jobs never
 * contend with each other.
 */
export class DownloadJob {
  readonly id: string;
  readonly url: string;
  readonly formatType: FormatKind;
  readonly formatId: string | null;
  readonly playlistUrls: readonly string[] | null;
  readonly requestedBy: string | null;
  readonly cookieFile: string | null;
  readonly createdAt: number;

  private readonly clock: () => number;
  private readonly state: MutableJobState;

  constructor(params: JobParameters, options: DownloadJobOptions = {}) {
    const id = params.id.trim();
    if (id.length === 0) {
      throw new JobValidationError("id");
    }
    const url = params.url.trim();
    if (url.length === 0) {
      throw new JobValidationError("url");
    }

    this.clock = options.clock ?? (() => Date.now());
    this.id = id;
    this.url = url;
    this.formatType = params.formatType ?? "video";
    this.formatId = params.formatId?.trim() || null;
    const playlist = (params.playlistUrls ?? []).map((entry) => entry.trim()).filter((entry) => entry.length > 0);
    this.playlistUrls = playlist.length > 0 ? Object.freeze(playlist) : null;
    this.requestedBy = params.requestedBy ?? null;
    this.cookieFile = params.cookieFile ?? null;
    this.createdAt = this.clock();
    this.state = {
      status: "queued",
      progress: 0,
      filename: "",
      filePath: null,
      filesize: 0,
      downloaded: 0,
      speed: 0,
      eta: 0,
      error: null,
      metadata: {},
      updatedAt: this.createdAt,
      completedAt: null,
      cancelRequested: false,
      workingDirectory: null,
    };
  }

  /** Parameters needed to build a fresh job under the same identifier. */
  toParameters(): JobParameters {
    return {
      id: this.id,
      url: this.url,
      formatType: this.formatType,
      formatId: this.formatId,
      playlistUrls: this.playlistUrls ? [...this.playlistUrls] : null,
      requestedBy: this.requestedBy,
      cookieFile: this.cookieFile,
    };
  }

  get status(): JobStatus {
    return this.state.status;
  }

  get progress(): number {
    return this.state.progress;
  }

  get filePath(): string | null {
    return this.state.filePath;
  }

  get filename(): string {
    return this.state.filename;
  }

  get downloaded(): number {
    return this.state.downloaded;
  }

  get speed(): number {
    return this.state.speed;
  }

  get completedAt(): number | null {
    return this.state.completedAt;
  }

  get cancelRequested(): boolean {
    return this.state.cancelRequested;
  }

  /** Directory assigned by the worker that claimed the job, if any. */
  get workingDirectory(): string | null {
    return this.state.workingDirectory;
  }

  get isTerminal(): boolean {
    return isTerminalStatus(this.state.status);
  }

  /**
   * Claims the job for a worker. Returns `false` when the job already reached a
   * terminal state (typically cancelled while it waited in the queue).
   */
  beginPreparing(): boolean {
    if (this.isTerminal || this.state.cancelRequested) {
      return false;
    }
    this.state.status = "preparing";
    this.state.error = null;
    this.state.progress = 0;
    this.touch();
    return true;
  }

  attachWorkingDirectory(directory: string): void {
    this.state.workingDirectory = directory;
  }

  /** Merges descriptive fields gathered before the transfer starts. */
  mergeMetadata(entries: Readonly<Record<string, JsonValue>>): void {
    Object.assign(this.state.metadata, entries);
    this.touch();
  }

  /**
   * Applies a progress report from the engine. Reports arriving after a
   * terminal state, or before the worker claimed the job, are ignored.
   *
   * For playlists, {@link entry} spreads the percentage over the entries and
   * only the last entry's `finished` report completes the job.
   */
  applyProgress(report: ProgressReport, entry: EntryPosition = SINGLE_ENTRY): void {
    const state = this.state;
    if (state.status !== "preparing" && state.status !== "downloading") {
      return;
    }
    const count = Math.max(1, entry.count);

    if (report.status === "downloading") {
      state.status = "downloading";
      state.downloaded = nonNegative(report.downloadedBytes);
      const total = nonNegative(report.totalBytes) || nonNegative(report.totalBytesEstimate);
      if (total > 0) {
        state.filesize = total;
        const entryPercent = clampPercent((state.downloaded / total) * 100);
        const overall = clampPercent((entry.index * 100 + entryPercent) / count);
        state.progress = Math.max(state.progress, overall);
      }
      state.speed = nonNegative(report.speed);
      state.eta = Math.round(nonNegative(report.eta));
      this.touch();
      return;
    }

    if (report.filename) {
      state.filename = basename(report.filename);
      state.filePath = report.filename;
    }
    if (entry.index >= count - 1) {
      this.complete();
      return;
    }
    state.status = "downloading";
    state.progress = Math.max(state.progress, clampPercent(((entry.index + 1) * 100) / count));
    this.touch();
  }

  /** Marks the job completed once the engine returned without error. */
  markCompleted(): void {
    if (this.isTerminal) {
      return;
    }
    this.complete();
  }

  /** Records an engine failure; ignored once the job is terminal. */
  markFailed(error: unknown): void {
    if (this.isTerminal) {
      return;
    }
    const raw = error instanceof Error ? error.message : String(error);
    this.state.status = "failed";
    this.state.error = friendlyErrorMessage(error);
    const debug = this.state.metadata.debug;
    this.state.metadata.debug = isJsonObject(debug) ? { ...debug, raw_error: raw } : { raw_error: raw };
    this.touch();
  }

  /**
   * Raises the cancellation flag and forces the `cancelled` status so pollers
   * see it before the worker reaches its next checkpoint. Returns `false` when
   * the job is already terminal.
   */
  requestCancel(): boolean {
    if (this.isTerminal) {
      return false;
    }
    this.state.cancelRequested = true;
    this.state.status = "cancelled";
    this.state.error = CANCELLED_BY_USER;
    this.touch();
    return true;
  }

  toSnapshot(): JobSnapshot {
    const state = this.state;
    return {
      id: this.id,
      url: this.url,
      format_type: this.formatType,
      format_id: this.formatId,
      playlist_urls: this.playlistUrls ? [...this.playlistUrls] : null,
      requested_by: this.requestedBy,
      status: state.status,
      progress: Math.round(state.progress * 100) / 100,
      filename: state.filename,
      filesize: state.filesize,
      downloaded: state.downloaded,
      speed: state.speed,
      eta: state.eta,
      error: state.error,
      completed: state.status === "completed",
      file_ready: state.filePath !== null && state.status === "completed",
      metadata: structuredClone(state.metadata),
      created_at: new Date(this.createdAt).toISOString(),
      updated_at: new Date(state.updatedAt).toISOString(),
      completed_at: state.completedAt !== null ? new Date(state.completedAt).toISOString() : null,
    };
  }

  private complete(): void {
    this.state.status = "completed";
    this.state.progress = 100;
    if (this.state.completedAt === null) {
      this.state.completedAt = this.clock();
    }
    this.touch();
  }

  private touch(): void {
    this.state.updatedAt = this.clock();
  }
}
