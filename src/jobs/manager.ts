import { access, rm, stat } from "node:fs/promises";
import { constants as fsConstants } from "node:fs";

import type { FetchEngine, MediaInfo } from "../engine/types.js";
import type { StructuredLogger } from "../logger.js";
import { ensureDirectory, expandUserPath, jobDirectoryPath } from "../paths.js";
import { AsyncMutex } from "../utils/asyncMutex.js";
import { ConfigurationError, DownloadCancelledError, isDownloadCancelled } from "./errors.js";
import { buildFetchOptions, type JobRunSettings } from "./fetchOptions.js";
import { DownloadJob } from "./job.js";
import { JobStore } from "./jobStore.js";
import type { JobParameters, JobSnapshot, JsonValue } from "./types.js";
import { DEFAULT_POOL_SIZE, JobWorkerPool, type PoolHandle, type WorkerPoolStatistics } from "./workerPool.js";

/** Hours a completed job is kept before {@link DownloadManager.cleanupExpired} reclaims it. */
export const DEFAULT_RETENTION_HOURS = 24;

const HOUR_MS = 60 * 60 * 1000;

/** Metadata fields copied from the engine's info lookup. */
const METADATA_FIELDS = ["title", "uploader", "duration", "view_count", "thumbnail", "ext", "webpage_url"] as const;

export interface DownloadManagerOptions {
  readonly downloadRoot: string;
  readonly engine: FetchEngine;
  readonly maxWorkers?: number;
  readonly retentionHours?: number;
  /** cookies.txt used for jobs that do not carry their own. */
  readonly defaultCookieFile?: string | null;
  readonly logger?: StructuredLogger;
  readonly clock?: () => number;
}

interface InFlightEntry {
  readonly job: DownloadJob;
  readonly handle: PoolHandle;
  readonly controller: AbortController;
}

function pickMetadata(info: MediaInfo): Record<string, JsonValue> {
  const metadata: Record<string, JsonValue> = {};
  for (const field of METADATA_FIELDS) {
    metadata[field] = info[field] ?? null;
  }
  return metadata;
}

async function existingFile(candidate: string | null): Promise<string | null> {
  if (!candidate) {
    return null;
  }
  try {
    await access(candidate, fsConstants.R_OK);
    return candidate;
  } catch {
    return null;
  }
}

/**
 * Orchestrates download jobs: registers them, schedules them on the worker
 * pool, drives the fetch engine and reclaims expired jobs.
 *
 * The manager never owns a timer: {@link cleanupExpired} is a single call the
 * host triggers (every Nth HTTP request in this service).
 */
export class DownloadManager {
  private readonly store = new JobStore();
  private readonly pool: JobWorkerPool;
  private readonly inFlight = new Map<string, InFlightEntry>();
  private readonly engine: FetchEngine;
  private readonly logger: StructuredLogger | null;
  private readonly clock: () => number;
  private readonly retentionMs: number;
  private readonly defaultCookieFile: string | null;
  /** Serialises download-root changes, which await the filesystem. */
  private readonly configMutex = new AsyncMutex();
  private downloadRoot: string;
  private rateLimitBytesPerSec: number | null = null;

  constructor(options: DownloadManagerOptions) {
    this.downloadRoot = expandUserPath(options.downloadRoot);
    this.engine = options.engine;
    this.logger = options.logger ?? null;
    this.clock = options.clock ?? (() => Date.now());
    this.retentionMs = (options.retentionHours ?? DEFAULT_RETENTION_HOURS) * HOUR_MS;
    this.defaultCookieFile = options.defaultCookieFile ?? null;
    this.pool = new JobWorkerPool({ size: options.maxWorkers ?? DEFAULT_POOL_SIZE, logger: options.logger });
  }

  /**
   * Registers a job and queues it. Returns before any work starts, so the
   * snapshot is always `queued`.
   *
   * @throws {JobConflictError} when the identifier is already registered.
   * @throws {PathResolutionError} when the identifier cannot name a directory.
   */
  submit(params: JobParameters): JobSnapshot {
    const job = new DownloadJob(params, { clock: this.clock });
    jobDirectoryPath(this.downloadRoot, job.id);
    this.store.insert(job);
    this.schedule(job);
    this.logger?.debug("job_submitted", { job_id: job.id, url: job.url, format_type: job.formatType });
    return job.toSnapshot();
  }

  get(jobId: string): JobSnapshot | null {
    return this.store.get(jobId)?.toSnapshot() ?? null;
  }

  /** All jobs, or the subset named by {@link ids}; order is unspecified. */
  list(ids?: Iterable<string>): JobSnapshot[] {
    return this.store.list(ids).map((job) => job.toSnapshot());
  }

  /** Location of the finished file, once the job completed. */
  resolveFile(jobId: string): { path: string; filename: string } | null {
    const job = this.store.get(jobId);
    if (!job || job.status !== "completed" || !job.filePath) {
      return null;
    }
    return { path: job.filePath, filename: job.filename };
  }

  /**
   * Flags the job and forces `cancelled` immediately. A job still waiting for a
   * slot is withdrawn from the queue; a running one stops at its next progress
   * report or playlist boundary. Returns `false` for unknown or terminal jobs.
   */
  cancel(jobId: string): boolean {
    const job = this.store.get(jobId);
    if (!job || !job.requestCancel()) {
      return false;
    }
    const entry = this.inFlight.get(jobId);
    if (entry?.job === job) {
      entry.handle.cancel();
    }
    this.logger?.info("job_cancel_requested", { job_id: jobId });
    return true;
  }

  /**
   * Re-runs a job under the same identifier with the original parameters. The
   * store entry is swapped in one step. A previous run that is still active is
   * cancelled first.
   */
  retry(jobId: string): JobSnapshot | null {
    const previous = this.store.get(jobId);
    if (!previous) {
      return null;
    }
    previous.requestCancel();
    const entry = this.inFlight.get(jobId);
    if (entry?.job === previous && !entry.handle.cancel()) {
      entry.controller.abort();
    }

    const job = new DownloadJob(previous.toParameters(), { clock: this.clock });
    this.store.replace(job);
    this.schedule(job);
    this.logger?.info("job_retried", { job_id: jobId });
    return job.toSnapshot();
  }

  /**
   * Forgets the job and deletes its file and working directory. Filesystem
   * failures are logged only. Returns whether a job was registered.
   */
  async clear(jobId: string): Promise<boolean> {
    const job = this.store.remove(jobId);
    const entry = this.inFlight.get(jobId);
    if (entry) {
      this.inFlight.delete(jobId);
      if (!entry.handle.cancel()) {
        entry.job.requestCancel();
        entry.controller.abort();
      }
    }
    if (!job) {
      return false;
    }

    if (job.filePath) {
      await this.removePath(job.filePath, jobId, "file");
    }
    await this.removePath(job.workingDirectory ?? jobDirectoryPath(this.downloadRoot, jobId), jobId, "directory");
    this.logger?.info("job_cleared", { job_id: jobId });
    return true;
  }

  /**
   * Clears every job whose completion is older than the retention window.
   * Jobs without a completion timestamp are never touched. Returns the
   * identifiers removed.
   */
  async cleanupExpired(now: number = this.clock()): Promise<string[]> {
    const cutoff = now - this.retentionMs;
    const expired = this.store.list().filter((job) => job.completedAt !== null && job.completedAt < cutoff);
    const removed: string[] = [];
    for (const job of expired) {
      if (await this.clear(job.id)) {
        removed.push(job.id);
      }
    }
    if (removed.length > 0) {
      this.logger?.info("jobs_expired", { count: removed.length, job_ids: removed });
    }
    return removed;
  }

  /**
   * Changes the directory new jobs are written under. Jobs that already
   * started keep their directory. The path is created when missing.
   *
   * @throws {ConfigurationError} when the path cannot be created or is not a directory.
   */
  async setDownloadRoot(input: string): Promise<string> {
    return this.configMutex.runExclusive(async () => {
      if (input.trim().length === 0) {
        throw new ConfigurationError("download_root", input, "Path cannot be empty.");
      }
      const resolved = expandUserPath(input);
      try {
        await ensureDirectory(resolved);
        const info = await stat(resolved);
        if (!info.isDirectory()) {
          throw new Error(`${resolved} is not a directory`);
        }
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError("download_root", resolved, `Could not use directory: ${reason}`, { cause: error });
      }
      this.downloadRoot = resolved;
      this.logger?.info("download_root_changed", { directory: resolved });
      return resolved;
    });
  }

  getDownloadRoot(): string {
    return this.downloadRoot;
  }

  /**
   * Caps the transfer rate of jobs started from now on. `null` or a value
   * below one disables the cap; running jobs keep the limit they started with.
   */
  setRateLimit(kilobytesPerSecond: number | null): void {
    if (kilobytesPerSecond !== null && !Number.isFinite(kilobytesPerSecond)) {
      throw new RangeError("rate limit must be a finite number of KB/s");
    }
    if (kilobytesPerSecond === null || kilobytesPerSecond <= 0) {
      this.rateLimitBytesPerSec = null;
    } else {
      this.rateLimitBytesPerSec = Math.max(1, Math.floor(kilobytesPerSecond)) * 1024;
    }
    this.logger?.info("rate_limit_changed", { bytes_per_sec: this.rateLimitBytesPerSec });
  }

  /** Current cap in bytes per second, or `null` when unlimited. */
  getRateLimit(): number | null {
    return this.rateLimitBytesPerSec;
  }

  getPoolStatistics(): WorkerPoolStatistics {
    return this.pool.getStatistics();
  }

  /**
   * Stops admitting work. Queued jobs are cancelled; running jobs are flagged
   * so they stop at their next checkpoint, then awaited.
   */
  async shutdown(): Promise<void> {
    const withdrawn = this.pool.close();
    for (const jobId of withdrawn) {
      this.store.get(jobId)?.requestCancel();
    }
    for (const entry of this.inFlight.values()) {
      entry.job.requestCancel();
    }
    await this.pool.drain();
    this.logger?.info("download_manager_stopped", { withdrawn: withdrawn.length });
  }

  private schedule(job: DownloadJob): void {
    const controller = new AbortController();
    const handle = this.pool.submit(job.id, () => this.runJob(job, controller.signal));
    this.inFlight.set(job.id, { job, handle, controller });
    void handle.done.then(() => {
      if (this.inFlight.get(job.id)?.job === job) {
        this.inFlight.delete(job.id);
      }
    });
  }

  /**
   * Worker body: prepare, fetch every entry, finalise. Errors never escape;
   * they end up in the job record.
   */
  private async runJob(job: DownloadJob, signal: AbortSignal): Promise<void> {
    if (this.store.get(job.id) !== job || !job.beginPreparing()) {
      this.logger?.debug("job_skipped", { job_id: job.id, status: job.status });
      return;
    }

    const throwIfCancelled = (): void => {
      if (job.cancelRequested || this.store.get(job.id) !== job) {
        throw new DownloadCancelledError(job.id);
      }
    };

    try {
      job.attachWorkingDirectory(jobDirectoryPath(this.downloadRoot, job.id));
      const settings = await this.snapshotRunSettings(job);
      throwIfCancelled();
      await ensureDirectory(settings.jobDirectory);

      await this.collectMetadata(job, settings.cookieFile, signal);

      const entries = job.playlistUrls ?? [job.url];
      for (let index = 0; index < entries.length; index += 1) {
        throwIfCancelled();
        const position = { index, count: entries.length };
        const options = buildFetchOptions(
          job,
          settings,
          (report) => {
            throwIfCancelled();
            job.applyProgress(report, position);
          },
          signal,
        );
        this.logger?.debug("engine_fetch_started", { job_id: job.id, entry: index + 1, of: entries.length });
        await this.engine.fetch(entries[index], options);
      }
      throwIfCancelled();

      job.markCompleted();
      this.logger?.info("job_completed", { job_id: job.id, filename: job.filename });
    } catch (error) {
      if (isDownloadCancelled(error) || job.cancelRequested || signal.aborted) {
        this.logger?.info("job_cancelled", { job_id: job.id });
        return;
      }
      job.markFailed(error);
      this.logger?.error("job_failed", {
        job_id: job.id,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /** Configuration read once per run; later changes do not reach this job. */
  private async snapshotRunSettings(job: DownloadJob): Promise<JobRunSettings> {
    const jobDirectory = job.workingDirectory ?? jobDirectoryPath(this.downloadRoot, job.id);
    const rateLimitBytesPerSec = this.rateLimitBytesPerSec;
    const cookieFile = await existingFile(job.cookieFile ?? this.defaultCookieFile);
    return { jobDirectory, rateLimitBytesPerSec, cookieFile };
  }

  private async collectMetadata(job: DownloadJob, cookieFile: string | null, signal: AbortSignal): Promise<void> {
    let info: MediaInfo | null = null;
    try {
      info = await this.engine.extractInfo(job.url, { cookieFile, signal });
    } catch (error) {
      this.logger?.debug("metadata_extraction_failed", {
        job_id: job.id,
        message: error instanceof Error ? error.message : String(error),
      });
    }
    if (info) {
      job.mergeMetadata(pickMetadata(info));
    }
  }

  private async removePath(target: string, jobId: string, kind: "file" | "directory"): Promise<void> {
    try {
      await rm(target, { recursive: kind === "directory", force: true });
    } catch (error) {
      this.logger?.warn("job_cleanup_failed", {
        job_id: jobId,
        kind,
        path: target,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
