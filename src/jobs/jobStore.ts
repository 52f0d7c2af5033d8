import { JobConflictError, JobNotFoundError } from "./errors.js";
import type { DownloadJob } from "./job.js";

/**
 * Membership registry mapping job identifiers to live {@link DownloadJob}
 * instances. The store only guards membership; job fields are mutated through
 * the job's own methods by the worker that runs it.
 *
 * Every operation is synchronous, so an insert, replace or removal is applied
 * in full before any other callback observes the map.
 */
export class JobStore {
  private readonly jobs = new Map<string, DownloadJob>();

  /** Registers a brand new job. Throws when the identifier is taken. */
  insert(job: DownloadJob): void {
    if (this.jobs.has(job.id)) {
      throw new JobConflictError(job.id);
    }
    this.jobs.set(job.id, job);
  }

  /**
   * Swaps the job registered under `job.id` for a fresh instance. The ID never
   * maps to nothing in between, which is what retries rely on.
   */
  replace(job: DownloadJob): DownloadJob {
    const previous = this.jobs.get(job.id);
    if (!previous) {
      throw new JobNotFoundError(job.id);
    }
    this.jobs.set(job.id, job);
    return previous;
  }

  get(jobId: string): DownloadJob | undefined {
    return this.jobs.get(jobId);
  }

  has(jobId: string): boolean {
    return this.jobs.has(jobId);
  }

  /**
   * Enumerates every job, or only those whose identifier appears in
   * {@link ids}. Unknown identifiers are skipped.
   */
  list(ids?: Iterable<string>): DownloadJob[] {
    if (ids === undefined) {
      return [...this.jobs.values()];
    }
    const result: DownloadJob[] = [];
    for (const id of new Set(ids)) {
      const job = this.jobs.get(id);
      if (job) {
        result.push(job);
      }
    }
    return result;
  }

  /** Removes the job and returns it, or `undefined` when it was unknown. */
  remove(jobId: string): DownloadJob | undefined {
    const job = this.jobs.get(jobId);
    this.jobs.delete(jobId);
    return job;
  }

  get size(): number {
    return this.jobs.size;
  }
}
