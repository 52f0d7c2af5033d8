/**
 * JSON-compatible value stored in job metadata. Keeping the map JSON-safe lets
 * snapshots be serialised verbatim by the HTTP layer and the history export.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | { readonly [key: string]: JsonValue }
  | readonly JsonValue[];

/**
 * Lifecycle states of a download job. `completed`, `failed` and `cancelled`
 * are terminal: only a retry (which installs a fresh job) leaves them.
 */
export const JOB_STATUSES = ["queued", "preparing", "downloading", "completed", "failed", "cancelled"] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>(["completed", "failed", "cancelled"]);

export const ACTIVE_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>(["queued", "preparing", "downloading"]);

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export const FORMAT_KINDS = ["video", "audio"] as const;

/** Requested output kind: muxed video or audio-only. */
export type FormatKind = (typeof FORMAT_KINDS)[number];

/** Parameters fixed when the job is created and reused verbatim on retry. */
export interface JobParameters {
  readonly id: string;
  readonly url: string;
  readonly formatType?: FormatKind;
  readonly formatId?: string | null;
  readonly playlistUrls?: readonly string[] | null;
  readonly requestedBy?: string | null;
  /** Per-job cookies.txt overriding the manager default. */
  readonly cookieFile?: string | null;
}

/**
 * Progress report pushed by the fetch engine. The engine invokes the hook
 * synchronously, so merging a report must never wait on I/O.
 */
export interface ProgressReport {
  readonly status: "downloading" | "finished";
  readonly filename?: string | null;
  readonly downloadedBytes?: number | null;
  readonly totalBytes?: number | null;
  readonly totalBytesEstimate?: number | null;
  /** Instantaneous transfer rate in bytes per second. */
  readonly speed?: number | null;
  /** Estimated seconds remaining. */
  readonly eta?: number | null;
}

/** Serialisable view of a job returned to API callers. */
export interface JobSnapshot {
  readonly id: string;
  readonly url: string;
  readonly format_type: FormatKind;
  readonly format_id: string | null;
  readonly playlist_urls: readonly string[] | null;
  readonly requested_by: string | null;
  readonly status: JobStatus;
  readonly progress: number;
  readonly filename: string;
  readonly filesize: number;
  readonly downloaded: number;
  readonly speed: number;
  readonly eta: number;
  readonly error: string | null;
  readonly completed: boolean;
  readonly file_ready: boolean;
  readonly metadata: Readonly<Record<string, JsonValue>>;
  readonly created_at: string;
  readonly updated_at: string;
  readonly completed_at: string | null;
}
