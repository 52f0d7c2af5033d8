/**
 * Error raised when a job is submitted under an identifier that is already
 * registered. The existing job is left untouched.
 */
export class JobConflictError extends Error {
  public readonly code = "E-JOB-CONFLICT";
  public readonly hint = "submit the job under a fresh identifier";
  public readonly details: { jobId: string };

  constructor(jobId: string) {
    super(`Job ${jobId} already exists`);
    this.name = "JobConflictError";
    this.details = { jobId };
  }
}

/** Raised when job parameters cannot describe a fetch (blank identifier or URL). */
export class JobValidationError extends Error {
  public readonly code = "E-JOB-INVALID";
  public readonly hint = "provide a non-empty job identifier and source URL";
  public readonly details: { field: "id" | "url" };

  constructor(field: "id" | "url") {
    super(`Job ${field} must not be empty`);
    this.name = "JobValidationError";
    this.details = { field };
  }
}

/** Error raised when an operation targets an unknown job identifier. */
export class JobNotFoundError extends Error {
  public readonly code = "E-JOB-NOTFOUND";
  public readonly hint = "list the session downloads to obtain a valid id";
  public readonly details: { jobId: string };

  constructor(jobId: string) {
    super(`Download ${jobId} not found.`);
    this.name = "JobNotFoundError";
    this.details = { jobId };
  }
}

/**
 * Signal thrown from the progress hook (or between playlist entries) once a
 * cancellation has been requested. Only the worker run loop catches it; it is
 * never recorded as a failure.
 */
export class DownloadCancelledError extends Error {
  public readonly code = "E-JOB-CANCELLED";
  public readonly details: { jobId: string };

  constructor(jobId: string) {
    super(`download ${jobId} cancelled`);
    this.name = "DownloadCancelledError";
    this.details = { jobId };
  }
}

/** Raised when runtime configuration (download root, settings) is unusable. */
export class ConfigurationError extends Error {
  public readonly code = "E-CONFIG";
  public readonly hint = "check the configured path and its permissions";
  public readonly details: { setting: string; value: string | null };

  constructor(setting: string, value: string | null, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
    this.details = { setting, value };
  }
}

/** Failure reported by a fetch engine while resolving or transferring media. */
export class EngineError extends Error {
  public readonly code = "E-ENGINE";
  public readonly exitCode: number | null;

  constructor(message: string, exitCode: number | null = null, options?: ErrorOptions) {
    super(message, options);
    this.name = "EngineError";
    this.exitCode = exitCode;
  }
}

/** Type guard used by the worker loop to separate cancellation from failure. */
export function isDownloadCancelled(error: unknown): error is DownloadCancelledError {
  return error instanceof DownloadCancelledError;
}

/**
 * Maps an engine failure onto the message shown to users. Known causes get an
 * actionable explanation; anything else is passed through verbatim.
 */
export function friendlyErrorMessage(error: unknown): string {
  const message = (error instanceof Error ? error.message : String(error ?? "")).trim();
  const lowered = message.toLowerCase();

  if (lowered.includes("sign in to confirm you’re not a bot") || lowered.includes("sign in to confirm you're not a bot")) {
    return "YouTube blocked this request and wants verification. Upload a youtube.com cookies.txt file and retry after refreshing.";
  }
  if (lowered.includes("this video is private")) {
    return "This video is private. Ask the uploader for access before downloading.";
  }
  if (lowered.includes("members-only")) {
    return "This video is for channel members only. Sign in with an account that has access.";
  }
  if (lowered.includes("premium")) {
    return "This content requires a paid subscription. Provide cookies from an account with access.";
  }
  if (message) {
    return message;
  }
  return "Download failed due to an unknown error.";
}
