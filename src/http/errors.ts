/** Stable codes attached to HTTP failures surfaced by the API. */
export type HttpErrorCode = "E-HTTP-BAD-REQUEST" | "E-HTTP-NOT-FOUND" | "E-HTTP-TOO-LARGE" | "E-HTTP-UNSUPPORTED";

const CODE_BY_STATUS: Record<number, HttpErrorCode> = {
  400: "E-HTTP-BAD-REQUEST",
  404: "E-HTTP-NOT-FOUND",
  413: "E-HTTP-TOO-LARGE",
  501: "E-HTTP-UNSUPPORTED",
};

/**
 * Failure that maps one-to-one onto an HTTP response. `message` is what the
 * client sees under `error`, except for 404s which always read
 * "Resource not found".
 */
export class HttpError extends Error {
  public readonly status: number;
  public readonly code: HttpErrorCode;
  /** Extra fields merged into the JSON error body. */
  public readonly details: Readonly<Record<string, string>>;

  constructor(status: number, message: string, details: Record<string, string> = {}) {
    super(message);
    this.name = "HttpError";
    this.status = status;
    this.code = CODE_BY_STATUS[status] ?? "E-HTTP-BAD-REQUEST";
    this.details = details;
  }
}

export function badRequest(message: string): HttpError {
  return new HttpError(400, message);
}

export function notFound(message = "Resource not found"): HttpError {
  return new HttpError(404, message);
}
