import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";

/** Placeholder inserted when a sensitive value is redacted. */
const REDACTION_TOKEN = "[REDACTED]";

const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);
const REDACTION_DISABLE_TOKENS = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Keys whose values are redacted when `MEDIAFERRY_LOG_REDACT=on`. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "proxy-authorization",
  "cookie",
  "set-cookie",
  "cookie_file",
  "cookiefile",
  "token",
  "api_key",
]);

/**
 * Parses the `MEDIAFERRY_LOG_REDACT` directive. The value is a comma separated
 * list mixing toggles (`on`, `off`, ...) and literal substrings that must be
 * scrubbed from string payloads. Providing substrings without a toggle enables
 * redaction.
 */
export function parseRedactionDirectives(raw: string | undefined): {
  enabled: boolean;
  tokens: Array<string>;
} {
  if (!raw) {
    return { enabled: false, tokens: [] };
  }

  const directives = raw
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  let enabled: boolean | undefined;
  const tokens: Array<string> = [];
  for (const directive of directives) {
    const normalised = directive.toLowerCase();
    if (REDACTION_DISABLE_TOKENS.has(normalised)) {
      enabled = false;
      continue;
    }
    if (REDACTION_ENABLE_TOKENS.has(normalised)) {
      enabled = true;
      continue;
    }
    tokens.push(directive);
  }

  return { enabled: enabled ?? tokens.length > 0, tokens: Array.from(new Set(tokens)) };
}

/** Default maximum size (in bytes) of the mirrored log file before rotation. */
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024; // 5 MiB

/** Default number of log files retained during rotation. */
const DEFAULT_MAX_FILE_COUNT = 5;

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_WEIGHT: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Entries below this level are dropped. Defaults to `debug`. */
  readonly level?: LogLevel;
  /** Maximum size in bytes before the active log file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of log files to retain (including the active one). */
  readonly maxFileCount?: number;
  /** Literal substrings or patterns scrubbed from string payload values. */
  readonly redactSecrets?: Array<string | RegExp>;
  /**
   * Explicit toggle for structured payload redaction. Falls back to the
   * `MEDIAFERRY_LOG_REDACT` directive when omitted.
   */
  readonly redactionEnabled?: boolean;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Structured logger that emits JSON lines on stdout and optionally mirrors them
 * to a file. File writes are queued sequentially to keep their order.
 */
export class StructuredLogger {
  private readonly logFile: string | null;
  private readonly minWeight: number;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly redactSecrets: Array<string | RegExp>;
  private readonly redactionEnabled: boolean;
  private readonly entryListener?: (entry: LogEntry) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  /** Set once the directory hosting {@link logFile} exists. */
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? null;
    this.minWeight = LEVEL_WEIGHT[options.level ?? "debug"];
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    const directives = parseRedactionDirectives(process.env.MEDIAFERRY_LOG_REDACT);
    this.redactSecrets = [...new Set<string | RegExp>([...directives.tokens, ...(options.redactSecrets ?? [])])];
    this.redactionEnabled = options.redactionEnabled ?? directives.enabled;
    this.entryListener = options.onEntry;
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  /** Waits until every queued file write has been attempted. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (LEVEL_WEIGHT[level] < this.minWeight) {
      return;
    }

    const safePayload = payload !== undefined ? this.redact(payload) : undefined;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(safePayload !== undefined ? { payload: safePayload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    process.stdout.write(line);
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }

    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        await this.ensureLogDestination(logFile);
        await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
        await appendFile(logFile, line, "utf8");
      } catch (err) {
        const errorEntry: LogEntry = {
          timestamp: new Date().toISOString(),
          level: "error",
          message: "log_file_write_failed",
          payload: err instanceof Error ? { message: err.message } : { error: String(err) },
        };
        process.stderr.write(`${JSON.stringify(errorEntry)}\n`);
        // Retry directory creation on the next write.
        this.logDirectoryReady = false;
      }
    });
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  /**
   * Rotates the active file when appending {@link pendingBytes} would exceed
   * the size limit. At most {@link maxFileCount} files are kept.
   */
  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    let currentSize = 0;
    try {
      currentSize = (await stat(logFile)).size;
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return;
      }
      throw error;
    }

    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    if (this.maxFileCount === 1) {
      await rm(logFile, { force: true });
      return;
    }

    await rm(`${logFile}.${this.maxFileCount - 1}`, { force: true });
    for (let index = this.maxFileCount - 2; index >= 1; index -= 1) {
      await this.renameIfPresent(`${logFile}.${index}`, `${logFile}.${index + 1}`);
    }
    await this.renameIfPresent(logFile, `${logFile}.1`);
  }

  private async renameIfPresent(source: string, target: string): Promise<void> {
    try {
      await rename(source, target);
    } catch (error) {
      if (!isErrnoException(error) || error.code !== "ENOENT") {
        throw error;
      }
    }
  }

  private redact(value: unknown): unknown {
    if (typeof value === "string") {
      return this.scrubSecrets(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.redact(item));
    }
    if (value instanceof Error) {
      return { name: value.name, message: this.scrubSecrets(value.message) };
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = this.redactionEnabled && SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.redact(entry);
      }
      return result;
    }
    return value;
  }

  private scrubSecrets(value: string): string {
    let sanitized = value;
    for (const pattern of this.redactSecrets) {
      if (typeof pattern === "string" && pattern.length > 0) {
        sanitized = sanitized.split(pattern).join(REDACTION_TOKEN);
      } else if (pattern instanceof RegExp) {
        sanitized = sanitized.replace(pattern, REDACTION_TOKEN);
      }
    }
    return sanitized;
  }
}
