import { spawn } from "node:child_process";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import { z } from "zod";

import { EngineError } from "../jobs/errors.js";
import type { StructuredLogger } from "../logger.js";
import { FILEPATH_TEMPLATE, PROGRESS_TEMPLATE, TITLE_TEMPLATE, parseEngineLine } from "./progressLine.js";
import type {
  ExtractInfoOptions,
  FetchEngine,
  FetchOptions,
  MediaInfo,
  MediaPreview,
  PlaylistEntry,
  SubtitleOptions,
  SubtitleTrack,
} from "./types.js";

/** Subset of a child process the adapter relies on. */
export interface EngineProcess {
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  on(event: "error", listener: (error: Error) => void): this;
}

export type EngineSpawner = (command: string, args: readonly string[], options: { cwd?: string }) => EngineProcess;

export interface YtDlpEngineOptions {
  /** Executable name or path. Defaults to `yt-dlp` on the PATH. */
  readonly binary?: string;
  readonly logger?: StructuredLogger;
  /** Replaces `child_process.spawn`; tests hand in scripted processes. */
  readonly spawner?: EngineSpawner;
}

const defaultSpawner: EngineSpawner = (command, args, options) =>
  spawn(command, [...args], { cwd: options.cwd, stdio: ["ignore", "pipe", "pipe"] });

const nullableString = z.string().nullish();
const nullableNumber = z.number().nullish();

/** Fields of `--dump-single-json` the service keeps; everything else is dropped. */
const mediaInfoSchema = z
  .object({
    title: nullableString,
    uploader: nullableString,
    duration: nullableNumber,
    view_count: nullableNumber,
    thumbnail: nullableString,
    ext: nullableString,
    webpage_url: nullableString,
  })
  .passthrough();

/** Unusable values degrade to `null` instead of failing the whole preview. */
const looseString = z.string().nullish().catch(null);
const looseNumber = z.number().nullish().catch(null);

const formatSchema = z
  .object({
    format_id: looseString,
    format_note: looseString,
    resolution: looseString,
    ext: looseString,
    filesize: looseNumber,
    vcodec: looseString,
    acodec: looseString,
    fps: looseNumber,
    abr: looseNumber,
  })
  .passthrough();

const subtitleTrackSchema = z.object({ ext: looseString, url: looseString, name: looseString }).passthrough();

const mediaPreviewSchema = z
  .object({
    title: looseString,
    uploader: looseString,
    duration: looseNumber,
    view_count: looseNumber,
    description: looseString,
    extractor_key: looseString,
    thumbnail: looseString,
    thumbnails: z.array(z.object({ url: looseString }).passthrough()).nullish().catch(null),
    formats: z.array(formatSchema).nullish().catch(null),
    entries: z
      .array(z.object({ title: looseString, url: looseString, webpage_url: looseString }).passthrough())
      .nullish()
      .catch(null),
    subtitles: z.record(z.array(subtitleTrackSchema)).nullish().catch(null),
  })
  .passthrough();

type RawPreview = z.output<typeof mediaPreviewSchema>;

function toPreview(raw: RawPreview): MediaPreview {
  const thumbnails: string[] = [];
  for (const thumb of raw.thumbnails ?? []) {
    if (thumb.url) {
      thumbnails.push(thumb.url);
    }
  }
  const entries: PlaylistEntry[] = (raw.entries ?? []).map((entry) => ({
    title: entry.title ?? null,
    url: entry.webpage_url ?? entry.url ?? null,
  }));
  const subtitles: Record<string, SubtitleTrack[]> = {};
  for (const [language, tracks] of Object.entries(raw.subtitles ?? {})) {
    subtitles[language] = tracks.map((track) => ({
      ext: track.ext ?? null,
      url: track.url ?? null,
      name: track.name ?? null,
    }));
  }
  return {
    title: raw.title ?? null,
    uploader: raw.uploader ?? null,
    duration: raw.duration ?? null,
    view_count: raw.view_count ?? null,
    description: raw.description ?? null,
    extractor_key: raw.extractor_key ?? null,
    thumbnail: raw.thumbnail ?? null,
    thumbnails,
    formats: (raw.formats ?? []).map((format) => ({
      format_id: format.format_id ?? null,
      format_note: format.format_note ?? null,
      resolution: format.resolution ?? null,
      ext: format.ext ?? null,
      filesize: format.filesize ?? null,
      vcodec: format.vcodec ?? null,
      acodec: format.acodec ?? null,
      fps: format.fps ?? null,
      abr: format.abr ?? null,
    })),
    entries,
    subtitles,
  };
}

/** Command-line arguments for a download run. */
export function buildFetchArgs(url: string, options: FetchOptions): string[] {
  const args = [
    "--newline",
    "--progress",
    "--no-playlist",
    "--no-simulate",
    "--progress-template",
    `download:${PROGRESS_TEMPLATE}`,
    "--print",
    `after_move:${FILEPATH_TEMPLATE}`,
    "-P",
    options.workingDirectory,
    "-o",
    options.outputTemplate,
    "-f",
    options.format,
    "--retries",
    String(options.retries),
    "--fragment-retries",
    String(options.fragmentRetries),
  ];
  if (options.skipUnavailableFragments) {
    args.push("--skip-unavailable-fragments");
  }
  if (options.mergeOutputFormat) {
    args.push("--merge-output-format", options.mergeOutputFormat);
  }
  if (options.rateLimitBytesPerSec !== null) {
    args.push("--limit-rate", String(options.rateLimitBytesPerSec));
  }
  if (options.cookieFile) {
    args.push("--cookies", options.cookieFile);
  }
  for (const step of options.postprocessors) {
    if (step.kind === "extract-audio") {
      args.push("-x", "--audio-format", step.codec, "--audio-quality", step.quality);
    }
  }
  args.push("--", url);
  return args;
}

/** Command-line arguments for a metadata lookup. */
export function buildInfoArgs(url: string, options: ExtractInfoOptions = {}): string[] {
  const args = ["--dump-single-json", "--skip-download", "--no-playlist"];
  if (options.cookieFile) {
    args.push("--cookies", options.cookieFile);
  }
  args.push("--", url);
  return args;
}

/** Command-line arguments for a preview; playlists are listed without resolving their entries. */
export function buildPreviewArgs(url: string, options: ExtractInfoOptions = {}): string[] {
  const args = ["--dump-single-json", "--skip-download", "--flat-playlist"];
  if (options.cookieFile) {
    args.push("--cookies", options.cookieFile);
  }
  args.push("--", url);
  return args;
}

/** Command-line arguments writing the subtitles of one video and printing its title. */
export function buildSubtitleArgs(url: string, options: SubtitleOptions): string[] {
  const args = [
    "--skip-download",
    "--no-simulate",
    "--no-playlist",
    "--write-subs",
    "--sub-langs",
    options.language,
    "--print",
    TITLE_TEMPLATE,
    "-P",
    options.directory,
    "-o",
    "%(title)s.%(ext)s",
  ];
  if (options.cookieFile) {
    args.push("--cookies", options.cookieFile);
  }
  args.push("--", url);
  return args;
}

interface RunOptions {
  readonly cwd?: string;
  readonly signal?: AbortSignal;
  /** Invoked for each stdout line. Throwing interrupts the process. */
  readonly onLine?: (line: string) => void;
}

/**
 * {@link FetchEngine} backed by the `yt-dlp` executable. Progress is read from
 * a tab-separated template line per update; the final path comes from an
 * `after_move` print.
 */
export class YtDlpEngine implements FetchEngine {
  private readonly binary: string;
  private readonly logger: StructuredLogger | null;
  private readonly spawner: EngineSpawner;

  constructor(options: YtDlpEngineOptions = {}) {
    this.binary = options.binary ?? "yt-dlp";
    this.logger = options.logger ?? null;
    this.spawner = options.spawner ?? defaultSpawner;
  }

  async extractInfo(url: string, options: ExtractInfoOptions = {}): Promise<MediaInfo | null> {
    const decoded = await this.readJson(buildInfoArgs(url, options), options.signal);
    if (decoded === undefined) {
      return null;
    }
    const parsed = mediaInfoSchema.safeParse(decoded);
    if (!parsed.success) {
      return null;
    }
    const { title, uploader, duration, view_count, thumbnail, ext, webpage_url } = parsed.data;
    return { title, uploader, duration, view_count, thumbnail, ext, webpage_url };
  }

  async preview(url: string, options: ExtractInfoOptions = {}): Promise<MediaPreview | null> {
    const decoded = await this.readJson(buildPreviewArgs(url, options), options.signal);
    if (decoded === undefined) {
      return null;
    }
    const parsed = mediaPreviewSchema.safeParse(decoded);
    return parsed.success ? toPreview(parsed.data) : null;
  }

  async fetchSubtitles(url: string, options: SubtitleOptions): Promise<string | null> {
    let title: string | null = null;
    await this.run(buildSubtitleArgs(url, options), {
      cwd: options.directory,
      signal: options.signal,
      onLine: (line) => {
        const parsed = parseEngineLine(line);
        if (parsed.kind === "title" && title === null) {
          title = parsed.title;
        }
      },
    });
    return title;
  }

  async listExtractors(options: { readonly signal?: AbortSignal } = {}): Promise<string[]> {
    const names: string[] = [];
    await this.run(["--list-extractors"], {
      signal: options.signal,
      onLine: (line) => {
        const name = line.replace(/\s+\(CURRENTLY BROKEN\)$/, "").trim();
        if (name.length > 0) {
          names.push(name);
        }
      },
    });
    return names;
  }

  async fetch(url: string, options: FetchOptions): Promise<void> {
    await this.run(buildFetchArgs(url, options), {
      cwd: options.workingDirectory,
      signal: options.signal,
      onLine: (line) => {
        const parsed = parseEngineLine(line);
        if (parsed.kind === "progress") {
          options.onProgress(parsed.report);
        } else if (parsed.kind === "filepath") {
          options.onProgress({ status: "finished", filename: parsed.path });
        }
      },
    });
  }

  /** Runs {@link args} and decodes stdout as one JSON document; `undefined` when nothing was printed. */
  private async readJson(args: string[], signal: AbortSignal | undefined): Promise<unknown> {
    const chunks: string[] = [];
    await this.run(args, {
      signal,
      onLine: (line) => {
        chunks.push(line);
      },
    });

    const raw = chunks.join("\n").trim();
    if (raw.length === 0) {
      return undefined;
    }
    try {
      const decoded: unknown = JSON.parse(raw);
      return decoded;
    } catch (error) {
      throw new EngineError("yt-dlp returned malformed metadata", null, { cause: error });
    }
  }

  /**
   * Spawns the binary and settles once it exits. A throwing line handler or an
   * aborted signal sends `SIGINT` and rejects with the corresponding error
   * once the process is gone.
   */
  private run(args: string[], options: RunOptions): Promise<void> {
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }

    this.logger?.debug("engine_spawn", { binary: this.binary, args });
    return new Promise<void>((resolve, reject) => {
      let child: EngineProcess;
      try {
        child = this.spawner(this.binary, args, { cwd: options.cwd });
      } catch (error) {
        reject(new EngineError(`Could not start ${this.binary}`, null, { cause: error }));
        return;
      }

      let interruption: unknown = null;
      let lastError: string | null = null;
      let settled = false;

      const interrupt = (reason: unknown): void => {
        if (interruption !== null) {
          return;
        }
        interruption = reason;
        child.kill("SIGINT");
      };
      const onAbort = (): void => {
        if (signal) {
          interrupt(abortReason(signal));
        }
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      const finish = (error: unknown): void => {
        if (settled) {
          return;
        }
        settled = true;
        signal?.removeEventListener("abort", onAbort);
        if (error === null) {
          resolve();
        } else {
          reject(error);
        }
      };

      createInterface({ input: child.stdout }).on("line", (line) => {
        if (interruption !== null) {
          return;
        }
        try {
          options.onLine?.(line);
        } catch (error) {
          interrupt(error);
        }
      });

      createInterface({ input: child.stderr }).on("line", (line) => {
        const parsed = parseEngineLine(line);
        if (parsed.kind === "error") {
          lastError = parsed.message;
        }
      });

      child.on("error", (error) => {
        finish(new EngineError(`Could not start ${this.binary}: ${error.message}`, null, { cause: error }));
      });

      child.on("close", (code, exitSignal) => {
        if (interruption !== null) {
          finish(interruption);
          return;
        }
        if (code === 0) {
          finish(null);
          return;
        }
        const message = lastError ?? `${this.binary} exited with ${code === null ? `signal ${exitSignal}` : `code ${code}`}`;
        this.logger?.debug("engine_exit_failure", { code, signal: exitSignal, message });
        finish(new EngineError(message, code));
      });
    });
  }
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new EngineError("Engine run aborted");
}
