import type { ProgressReport } from "../jobs/types.js";

/** Post-processing step applied by the engine once bytes are on disk. */
export interface ExtractAudioPostprocessor {
  readonly kind: "extract-audio";
  readonly codec: string;
  /** Codec-specific quality, e.g. a bitrate in kbit/s for mp3. */
  readonly quality: string;
}

export type Postprocessor = ExtractAudioPostprocessor;

/**
 * Options passed to {@link FetchEngine.fetch}. Retries are engine-internal:
 * the manager forwards the counts and never retries transfers itself.
 */
export interface FetchOptions {
  /** Output path template, expanded by the engine per media entry. */
  readonly outputTemplate: string;
  /** Directory owned by the job; the engine writes nothing outside of it. */
  readonly workingDirectory: string;
  /** Format selector understood by the engine. */
  readonly format: string;
  readonly postprocessors: readonly Postprocessor[];
  /** Container used when separate video and audio streams are merged. */
  readonly mergeOutputFormat: string | null;
  readonly rateLimitBytesPerSec: number | null;
  readonly cookieFile: string | null;
  readonly retries: number;
  readonly fragmentRetries: number;
  readonly skipUnavailableFragments: boolean;
  /**
   * Synchronous progress hook. When it throws, the engine must abort the
   * transfer and reject with the thrown error.
   */
  readonly onProgress: (report: ProgressReport) => void;
  /** Aborted when the job is cleared while the engine runs. */
  readonly signal?: AbortSignal;
}

/** Descriptive fields resolved before the transfer. */
export interface MediaInfo {
  readonly title?: string | null;
  readonly uploader?: string | null;
  readonly duration?: number | null;
  readonly view_count?: number | null;
  readonly thumbnail?: string | null;
  readonly ext?: string | null;
  readonly webpage_url?: string | null;
}

export interface ExtractInfoOptions {
  readonly cookieFile?: string | null;
  readonly signal?: AbortSignal;
}

/** One downloadable rendition listed by a preview. */
export interface MediaFormat {
  readonly format_id: string | null;
  readonly format_note: string | null;
  readonly resolution: string | null;
  readonly ext: string | null;
  readonly filesize: number | null;
  readonly vcodec: string | null;
  readonly acodec: string | null;
  readonly fps: number | null;
  readonly abr: number | null;
}

export interface PlaylistEntry {
  readonly title: string | null;
  readonly url: string | null;
}

export interface SubtitleTrack {
  readonly ext: string | null;
  readonly url: string | null;
  readonly name: string | null;
}

/**
 * Everything a client needs to pick a format before submitting a job.
 * Playlist entries are listed flat, without resolving each one.
 */
export interface MediaPreview {
  readonly title: string | null;
  readonly uploader: string | null;
  readonly duration: number | null;
  readonly view_count: number | null;
  readonly description: string | null;
  readonly extractor_key: string | null;
  readonly thumbnail: string | null;
  /** Thumbnail URLs in the order the engine listed them. */
  readonly thumbnails: readonly string[];
  readonly formats: readonly MediaFormat[];
  readonly entries: readonly PlaylistEntry[];
  /** Subtitle tracks keyed by language code. */
  readonly subtitles: Readonly<Record<string, readonly SubtitleTrack[]>>;
}

export interface SubtitleOptions {
  readonly language: string;
  /** Directory the subtitle files are written to. */
  readonly directory: string;
  readonly cookieFile?: string | null;
  readonly signal?: AbortSignal;
}

/**
 * External capability that resolves a source URL and writes its media to
 * disk. Calls may take minutes; the manager only ever awaits them inside a
 * worker slot.
 */
export interface FetchEngine {
  /** Resolves metadata without downloading. `null` when nothing was found. */
  extractInfo(url: string, options?: ExtractInfoOptions): Promise<MediaInfo | null>;
  /** Downloads {@link url}, reporting progress through `options.onProgress`. */
  fetch(url: string, options: FetchOptions): Promise<void>;
  /** Detailed description of {@link url} (formats, playlist entries, subtitles). `null` when nothing was found. */
  preview(url: string, options?: ExtractInfoOptions): Promise<MediaPreview | null>;
  /** Writes the subtitles of {@link url} without the media. Resolves with the title, when known. */
  fetchSubtitles(url: string, options: SubtitleOptions): Promise<string | null>;
  /** Names of the site extractors the engine ships. */
  listExtractors(options?: { readonly signal?: AbortSignal }): Promise<string[]>;
}
