import path from "node:path";

import type { FetchOptions, Postprocessor } from "../engine/types.js";
import type { DownloadJob } from "./job.js";
import type { ProgressReport } from "./types.js";

/** Engine-internal retry count for whole requests and for fragments. */
export const ENGINE_RETRIES = 5;

/** Output name: title truncated to 120 characters, then the source id. */
export const OUTPUT_NAME_TEMPLATE = "%(title).120s [%(id)s].%(ext)s";

export const VIDEO_FORMAT = "bestvideo+bestaudio/best";
export const AUDIO_FORMAT = "bestaudio/best";

const AUDIO_EXTRACTION: Postprocessor = { kind: "extract-audio", codec: "mp3", quality: "192" };

/**
 * Configuration captured when a worker starts a job. Later changes to the
 * manager settings never reach a job that already holds its snapshot.
 */
export interface JobRunSettings {
  readonly jobDirectory: string;
  readonly rateLimitBytesPerSec: number | null;
  /** Cookie file that exists on disk, already resolved by the caller. */
  readonly cookieFile: string | null;
}

/**
 * Builds the engine invocation for {@link job}. An explicit format id wins;
 * otherwise audio jobs extract mp3 from the best audio stream and video jobs
 * merge the best streams into mp4.
 */
export function buildFetchOptions(
  job: DownloadJob,
  settings: JobRunSettings,
  onProgress: (report: ProgressReport) => void,
  signal?: AbortSignal,
): FetchOptions {
  let format: string;
  let postprocessors: Postprocessor[] = [];
  let mergeOutputFormat: string | null = null;

  if (job.formatId) {
    format = job.formatId;
  } else if (job.formatType === "audio") {
    format = AUDIO_FORMAT;
    postprocessors = [AUDIO_EXTRACTION];
  } else {
    format = VIDEO_FORMAT;
    mergeOutputFormat = "mp4";
  }

  return {
    outputTemplate: path.join(settings.jobDirectory, OUTPUT_NAME_TEMPLATE),
    workingDirectory: settings.jobDirectory,
    format,
    postprocessors,
    mergeOutputFormat,
    rateLimitBytesPerSec: settings.rateLimitBytesPerSec,
    cookieFile: settings.cookieFile,
    retries: ENGINE_RETRIES,
    fragmentRetries: ENGINE_RETRIES,
    skipUnavailableFragments: true,
    onProgress,
    signal,
  };
}
