import path from "node:path";

import type { ProgressReport } from "../jobs/types.js";

/** Prefix marking a progress line emitted through `--progress-template`. */
export const PROGRESS_PREFIX = "MFPROG";
/** Prefix marking the final file path emitted through `--print after_move:`. */
export const FILEPATH_PREFIX = "MFPATH";
/** Prefix marking the title printed by a subtitle-only run. */
export const TITLE_PREFIX = "MFTITLE";

const PROGRESS_FIELDS = [
  "progress.status",
  "progress.downloaded_bytes",
  "progress.total_bytes",
  "progress.total_bytes_estimate",
  "progress.speed",
  "progress.eta",
  "progress.filename",
] as const;

/** Template passed to `--progress-template download:`. */
export const PROGRESS_TEMPLATE = [PROGRESS_PREFIX, ...PROGRESS_FIELDS.map((field) => `%(${field})s`)].join("\t");

/** Template passed to `--print after_move:`. */
export const FILEPATH_TEMPLATE = `${FILEPATH_PREFIX}\t%(filepath)s`;

/** Template passed to `--print` by a subtitle-only run. */
export const TITLE_TEMPLATE = `${TITLE_PREFIX}\t%(title)s`;

/** Line classified by {@link parseEngineLine}. */
export type EngineLine =
  | { readonly kind: "progress"; readonly report: ProgressReport }
  | { readonly kind: "filepath"; readonly path: string }
  | { readonly kind: "title"; readonly title: string }
  | { readonly kind: "error"; readonly message: string }
  | { readonly kind: "other" };

/** yt-dlp prints `NA` (or `None`) for fields it does not know yet. */
function parseNumber(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const trimmed = raw.trim();
  if (trimmed.length === 0 || trimmed === "NA" || trimmed === "None") {
    return undefined;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

function parseText(raw: string | undefined): string | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 || trimmed === "NA" ? undefined : trimmed;
}

/**
 * Classifies one output line of the engine. Only `downloading` progress lines
 * become reports; per-stream `finished` lines are ignored because the
 * `after_move` path line marks the real end of an entry.
 */
export function parseEngineLine(line: string): EngineLine {
  const text = line.replace(/\r$/, "");

  if (text.startsWith(`${PROGRESS_PREFIX}\t`)) {
    const [, status, downloaded, total, estimate, speed, eta, filename] = text.split("\t");
    if (status !== "downloading") {
      return { kind: "other" };
    }
    const file = parseText(filename);
    return {
      kind: "progress",
      report: {
        status: "downloading",
        filename: file === undefined ? undefined : path.basename(file),
        downloadedBytes: parseNumber(downloaded),
        totalBytes: parseNumber(total),
        totalBytesEstimate: parseNumber(estimate),
        speed: parseNumber(speed),
        eta: parseNumber(eta),
      },
    };
  }

  if (text.startsWith(`${FILEPATH_PREFIX}\t`)) {
    const filePath = text.slice(FILEPATH_PREFIX.length + 1).trim();
    return filePath.length > 0 ? { kind: "filepath", path: filePath } : { kind: "other" };
  }

  if (text.startsWith(`${TITLE_PREFIX}\t`)) {
    const title = parseText(text.slice(TITLE_PREFIX.length + 1));
    return title === undefined ? { kind: "other" } : { kind: "title", title };
  }

  const errorMatch = /^ERROR:\s*(.*)$/.exec(text);
  if (errorMatch) {
    return { kind: "error", message: errorMatch[1].trim() };
  }

  return { kind: "other" };
}
