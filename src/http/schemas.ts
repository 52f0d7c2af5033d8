import { z } from "zod";

import { FORMAT_KINDS, type FormatKind } from "../jobs/types.js";

/** Most URLs accepted by one drag-and-drop request. */
export const MAX_BATCH_URLS = 10;

const requiredText = (field: string) =>
  z.string({ required_error: `${field} is required.`, invalid_type_error: `${field} must be a string.` }).trim().min(1, `${field} is required.`);

/** Unknown kinds fall back to video. */
const formatKind = z
  .unknown()
  .transform((value): FormatKind => {
    const lower = typeof value === "string" ? value.trim().toLowerCase() : "video";
    return FORMAT_KINDS.find((kind) => kind === lower) ?? "video";
  });

/** Non-string entries are coerced, blanks dropped, an empty list becomes `null`. */
const playlistUrls = z
  .unknown()
  .transform((value) => {
    if (!Array.isArray(value)) {
      return null;
    }
    const cleaned = value.map((entry) => String(entry).trim()).filter((entry) => entry.length > 0);
    return cleaned.length > 0 ? cleaned : null;
  });

export const StartDownloadSchema = z.object({
  url: requiredText("url"),
  format: formatKind,
  format_id: z.string().trim().min(1).nullish().catch(null),
  playlist_urls: playlistUrls,
});

export const DownloadIdSchema = z.object({
  download_id: requiredText("download_id"),
});

export const ClearHistorySchema = z.object({
  download_id: z.string().trim().min(1).nullish().catch(null),
});

export const DragAndDropSchema = z.object({
  urls: z
    .array(z.unknown(), { required_error: "urls is required.", invalid_type_error: "urls must be a non-empty list" })
    .min(1, "urls must be a non-empty list"),
});

/** KB/s as an integer; numeric strings are accepted and fractions truncated. */
export const SpeedLimitSchema = z.object({
  speed_limit: z
    .unknown()
    .refine((value) => value !== undefined && value !== null && value !== "", "speed_limit is required.")
    .transform((value, ctx) => {
      if (typeof value === "number" && Number.isFinite(value)) {
        return Math.trunc(value);
      }
      if (typeof value === "string" && /^[-+]?\d+$/.test(value.trim())) {
        return Number.parseInt(value.trim(), 10);
      }
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "speed_limit must be numeric" });
      return z.NEVER;
    }),
});

/**
 * `path` is optional: a missing or empty value means "open a picker", which
 * this server cannot do.
 */
export const SelectDirectorySchema = z.object({
  path: z.unknown().optional(),
});

export const VideoInfoSchema = z.object({
  url: requiredText("url"),
});

/** `language` defaults to English when missing or blank. */
export const DownloadSubtitlesSchema = z.object({
  url: requiredText("url"),
  language: z.string().trim().min(1).catch("en"),
});

export type StartDownloadInput = z.infer<typeof StartDownloadSchema>;
