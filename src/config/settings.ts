import { z } from "zod";

import { LOG_LEVELS } from "../logger.js";
import { readInt, readOptionalEnum, readOptionalString, readString } from "./env.js";

export const DEFAULT_DOWNLOAD_FOLDER = "~/Downloads";
/** Used when the preferred folder cannot be created (read-only home, containers). */
export const FALLBACK_DOWNLOAD_FOLDER = "./downloads";

const settingsSchema = z
  .object({
    downloadFolder: z.string().min(1),
    fallbackDownloadFolder: z.string().min(1),
    maxDownloads: z.number().int().min(1).max(64),
    retentionHours: z.number().int().min(1),
    cleanupInterval: z.number().int().min(1),
    http: z
      .object({
        host: z.string().min(1),
        port: z.number().int().min(0).max(65_535),
      })
      .strict(),
    logFile: z.string().min(1).nullable(),
    logLevel: z.enum(LOG_LEVELS),
    ytDlpPath: z.string().min(1),
    cookieFile: z.string().min(1).nullable(),
  })
  .strict();

/** Validated service configuration. */
export type Settings = z.infer<typeof settingsSchema>;

/**
 * Assembles the settings from `MEDIAFERRY_*` variables. Garbage numeric values
 * fall back to their defaults; the assembled object is validated once more so
 * a bad default can never slip through.
 */
export function loadSettings(): Settings {
  return settingsSchema.parse({
    downloadFolder: readString("MEDIAFERRY_DOWNLOAD_FOLDER", DEFAULT_DOWNLOAD_FOLDER),
    fallbackDownloadFolder: FALLBACK_DOWNLOAD_FOLDER,
    maxDownloads: readInt("MEDIAFERRY_MAX_DOWNLOADS", 4, { min: 1, max: 64 }),
    retentionHours: readInt("MEDIAFERRY_JOB_RETENTION_HOURS", 24, { min: 1 }),
    cleanupInterval: readInt("MEDIAFERRY_CLEANUP_INTERVAL", 20, { min: 1 }),
    http: {
      host: readString("MEDIAFERRY_HTTP_HOST", "127.0.0.1"),
      port: readInt("MEDIAFERRY_HTTP_PORT", 5000, { min: 0, max: 65_535 }),
    },
    logFile: readOptionalString("MEDIAFERRY_LOG_FILE") ?? null,
    logLevel: readOptionalEnum("MEDIAFERRY_LOG_LEVEL", LOG_LEVELS) ?? "info",
    ytDlpPath: readString("MEDIAFERRY_YTDLP_PATH", "yt-dlp"),
    cookieFile: readOptionalString("MEDIAFERRY_COOKIE_FILE") ?? null,
  });
}
