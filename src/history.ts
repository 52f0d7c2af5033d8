import { ACTIVE_STATUSES, type JobSnapshot, type JsonValue } from "./jobs/types.js";

/** Columns of the CSV export, in order. */
export const CSV_COLUMNS = ["id", "title", "filename", "status", "filesize", "progress", "completed", "error"] as const;

export type CsvColumn = (typeof CSV_COLUMNS)[number];

/** Aggregate figures served by `/api/system_stats`. */
export interface HistoryStatistics {
  readonly total_downloads: number;
  readonly active_downloads: number;
  readonly completed_downloads: number;
  readonly failed_downloads: number;
  readonly total_downloaded_bytes: number;
  /** Mean of the non-zero speeds, bytes per second. */
  readonly average_speed: number;
}

function metadataTitle(snapshot: JobSnapshot): JsonValue {
  const title = snapshot.metadata.title;
  return title === undefined ? null : title;
}

/** Quotes a field when it contains a delimiter, a quote or a line break. */
function escapeCsvField(value: JsonValue): string {
  if (value === null) {
    return "";
  }
  const text = typeof value === "object" ? JSON.stringify(value) : String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

function csvRow(snapshot: JobSnapshot): Record<CsvColumn, JsonValue> {
  return {
    id: snapshot.id,
    title: metadataTitle(snapshot),
    filename: snapshot.filename,
    status: snapshot.status,
    filesize: snapshot.filesize,
    progress: snapshot.progress,
    completed: snapshot.completed,
    error: snapshot.error,
  };
}

/** Pretty-printed JSON array of the snapshots. */
export function exportHistoryJson(snapshots: readonly JobSnapshot[]): string {
  return JSON.stringify(snapshots, null, 2);
}

/** CSV with a header row and CRLF line endings. */
export function exportHistoryCsv(snapshots: readonly JobSnapshot[]): string {
  const lines = [CSV_COLUMNS.join(",")];
  for (const snapshot of snapshots) {
    const row = csvRow(snapshot);
    lines.push(CSV_COLUMNS.map((column) => escapeCsvField(row[column])).join(","));
  }
  return `${lines.join("\r\n")}\r\n`;
}

export function aggregateStatistics(snapshots: readonly JobSnapshot[]): HistoryStatistics {
  let active = 0;
  let completed = 0;
  let failed = 0;
  let downloadedBytes = 0;
  const speeds: number[] = [];

  for (const snapshot of snapshots) {
    if (ACTIVE_STATUSES.has(snapshot.status)) {
      active += 1;
    } else if (snapshot.status === "completed") {
      completed += 1;
    } else if (snapshot.status === "failed") {
      failed += 1;
    }
    downloadedBytes += snapshot.downloaded;
    if (snapshot.speed > 0) {
      speeds.push(snapshot.speed);
    }
  }

  const averageSpeed = speeds.length > 0 ? speeds.reduce((sum, speed) => sum + speed, 0) / speeds.length : 0;
  return {
    total_downloads: snapshots.length,
    active_downloads: active,
    completed_downloads: completed,
    failed_downloads: failed,
    total_downloaded_bytes: downloadedBytes,
    average_speed: averageSpeed,
  };
}
