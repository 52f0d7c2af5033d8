import { mkdir } from "node:fs/promises";
import { homedir } from "node:os";
import path from "node:path";

/**
 * Raised when a path derived from caller input would land outside the
 * directory it belongs to (for instance a job id such as `../etc`).
 */
export class PathResolutionError extends Error {
  public readonly code = "E-PATHS-ESCAPE";
  public readonly hint = "keep paths within the configured download root";
  public readonly attemptedPath: string;
  public readonly rootDirectory: string;

  constructor(message: string, attemptedPath: string, rootDirectory: string) {
    super(message);
    this.name = "PathResolutionError";
    this.attemptedPath = attemptedPath;
    this.rootDirectory = rootDirectory;
  }
}

/**
 * Normalises a target path and ensures it stays within the provided root.
 *
 * @throws {PathResolutionError} When the resulting path escapes the root.
 */
export function resolveWithin(rootDir: string, ...segments: string[]): string {
  const absoluteRoot = path.resolve(rootDir);
  const targetPath = path.resolve(absoluteRoot, ...segments);
  const relative = path.relative(absoluteRoot, targetPath);

  if (relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new PathResolutionError("path escapes base directory", targetPath, absoluteRoot);
  }

  return targetPath;
}

/**
 * Working directory owned by a job: a direct child of the download root named
 * after the job id. Ids resolving to the root itself or containing separators
 * are rejected.
 */
export function jobDirectoryPath(downloadRoot: string, jobId: string): string {
  const target = resolveWithin(downloadRoot, jobId);
  if (path.dirname(target) !== path.resolve(downloadRoot)) {
    throw new PathResolutionError("job id must name a single directory", target, path.resolve(downloadRoot));
  }
  return target;
}

/** Expands a leading `~` and resolves the result against the working directory. */
export function expandUserPath(input: string): string {
  const trimmed = input.trim();
  if (trimmed === "~") {
    return homedir();
  }
  if (trimmed.startsWith("~/") || trimmed.startsWith("~\\")) {
    return path.resolve(homedir(), trimmed.slice(2));
  }
  return path.resolve(trimmed);
}

/** Creates {@link directory} (and its parents) and returns it. */
export async function ensureDirectory(directory: string): Promise<string> {
  await mkdir(directory, { recursive: true });
  return directory;
}
