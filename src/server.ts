import process from "node:process";
import { pathToFileURL } from "node:url";

import { loadSettings, type Settings } from "./config/settings.js";
import { YtDlpEngine } from "./engine/ytDlp.js";
import type { FetchEngine } from "./engine/types.js";
import { ApiRouter } from "./http/routes.js";
import { ClientSessions } from "./http/sessions.js";
import { startHttpServer, type HttpServerHandle } from "./httpServer.js";
import { ConfigurationError } from "./jobs/errors.js";
import { DownloadManager } from "./jobs/manager.js";
import { StructuredLogger } from "./logger.js";
import { expandUserPath } from "./paths.js";

export interface Runtime {
  readonly manager: DownloadManager;
  readonly http: HttpServerHandle;
  readonly logger: StructuredLogger;
  /** Stops accepting requests, winds the jobs down and flushes the log. */
  stop(): Promise<void>;
}

export interface StartRuntimeOptions {
  readonly settings: Settings;
  readonly logger?: StructuredLogger;
  /** Replaces the yt-dlp adapter. */
  readonly engine?: FetchEngine;
}

/**
 * Applies the configured download folder, falling back to the local
 * `./downloads` directory when the preferred one cannot be created. Returns
 * whether the configured folder was used.
 */
async function applyDownloadRoot(manager: DownloadManager, settings: Settings, logger: StructuredLogger): Promise<boolean> {
  try {
    await manager.setDownloadRoot(settings.downloadFolder);
    return true;
  } catch (error) {
    if (!(error instanceof ConfigurationError)) {
      throw error;
    }
    logger.warn("download_root_fallback", {
      requested: settings.downloadFolder,
      fallback: settings.fallbackDownloadFolder,
      error,
    });
    await manager.setDownloadRoot(settings.fallbackDownloadFolder);
    return false;
  }
}

/** Wires the manager, the API and the HTTP listener together. */
export async function startRuntime(options: StartRuntimeOptions): Promise<Runtime> {
  const { settings } = options;
  const logger = options.logger ?? new StructuredLogger({ logFile: settings.logFile, level: settings.logLevel });
  const engine = options.engine ?? new YtDlpEngine({ binary: settings.ytDlpPath, logger });

  const manager = new DownloadManager({
    downloadRoot: expandUserPath(settings.fallbackDownloadFolder),
    engine,
    maxWorkers: settings.maxDownloads,
    retentionHours: settings.retentionHours,
    defaultCookieFile: settings.cookieFile ? expandUserPath(settings.cookieFile) : null,
    logger,
  });
  const explicitFolder = process.env.MEDIAFERRY_DOWNLOAD_FOLDER?.trim();
  const usedConfigured = await applyDownloadRoot(manager, settings, logger);

  const router = new ApiRouter({
    manager,
    engine,
    sessions: new ClientSessions(),
    logger,
    maxParallelDownloads: settings.maxDownloads,
    directorySelected: usedConfigured && Boolean(explicitFolder),
  });

  const http = await startHttpServer(
    { router, logger, cleanupInterval: settings.cleanupInterval },
    settings.http,
  );

  logger.info("runtime_started", {
    download_root: manager.getDownloadRoot(),
    max_downloads: settings.maxDownloads,
    retention_hours: settings.retentionHours,
    port: http.port,
  });

  let stopping: Promise<void> | null = null;
  const stop = (): Promise<void> => {
    if (!stopping) {
      stopping = (async () => {
        await http.close();
        await manager.shutdown();
        logger.info("runtime_stopped");
        await logger.flush();
      })();
    }
    return stopping;
  };

  return { manager, http, logger, stop };
}

async function main(): Promise<void> {
  const settings = loadSettings();
  const runtime = await startRuntime({ settings });
  const { logger } = runtime;

  const onSignal = (signal: NodeJS.Signals): void => {
    logger.warn("shutdown_signal", { signal });
    runtime.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error("shutdown_failed", { error });
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
}

const isMain = process.argv[1] ? pathToFileURL(process.argv[1]).href === import.meta.url : false;

if (isMain) {
  main().catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
    process.exit(1);
  });
}
