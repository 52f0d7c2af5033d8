import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { StructuredLogger, parseRedactionDirectives, type LogEntry } from "../src/logger.js";

describe("StructuredLogger", () => {
  it("rotates the log file when the configured size is exceeded", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "logger-"));
    const logFile = path.join(directory, "mediaferry.log");

    try {
      const logger = new StructuredLogger({ logFile, maxFileSizeBytes: 256, maxFileCount: 3 });

      for (let index = 0; index < 6; index += 1) {
        logger.info("rotation_test_entry", { index, payload: "x".repeat(120) });
      }
      await logger.flush();

      const files = (await readdir(directory)).sort();
      expect(files).to.deep.equal(["mediaferry.log", "mediaferry.log.1", "mediaferry.log.2"]);

      const archived = await readFile(path.join(directory, "mediaferry.log.1"), "utf8");
      expect(archived).to.contain("rotation_test_entry");
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("creates the directory of the mirrored file", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "logger-"));
    const logFile = path.join(directory, "nested", "service.log");

    try {
      const logger = new StructuredLogger({ logFile });
      logger.warn("job_cleanup_failed", { job_id: "job-1" });
      await logger.flush();

      const [line] = (await readFile(logFile, "utf8")).trim().split("\n");
      const parsed: unknown = JSON.parse(line);
      expect(parsed).to.include({ level: "warn", message: "job_cleanup_failed" });
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("drops entries below the configured level", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ level: "warn", onEntry: (entry) => entries.push(entry) });

    logger.debug("noise");
    logger.info("noise");
    logger.warn("kept");
    logger.error("kept_too");

    expect(entries.map((entry) => `${entry.level}:${entry.message}`)).to.deep.equal(["warn:kept", "error:kept_too"]);
  });

  it("scrubs configured secrets and sensitive keys", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({
      redactSecrets: ["test-secret"],
      redactionEnabled: true,
      onEntry: (entry) => entries.push(entry),
    });

    logger.info("engine_spawn", {
      args: ["--cookies", "/srv/test-secret.txt"],
      cookie_file: "/srv/cookies.txt",
      nested: { Authorization: "Bearer token" },
      error: new Error("failed with test-secret"),
    });

    expect(entries[0].payload).to.deep.equal({
      args: ["--cookies", "/srv/[REDACTED].txt"],
      cookie_file: "[REDACTED]",
      nested: { Authorization: "[REDACTED]" },
      error: { name: "Error", message: "failed with [REDACTED]" },
    });
  });

  it("leaves sensitive keys alone when key redaction is off", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ redactionEnabled: false, onEntry: (entry) => entries.push(entry) });

    logger.info("settings", { cookie_file: "/srv/cookies.txt" });

    expect(entries[0].payload).to.deep.equal({ cookie_file: "/srv/cookies.txt" });
  });
});

describe("parseRedactionDirectives", () => {
  it("mixes toggles and literal tokens", () => {
    expect(parseRedactionDirectives(undefined)).to.deep.equal({ enabled: false, tokens: [] });
    expect(parseRedactionDirectives("on")).to.deep.equal({ enabled: true, tokens: [] });
    expect(parseRedactionDirectives("alpha, beta,alpha")).to.deep.equal({ enabled: true, tokens: ["alpha", "beta"] });
    expect(parseRedactionDirectives("off,alpha")).to.deep.equal({ enabled: false, tokens: ["alpha"] });
  });
});
