import { describe, it } from "mocha";
import { expect } from "chai";
import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";

import { EngineError } from "../src/jobs/errors.js";
import type { FetchOptions } from "../src/engine/types.js";
import type { ProgressReport } from "../src/jobs/types.js";
import {
  YtDlpEngine,
  buildFetchArgs,
  buildInfoArgs,
  buildPreviewArgs,
  buildSubtitleArgs,
  type EngineProcess,
  type EngineSpawner,
} from "../src/engine/ytDlp.js";
import { waitUntil } from "./helpers/scriptedEngine.js";

/** Child process stand-in whose output and exit are driven by the test. */
class FakeProcess extends EventEmitter implements EngineProcess {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly signals: NodeJS.Signals[] = [];

  kill(signal: NodeJS.Signals = "SIGTERM"): boolean {
    this.signals.push(signal);
    this.exit(null, signal);
    return true;
  }

  out(...lines: string[]): void {
    for (const line of lines) {
      this.stdout.write(`${line}\n`);
    }
  }

  err(...lines: string[]): void {
    for (const line of lines) {
      this.stderr.write(`${line}\n`);
    }
  }

  /** Ends both streams, then reports the exit once readline flushed them. */
  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    this.stdout.end();
    this.stderr.end();
    setImmediate(() => setImmediate(() => this.emit("close", code, signal)));
  }
}

interface SpawnRecord {
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd: string | undefined;
  readonly process: FakeProcess;
}

function scriptedSpawner(script: (child: FakeProcess) => void): { spawner: EngineSpawner; spawned: SpawnRecord[] } {
  const spawned: SpawnRecord[] = [];
  const spawner: EngineSpawner = (command, args, options) => {
    const child = new FakeProcess();
    spawned.push({ command, args, cwd: options.cwd, process: child });
    setImmediate(() => script(child));
    return child;
  };
  return { spawner, spawned };
}

function fetchOptions(overrides: Partial<FetchOptions> = {}): FetchOptions {
  return {
    outputTemplate: "/srv/job/%(title).120s [%(id)s].%(ext)s",
    workingDirectory: "/srv/job",
    format: "bestvideo+bestaudio/best",
    postprocessors: [],
    mergeOutputFormat: "mp4",
    rateLimitBytesPerSec: null,
    cookieFile: null,
    retries: 5,
    fragmentRetries: 5,
    skipUnavailableFragments: true,
    onProgress: () => undefined,
    ...overrides,
  };
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected the promise to reject");
}

describe("yt-dlp engine", () => {
  describe("arguments", () => {
    it("builds a download command line", () => {
      const args = buildFetchArgs(
        "https://media.example/v",
        fetchOptions({ rateLimitBytesPerSec: 102_400, cookieFile: "/srv/cookies.txt" }),
      );

      expect(args.slice(0, 4)).to.deep.equal(["--newline", "--progress", "--no-playlist", "--no-simulate"]);
      expect(args.slice(8)).to.deep.equal([
        "-P",
        "/srv/job",
        "-o",
        "/srv/job/%(title).120s [%(id)s].%(ext)s",
        "-f",
        "bestvideo+bestaudio/best",
        "--retries",
        "5",
        "--fragment-retries",
        "5",
        "--skip-unavailable-fragments",
        "--merge-output-format",
        "mp4",
        "--limit-rate",
        "102400",
        "--cookies",
        "/srv/cookies.txt",
        "--",
        "https://media.example/v",
      ]);
    });

    it("requests audio extraction for audio jobs", () => {
      const args = buildFetchArgs(
        "https://media.example/a",
        fetchOptions({
          format: "bestaudio/best",
          mergeOutputFormat: null,
          skipUnavailableFragments: false,
          postprocessors: [{ kind: "extract-audio", codec: "mp3", quality: "192" }],
        }),
      );

      expect(args.slice(-7)).to.deep.equal(["-x", "--audio-format", "mp3", "--audio-quality", "192", "--", "https://media.example/a"]);
      expect(args).to.not.include("--merge-output-format");
      expect(args).to.not.include("--skip-unavailable-fragments");
    });

    it("builds a metadata lookup command line", () => {
      expect(buildInfoArgs("https://media.example/v")).to.deep.equal([
        "--dump-single-json",
        "--skip-download",
        "--no-playlist",
        "--",
        "https://media.example/v",
      ]);
      expect(buildInfoArgs("https://media.example/v", { cookieFile: "/c.txt" })).to.include.members(["--cookies", "/c.txt"]);
    });
  });

  describe("fetch", () => {
    it("forwards progress and the final path, then resolves on a clean exit", async () => {
      const { spawner, spawned } = scriptedSpawner((child) => {
        child.out(
          "[youtube] abc: Downloading webpage",
          "MFPROG\tdownloading\t512\t1024\tNA\t256\t2\t/srv/job/Clip.mp4.part",
          "MFPATH\t/srv/job/Clip.mp4",
        );
        child.exit(0);
      });
      const reports: ProgressReport[] = [];
      const engine = new YtDlpEngine({ binary: "yt-dlp-test", spawner });

      await engine.fetch("https://media.example/v", fetchOptions({ onProgress: (report) => reports.push(report) }));

      expect(spawned).to.have.length(1);
      expect(spawned[0].command).to.equal("yt-dlp-test");
      expect(spawned[0].cwd).to.equal("/srv/job");
      expect(reports).to.deep.equal([
        {
          status: "downloading",
          filename: "Clip.mp4.part",
          downloadedBytes: 512,
          totalBytes: 1024,
          totalBytesEstimate: undefined,
          speed: 256,
          eta: 2,
        },
        { status: "finished", filename: "/srv/job/Clip.mp4" },
      ]);
    });

    it("rejects with the last error line on a failing exit", async () => {
      const { spawner } = scriptedSpawner((child) => {
        child.err("WARNING: falling back", "ERROR: first problem", "ERROR: [generic] Unsupported URL: https://media.example/v");
        child.exit(1);
      });
      const engine = new YtDlpEngine({ spawner });

      const error = await rejection(engine.fetch("https://media.example/v", fetchOptions()));

      expect(error).to.be.instanceOf(EngineError);
      expect(error).to.include({ message: "[generic] Unsupported URL: https://media.example/v", exitCode: 1 });
    });

    it("falls back to the exit code when nothing was reported", async () => {
      const { spawner } = scriptedSpawner((child) => child.exit(2));
      const engine = new YtDlpEngine({ spawner });

      const error = await rejection(engine.fetch("https://media.example/v", fetchOptions()));

      expect(error).to.include({ message: "yt-dlp exited with code 2", exitCode: 2 });
    });

    it("interrupts the process when the progress hook throws", async () => {
      const stop = new Error("stop requested");
      const { spawner, spawned } = scriptedSpawner((child) => {
        child.out(
          "MFPROG\tdownloading\t1\t10\tNA\tNA\tNA\tNA",
          "MFPROG\tdownloading\t2\t10\tNA\tNA\tNA\tNA",
        );
      });
      let calls = 0;
      const engine = new YtDlpEngine({ spawner });

      const error = await rejection(
        engine.fetch(
          "https://media.example/v",
          fetchOptions({
            onProgress: () => {
              calls += 1;
              throw stop;
            },
          }),
        ),
      );

      expect(error).to.equal(stop);
      expect(calls).to.equal(1);
      expect(spawned[0].process.signals).to.deep.equal(["SIGINT"]);
    });

    it("interrupts the process when the signal aborts", async () => {
      const { spawner, spawned } = scriptedSpawner((child) => {
        child.out("MFPROG\tdownloading\t1\t10\tNA\tNA\tNA\tNA");
      });
      const controller = new AbortController();
      const reports: ProgressReport[] = [];
      const engine = new YtDlpEngine({ spawner });

      const pending = rejection(
        engine.fetch("https://media.example/v", fetchOptions({ signal: controller.signal, onProgress: (r) => reports.push(r) })),
      );
      await waitUntil(() => reports.length === 1, "first report");
      const reason = new Error("job cleared");
      controller.abort(reason);

      expect(await pending).to.equal(reason);
      expect(spawned[0].process.signals).to.deep.equal(["SIGINT"]);
    });

    it("does not spawn when the signal is already aborted", async () => {
      const { spawner, spawned } = scriptedSpawner((child) => child.exit(0));
      const controller = new AbortController();
      controller.abort("not an error");
      const engine = new YtDlpEngine({ spawner });

      const error = await rejection(engine.fetch("https://media.example/v", fetchOptions({ signal: controller.signal })));

      expect(error).to.be.instanceOf(EngineError);
      expect(error).to.include({ message: "Engine run aborted" });
      expect(spawned).to.have.length(0);
    });

    it("reports executables that cannot be started", async () => {
      const throwing = new YtDlpEngine({
        spawner: () => {
          throw new Error("EACCES");
        },
      });
      expect(await rejection(throwing.fetch("https://media.example/v", fetchOptions()))).to.include({
        message: "Could not start yt-dlp",
      });

      const { spawner } = scriptedSpawner((child) => {
        child.emit("error", new Error("spawn yt-dlp ENOENT"));
      });
      const missing = new YtDlpEngine({ spawner });
      expect(await rejection(missing.fetch("https://media.example/v", fetchOptions()))).to.include({
        message: "Could not start yt-dlp: spawn yt-dlp ENOENT",
      });
    });
  });

  describe("extractInfo", () => {
    it("keeps the known metadata fields", async () => {
      const payload = {
        id: "abc",
        title: "Clip",
        uploader: "Uploader",
        duration: 63,
        view_count: 1200,
        thumbnail: "https://media.example/t.jpg",
        ext: "webm",
        webpage_url: "https://media.example/v",
        formats: [{ format_id: "137" }],
      };
      const { spawner, spawned } = scriptedSpawner((child) => {
        child.out(JSON.stringify(payload));
        child.exit(0);
      });
      const engine = new YtDlpEngine({ spawner });

      const info = await engine.extractInfo("https://media.example/v", { cookieFile: "/c.txt" });

      expect(info).to.deep.equal({
        title: "Clip",
        uploader: "Uploader",
        duration: 63,
        view_count: 1200,
        thumbnail: "https://media.example/t.jpg",
        ext: "webm",
        webpage_url: "https://media.example/v",
      });
      expect(spawned[0].args).to.include.members(["--dump-single-json", "--cookies", "/c.txt"]);
    });

    it("returns null for empty or unexpected output", async () => {
      const empty = new YtDlpEngine({ spawner: scriptedSpawner((child) => child.exit(0)).spawner });
      expect(await empty.extractInfo("https://media.example/v")).to.equal(null);

      const wrongShape = new YtDlpEngine({
        spawner: scriptedSpawner((child) => {
          child.out(JSON.stringify({ title: 42 }));
          child.exit(0);
        }).spawner,
      });
      expect(await wrongShape.extractInfo("https://media.example/v")).to.equal(null);
    });

    it("rejects malformed JSON", async () => {
      const engine = new YtDlpEngine({
        spawner: scriptedSpawner((child) => {
          child.out("{not json");
          child.exit(0);
        }).spawner,
      });

      const error = await rejection(engine.extractInfo("https://media.example/v"));

      expect(error).to.be.instanceOf(EngineError);
      expect(error).to.include({ message: "yt-dlp returned malformed metadata" });
    });
  });

  describe("preview", () => {
    it("lists playlists flat and forwards cookies", () => {
      expect(buildPreviewArgs("https://media.example/list", { cookieFile: "/c.txt" })).to.deep.equal([
        "--dump-single-json",
        "--skip-download",
        "--flat-playlist",
        "--cookies",
        "/c.txt",
        "--",
        "https://media.example/list",
      ]);
    });

    it("maps formats, entries, thumbnails and subtitles", async () => {
      const payload = {
        title: "Mix",
        uploader: "Uploader",
        duration: null,
        view_count: "many",
        description: "Two clips",
        extractor_key: "Example",
        thumbnails: [{ url: "https://img.example/1.jpg" }, { id: "no-url" }],
        formats: [{ format_id: "18", ext: "mp4", filesize: 2048, fps: 30, tbr: 500 }],
        entries: [
          { title: "One", url: "https://media.example/1" },
          { title: "Two", url: "abc", webpage_url: "https://media.example/2" },
        ],
        subtitles: { de: [{ ext: "vtt", url: "https://subs.example/de.vtt" }] },
      };
      const { spawner, spawned } = scriptedSpawner((child) => {
        child.out(JSON.stringify(payload));
        child.exit(0);
      });
      const engine = new YtDlpEngine({ spawner });

      const preview = await engine.preview("https://media.example/list");

      expect(spawned[0].args).to.deep.equal(buildPreviewArgs("https://media.example/list"));
      expect(preview).to.deep.equal({
        title: "Mix",
        uploader: "Uploader",
        duration: null,
        view_count: null,
        description: "Two clips",
        extractor_key: "Example",
        thumbnail: null,
        thumbnails: ["https://img.example/1.jpg"],
        formats: [
          {
            format_id: "18",
            format_note: null,
            resolution: null,
            ext: "mp4",
            filesize: 2048,
            vcodec: null,
            acodec: null,
            fps: 30,
            abr: null,
          },
        ],
        entries: [
          { title: "One", url: "https://media.example/1" },
          { title: "Two", url: "https://media.example/2" },
        ],
        subtitles: { de: [{ ext: "vtt", url: "https://subs.example/de.vtt", name: null }] },
      });
    });

    it("returns null when nothing was printed or the document is not an object", async () => {
      const empty = new YtDlpEngine({ spawner: scriptedSpawner((child) => child.exit(0)).spawner });
      expect(await empty.preview("https://media.example/v")).to.equal(null);

      const scalar = new YtDlpEngine({
        spawner: scriptedSpawner((child) => {
          child.out("42");
          child.exit(0);
        }).spawner,
      });
      expect(await scalar.preview("https://media.example/v")).to.equal(null);
    });
  });

  describe("fetchSubtitles", () => {
    it("writes subtitles only and resolves with the printed title", async () => {
      const { spawner, spawned } = scriptedSpawner((child) => {
        child.out("[info] Writing video subtitles", "MFTITLE\tClip");
        child.exit(0);
      });
      const engine = new YtDlpEngine({ spawner });
      const options = { language: "en", directory: "/srv/media", cookieFile: "/c.txt" };

      expect(await engine.fetchSubtitles("https://media.example/v", options)).to.equal("Clip");
      expect(spawned[0].cwd).to.equal("/srv/media");
      expect(spawned[0].args).to.deep.equal([
        "--skip-download",
        "--no-simulate",
        "--no-playlist",
        "--write-subs",
        "--sub-langs",
        "en",
        "--print",
        "MFTITLE\t%(title)s",
        "-P",
        "/srv/media",
        "-o",
        "%(title)s.%(ext)s",
        "--cookies",
        "/c.txt",
        "--",
        "https://media.example/v",
      ]);
      expect(buildSubtitleArgs("https://media.example/v", { language: "fr", directory: "/d" })).to.not.include("--cookies");
    });

    it("carries the engine error when the run fails", async () => {
      const engine = new YtDlpEngine({
        spawner: scriptedSpawner((child) => {
          child.err("ERROR: There are no subtitles for the requested languages");
          child.exit(1);
        }).spawner,
      });

      const error = await rejection(engine.fetchSubtitles("https://media.example/v", { language: "xx", directory: "/d" }));

      expect(error).to.be.instanceOf(EngineError);
      expect(error).to.include({ message: "There are no subtitles for the requested languages", exitCode: 1 });
    });
  });

  describe("listExtractors", () => {
    it("reads one extractor name per line", async () => {
      const { spawner, spawned } = scriptedSpawner((child) => {
        child.out("youtube", "youtube:tab", "", "  vimeo (CURRENTLY BROKEN)");
        child.exit(0);
      });
      const engine = new YtDlpEngine({ spawner });

      expect(await engine.listExtractors()).to.deep.equal(["youtube", "youtube:tab", "vimeo"]);
      expect(spawned[0].args).to.deep.equal(["--list-extractors"]);
    });
  });
});
