import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import sinon from "sinon";
import { Buffer } from "node:buffer";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { ApiRouter } from "../../src/http/routes.js";
import { CLIENT_COOKIE, ClientSessions } from "../../src/http/sessions.js";
import { attachmentDisposition, createRequestHandler, type RequestHandler } from "../../src/httpServer.js";
import { DownloadManager } from "../../src/jobs/manager.js";
import { MemoryHttpResponse, createHttpRequest } from "../helpers/http.js";
import { RecordingLogger } from "../helpers/recordingLogger.js";
import { ScriptedEngine } from "../helpers/scriptedEngine.js";

function field(res: MemoryHttpResponse, key: string): unknown {
  const parsed = res.json();
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error("expected a JSON object body");
  }
  return Object.fromEntries(Object.entries(parsed))[key];
}

describe("HTTP request handler", () => {
  let root: string;
  let engine: ScriptedEngine;
  let logger: RecordingLogger;
  let manager: DownloadManager;
  let handler: RequestHandler;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "mediaferry-http-"));
    engine = new ScriptedEngine();
    logger = new RecordingLogger();
    manager = new DownloadManager({ downloadRoot: root, engine, logger });
    const router = new ApiRouter({ manager, engine, sessions: new ClientSessions(), logger, maxParallelDownloads: 4 });
    handler = createRequestHandler({ router, logger, cleanupInterval: 3 });
  });

  afterEach(async () => {
    sinon.restore();
    for (const call of engine.calls) {
      if (!call.settled) {
        call.reject(new Error("test teardown"));
      }
    }
    await manager.shutdown();
    await rm(root, { recursive: true, force: true });
  });

  async function send(
    method: string,
    url: string,
    headers: Record<string, string> = {},
    body?: string | Record<string, unknown>,
  ): Promise<MemoryHttpResponse> {
    const res = new MemoryHttpResponse();
    await handler(createHttpRequest(method, url, headers, body), res);
    return res;
  }

  it("answers the health probe with the security headers", async () => {
    const res = await send("GET", "/healthz", { "X-Request-Id": "req-123" });

    expect(res.statusCode).to.equal(200);
    expect(res.json()).to.deep.equal({ ok: true });
    expect(res.headers).to.include({
      "x-content-type-options": "nosniff",
      "x-frame-options": "DENY",
      "referrer-policy": "no-referrer",
      "x-request-id": "req-123",
      "content-type": "application/json; charset=utf-8",
    });
    expect(res.headers).to.not.have.property("set-cookie");
  });

  it("mints a request id when none is supplied", async () => {
    const res = await send("GET", "/healthz");
    expect(res.headers["x-request-id"]).to.match(/^[0-9a-f-]{36}$/);
  });

  it("returns 404 outside the API", async () => {
    const res = await send("GET", "/index.html");

    expect(res.statusCode).to.equal(404);
    expect(res.json()).to.deep.equal({ error: "Resource not found" });
  });

  it("issues a client cookie and scopes the history to it", async () => {
    const started = await send("POST", "/api/start_download", {}, { url: "https://media.example/v" });

    expect(started.statusCode).to.equal(202);
    expect(started.headers["content-length"]).to.equal(String(Buffer.byteLength(started.body, "utf8")));
    const cookie = started.headers["set-cookie"];
    expect(cookie).to.match(new RegExp(`^${CLIENT_COOKIE}=[0-9a-f-]{36}; Path=/; HttpOnly; SameSite=Lax$`));
    const clientCookie = cookie.split(";")[0];
    const downloadId = field(started, "download_id");

    const mine = await send("GET", "/api/my_downloads", { Cookie: clientCookie });
    expect(mine.headers).to.not.have.property("set-cookie");
    expect(field(mine, "downloads")).to.have.nested.property("[0].id", downloadId);

    const stranger = await send("GET", "/api/my_downloads");
    expect(stranger.json()).to.deep.equal({ downloads: [] });
  });

  it("rejects malformed JSON bodies", async () => {
    const res = await send("POST", "/api/start_download", {}, "{not json");

    expect(res.statusCode).to.equal(400);
    expect(res.json()).to.deep.equal({ error: "Invalid JSON payload." });
  });

  it("sends history exports as attachments", async () => {
    const res = await send("GET", "/api/export_history_csv");

    expect(res.statusCode).to.equal(200);
    expect(res.headers["content-type"]).to.equal("text/csv; charset=utf-8");
    expect(res.headers["content-disposition"]).to.equal("attachment; filename=download_history.csv");
    expect(res.body).to.equal("id,title,filename,status,filesize,progress,completed,error\r\n");
  });

  it("streams finished files", async () => {
    const started = await send("POST", "/api/start_download", {}, { url: "https://media.example/v" });
    const downloadId = String(field(started, "download_id"));
    const call = await engine.waitForCalls(1);
    const filePath = path.join(call.options.workingDirectory, "Clip.mp4");
    await writeFile(filePath, "video-bytes", "utf8");
    call.report({ status: "finished", filename: filePath });
    call.resolve();

    const res = await send("GET", `/api/download_file/${downloadId}`);

    expect(res.statusCode).to.equal(200);
    expect(res.headers["content-type"]).to.equal("video/mp4");
    expect(res.headers["content-disposition"]).to.equal(`attachment; filename="Clip.mp4"; filename*=UTF-8''Clip.mp4`);
    expect(res.body).to.equal("video-bytes");
  });

  it("reclaims expired jobs on every third request", async () => {
    const cleanup = sinon.spy(manager, "cleanupExpired");

    for (let index = 0; index < 7; index += 1) {
      await send("GET", "/healthz");
    }

    expect(cleanup.callCount).to.equal(2);
  });

  it("keeps serving when the cleanup fails", async () => {
    sinon.stub(manager, "cleanupExpired").rejects(new Error("disk gone"));

    const responses: MemoryHttpResponse[] = [];
    for (let index = 0; index < 3; index += 1) {
      responses.push(await send("GET", "/healthz"));
    }

    expect(responses.map((res) => res.statusCode)).to.deep.equal([200, 200, 200]);
    expect(logger.messages("warn")).to.deep.equal(["jobs_cleanup_failed"]);
  });
});

describe("attachmentDisposition", () => {
  it("adds an ASCII fallback next to the UTF-8 name", () => {
    expect(attachmentDisposition('Clip "é".mp4')).to.equal(
      `attachment; filename="Clip ___.mp4"; filename*=UTF-8''Clip%20%22%C3%A9%22.mp4`,
    );
  });
});
