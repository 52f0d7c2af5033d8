import { describe, it } from "mocha";
import { expect } from "chai";

import { CLIENT_COOKIE, ClientSessions, resolveClientId } from "../../src/http/sessions.js";
import { readCookie } from "../../src/http/headers.js";
import { MemoryHttpResponse, createHttpRequest } from "../helpers/http.js";

describe("client sessions", () => {
  it("tracks downloads per client in start order without duplicates", () => {
    const sessions = new ClientSessions();
    sessions.track("client-a", "d1");
    sessions.track("client-a", "d2");
    sessions.track("client-a", "d1");
    sessions.track("client-b", "d3");

    expect(sessions.downloadsFor("client-a")).to.deep.equal(["d1", "d2"]);
    expect(sessions.downloadsFor("client-b")).to.deep.equal(["d3"]);
    expect(sessions.downloadsFor("nobody")).to.deep.equal([]);
  });

  it("forgets single entries or the whole list", () => {
    const sessions = new ClientSessions();
    sessions.track("client-a", "d1");
    sessions.track("client-a", "d2");

    expect(sessions.forget("client-a", "d1")).to.equal(true);
    expect(sessions.forget("client-a", "d1")).to.equal(false);
    expect(sessions.forget("client-z", "d1")).to.equal(false);
    expect(sessions.downloadsFor("client-a")).to.deep.equal(["d2"]);

    sessions.forgetAll("client-a");
    expect(sessions.downloadsFor("client-a")).to.deep.equal([]);
  });

  it("drops reclaimed downloads from every client and forgets emptied clients", () => {
    const sessions = new ClientSessions();
    sessions.track("client-a", "d1");
    sessions.track("client-a", "d2");
    sessions.track("client-b", "d1");
    sessions.track("client-c", "d3");

    expect(sessions.forgetDownloads(["d1", "d9"])).to.equal(2);
    expect(sessions.downloadsFor("client-a")).to.deep.equal(["d2"]);
    expect(sessions.downloadsFor("client-b")).to.deep.equal([]);
    expect(sessions.clientCount).to.equal(2);

    expect(sessions.forgetDownloads([])).to.equal(0);
    expect(sessions.forget("client-c", "d3")).to.equal(true);
    expect(sessions.clientCount).to.equal(1);
  });

  it("hands out a copy of the tracked list", () => {
    const sessions = new ClientSessions();
    sessions.track("client-a", "d1");
    sessions.downloadsFor("client-a").push("d9");

    expect(sessions.downloadsFor("client-a")).to.deep.equal(["d1"]);
  });

  it("reuses a well-formed client cookie", () => {
    const req = createHttpRequest("GET", "/api/my_downloads", { Cookie: `theme=dark; ${CLIENT_COOKIE}=client-1234` });
    const res = new MemoryHttpResponse();

    expect(resolveClientId(req, res)).to.equal("client-1234");
    expect(res.headers).to.not.have.property("set-cookie");
  });

  it("issues a new identifier when the cookie is missing or malformed", () => {
    const cases: Array<Record<string, string>> = [
      {},
      { Cookie: `${CLIENT_COOKIE}=bad id!` },
      { Cookie: `${CLIENT_COOKIE}=short` },
    ];
    for (const headers of cases) {
      const res = new MemoryHttpResponse();
      const clientId = resolveClientId(createHttpRequest("GET", "/api/options", headers), res);

      expect(clientId).to.match(/^[0-9a-f-]{36}$/);
      expect(res.headers["set-cookie"]).to.equal(`${CLIENT_COOKIE}=${clientId}; Path=/; HttpOnly; SameSite=Lax`);
    }
  });

  it("reads individual cookies", () => {
    const req = createHttpRequest("GET", "/", { Cookie: "a=1; empty=; b = two " });

    expect(readCookie(req, "a")).to.equal("1");
    expect(readCookie(req, "b")).to.equal("two");
    expect(readCookie(req, "empty")).to.equal(null);
    expect(readCookie(req, "missing")).to.equal(null);
  });
});
