import { describe, it } from "mocha";
import { expect } from "chai";

import { TimedCache } from "../src/utils/timedCache.js";

describe("TimedCache", () => {
  it("expires entries once their lifetime has passed", () => {
    let now = 1_000;
    const cache = new TimedCache<string>({ ttlMs: 100, now: () => now });
    cache.set("a", "alpha");

    now = 1_100;
    expect(cache.get("a")).to.equal("alpha");

    now = 1_101;
    expect(cache.get("a")).to.equal(undefined);
    expect(cache.size).to.equal(0);
  });

  it("evicts the least recently used entry when full", () => {
    const cache = new TimedCache<number>({ maxEntries: 2 });
    cache.set("a", 1);
    cache.set("b", 2);
    expect(cache.get("a")).to.equal(1);

    cache.set("c", 3);

    expect(cache.get("b")).to.equal(undefined);
    expect(cache.get("a")).to.equal(1);
    expect(cache.get("c")).to.equal(3);
  });

  it("purges expired entries and keeps live ones", () => {
    let now = 0;
    const cache = new TimedCache<string>({ ttlMs: 50, now: () => now });
    cache.set("old", "x");
    now = 40;
    cache.set("fresh", "y");

    now = 60;
    expect(cache.purgeExpired()).to.equal(1);
    expect(cache.size).to.equal(1);
    expect(cache.get("fresh")).to.equal("y");
  });
});
