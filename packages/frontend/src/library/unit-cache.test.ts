import { describe, it } from "mocha";
import { expect } from "chai";
import { UnitCache } from "./unit-cache.js";

describe("UnitCache", () => {
  it("should evict the least recently used unit", () => {
    const cache = new UnitCache<string>(2);
    cache.set("rt:a", "A");
    cache.set("rt:b", "B");
    cache.get("rt:a");
    cache.set("rt:c", "C");

    expect(cache.has("rt:a")).to.equal(true);
    expect(cache.has("rt:b")).to.equal(false);
    expect(cache.has("rt:c")).to.equal(true);
    expect(cache.size).to.equal(2);
  });

  it("should replace an existing unit without evicting another", () => {
    const cache = new UnitCache<string>(2);
    cache.set("rt:a", "A");
    cache.set("rt:b", "B");
    cache.set("rt:a", "A2");

    expect(cache.get("rt:a")).to.equal("A2");
    expect(cache.get("rt:b")).to.equal("B");
    expect(cache.size).to.equal(2);
  });

  it("should clear all units", () => {
    const cache = new UnitCache<string>(4);
    cache.set("rt:a", "A");
    cache.clear();

    expect(cache.size).to.equal(0);
    expect(cache.get("rt:a")).to.equal(undefined);
  });
});
