import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { deriveName, uniqueName } from "./names";

describe("uniqueName", () => {
  it("returns the base when it is free", () => {
    assert.equal(uniqueName("fetch", () => false), "fetch");
  });

  it("appends the first free numeric suffix starting at 2", () => {
    const taken = new Set(["fetch", "fetch-2", "fetch-3"]);
    assert.equal(uniqueName("fetch", (n) => taken.has(n)), "fetch-4");
  });

  it("fills a gap left by a removed name", () => {
    const taken = new Set(["fetch", "fetch-3"]);
    assert.equal(uniqueName("fetch", (n) => taken.has(n)), "fetch-2");
  });
});

describe("deriveName", () => {
  it("uses the function name", () => {
    function downloadReport(): void {}
    assert.equal(deriveName(downloadReport), "downloadReport");
  });

  it("strips the bound prefix", () => {
    function resize(): void {}
    assert.equal(deriveName(resize.bind(null)), "resize");
  });

  it("falls back to worker for anonymous callables", () => {
    assert.equal(deriveName({ name: "" }), "worker");
  });
});
