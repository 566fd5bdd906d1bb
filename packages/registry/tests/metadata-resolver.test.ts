/**
 * Tests for MetadataResolver.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { MetadataResolver, defaultCardUri, resolveUri } from "../src/metadata-resolver.js";
import { codeOf } from "./helpers.js";

describe("resolveUri", () => {
  it("joins the base prefix onto the level URI", () => {
    expect(resolveUri("ipfs://X", "fallback", "https://cdn/")).toBe("https://cdn/ipfs://X");
  });

  it("returns the level URI verbatim without a base", () => {
    expect(resolveUri("ipfs://X", "fallback", "")).toBe("ipfs://X");
  });

  it("returns the fallback unchanged for an empty level URI", () => {
    expect(resolveUri("", "https://cdn/7", "https://cdn/")).toBe("https://cdn/7");
    expect(resolveUri("", "", "https://cdn/")).toBe("");
  });
});

describe("defaultCardUri", () => {
  it("appends the decimal id to the base", () => {
    expect(defaultCardUri(42n, "https://cdn/")).toBe("https://cdn/42");
  });

  it("is empty without a base", () => {
    expect(defaultCardUri(42n, "")).toBe("");
  });
});

describe("MetadataResolver", () => {
  let resolver: MetadataResolver;

  beforeEach(() => {
    resolver = new MetadataResolver("https://cdn/");
  });

  it("resolves a mapped level with the base prefix", () => {
    resolver.setLevelUri(2n, "ipfs://X");
    expect(resolver.resolve(2n, "fallback", resolver.baseUri)).toBe("https://cdn/ipfs://X");
    expect(resolver.cardUri(5n, 2n)).toBe("https://cdn/ipfs://X");
  });

  it("falls back to the per-card URI for an unmapped level", () => {
    expect(resolver.levelUri(3n)).toBe("");
    expect(resolver.cardUri(5n, 3n)).toBe("https://cdn/5");
  });

  it("removes a mapping when given an empty URI", () => {
    resolver.setLevelUri(2n, "ipfs://X");
    resolver.setLevelUri(2n, "");
    expect(resolver.entries()).toEqual([]);
  });

  it("uses level URIs verbatim once the base is cleared", () => {
    resolver.setLevelUri(1n, "ipfs://A");
    resolver.setBaseUri("");
    expect(resolver.cardUri(0n, 1n)).toBe("ipfs://A");
    expect(resolver.cardUri(0n, 9n)).toBe("");
  });

  describe("setLevelUris", () => {
    it("sets parallel lists in order", () => {
      resolver.setLevelUris([1n, 2n], ["ipfs://A", "ipfs://B"]);
      expect(resolver.entries()).toEqual([
        [1n, "ipfs://A"],
        [2n, "ipfs://B"],
      ]);
    });

    it("rejects mismatched or empty lists", () => {
      expect(codeOf(() => resolver.setLevelUris([1n], []))).toBe("WRONG_INPUT_PARAMS");
      expect(codeOf(() => resolver.setLevelUris([], []))).toBe("WRONG_INPUT_PARAMS");
    });

    it("writes nothing when one level is invalid", () => {
      expect(codeOf(() => resolver.setLevelUris([1n, -2n], ["ipfs://A", "ipfs://B"]))).toBe(
        "INVALID_VALUE",
      );
      expect(resolver.entries()).toEqual([]);
    });
  });
});
