import { describe, it, expect } from "vitest";
import { contentHash, hashString, stableStringify } from "../hash";

describe("stableStringify", () => {
  it("sorts object keys at every level", () => {
    expect(stableStringify({ b: 1, a: { d: 2, c: 3 } })).toBe('{"a":{"c":3,"d":2},"b":1}');
  });

  it("keeps array order", () => {
    expect(stableStringify(["b", "a"])).toBe('["b","a"]');
  });
});

describe("contentHash", () => {
  it("ignores field order", () => {
    expect(contentHash({ rentPrice: 1850, images: ["a.jpg"] })).toBe(
      contentHash({ images: ["a.jpg"], rentPrice: 1850 })
    );
  });

  it("changes when a value changes", () => {
    expect(contentHash({ rentPrice: 1850 })).not.toBe(contentHash({ rentPrice: 1900 }));
  });

  it("is a sha-256 hex digest", () => {
    expect(hashString("listing")).toMatch(/^[0-9a-f]{64}$/);
  });
});
