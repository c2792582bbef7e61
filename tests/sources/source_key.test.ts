import { describe, it, expect } from "vitest";
import { normalizeAddress, toSourceKey } from "../../src/sources/source_key.js";

describe("normalizeAddress", () => {
  it("lower-cases scheme and host but keeps the path", () => {
    expect(normalizeAddress("HTTPS://WikiVoyage.org/wiki/Lisbon")).toBe(
      "https://wikivoyage.org/wiki/Lisbon"
    );
  });

  it("drops fragments and trailing slashes", () => {
    expect(normalizeAddress("https://example.com/guide/#top")).toBe(
      "https://example.com/guide"
    );
  });

  it("keeps the root path", () => {
    expect(normalizeAddress("https://example.com")).toBe(
      "https://example.com/"
    );
  });

  it("keeps the query string", () => {
    expect(normalizeAddress("https://example.com/search?q=food")).toBe(
      "https://example.com/search?q=food"
    );
  });

  it("trims and lower-cases addresses that are not URLs", () => {
    expect(normalizeAddress("  Local Guide  ")).toBe("local guide");
  });
});

describe("toSourceKey", () => {
  it("is deterministic", () => {
    const url = "https://www.timeout.com/lisbon/things-to-do";
    expect(toSourceKey(url)).toBe(toSourceKey(url));
  });

  it("maps equivalent addresses to the same key", () => {
    expect(toSourceKey("https://Example.com/guide/#section")).toBe(
      toSourceKey("https://example.com/guide")
    );
  });

  it("maps different addresses to different keys", () => {
    expect(toSourceKey("https://example.com/a")).not.toBe(
      toSourceKey("https://example.com/b")
    );
  });

  it("builds a readable slug with a hash suffix", () => {
    const key = toSourceKey("https://www.timeout.com/lisbon/things-to-do");
    expect(key).toMatch(/^www_timeout_com_lisbon_things_to_do-[0-9a-f]{16}$/);
  });

  it("bounds the key length for very long addresses", () => {
    const key = toSourceKey(`https://example.com/${"segment/".repeat(100)}`);
    expect(key.length).toBeLessThanOrEqual(97);
    expect(key).toMatch(/^[a-z0-9_]+-[0-9a-f]{16}$/);
  });

  it("keeps long addresses with a shared prefix apart", () => {
    const prefix = `https://example.com/${"x".repeat(120)}`;
    expect(toSourceKey(`${prefix}/one`)).not.toBe(toSourceKey(`${prefix}/two`));
  });

  it("produces a key for addresses with no slug characters", () => {
    expect(toSourceKey("???")).toMatch(/^source-[0-9a-f]{16}$/);
  });
});
