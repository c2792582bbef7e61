import { describe, it, expect, vi } from "vitest";
import {
  KnowledgeBase,
  normalizeLocationKey,
} from "../../src/sources/knowledge_base.js";
import { fallbackRecords } from "../../src/sources/fallback.js";

vi.mock("@actions/core", () => ({
  info: vi.fn(),
  warning: vi.fn(),
  debug: vi.fn(),
}));

describe("normalizeLocationKey", () => {
  it("lower-cases and keeps the part before the first comma", () => {
    expect(normalizeLocationKey("Tokyo, Japan")).toBe("tokyo");
  });

  it("removes all whitespace", () => {
    expect(normalizeLocationKey("  New   York , NY")).toBe("newyork");
    expect(normalizeLocationKey("NewYork, USA")).toBe("newyork");
  });

  it("handles an empty location", () => {
    expect(normalizeLocationKey("")).toBe("");
  });
});

describe("KnowledgeBase", () => {
  it("loads the bundled catalog", () => {
    const kb = KnowledgeBase.load();

    expect(kb.locations()).toEqual([
      "tokyo",
      "paris",
      "london",
      "newyork",
      "bangkok",
    ]);
    expect(kb.lookup("Tokyo, Japan")?.map((p) => p.name)).toContain(
      "Meiji Shrine"
    );
  });

  it("looks up locations case- and spacing-insensitively", () => {
    const kb = KnowledgeBase.load();

    expect(kb.lookup("NEW YORK")).toBeDefined();
    expect(kb.lookup("new  york, usa")).toBe(kb.lookup("New York"));
  });

  it("matches locations written without spaces", () => {
    const kb = KnowledgeBase.load();

    expect(kb.lookup("NewYork, USA")).toBeDefined();
    expect(kb.lookup("NewYork, USA")).toBe(kb.lookup("New York"));
  });

  it("returns undefined for locations it does not cover", () => {
    expect(KnowledgeBase.load().lookup("Reykjavik")).toBeUndefined();
  });

  it("normalizes keys of parsed catalogs", () => {
    const kb = KnowledgeBase.parse(
      JSON.stringify({
        "Porto ": {
          country: "Portugal",
          places: [{ name: "Livraria Lello", attributes: { category: "shop" } }],
        },
      })
    );

    expect(kb.lookup("porto")).toEqual([
      { name: "Livraria Lello", attributes: { category: "shop" } },
    ]);
  });

  it("rejects catalogs with invalid records", () => {
    expect(() =>
      KnowledgeBase.parse(
        JSON.stringify({ porto: { country: "Portugal", places: [{ name: "" }] } })
      )
    ).toThrow();
  });
});

describe("fallbackRecords", () => {
  it("returns the generic places for the location", () => {
    const records = fallbackRecords("Reykjavik");

    expect(records.map((r) => r.name)).toEqual([
      "City Center",
      "Central Museum",
      "Historic District",
      "Local Market",
    ]);
    expect(records[0].description).toBe(
      "Main city center of Reykjavik with shops and restaurants"
    );
    expect(records.every((r) => r.attributes.address === "Reykjavik")).toBe(true);
  });

  it("is the same on every call", () => {
    expect(fallbackRecords("Oslo")).toEqual(fallbackRecords("Oslo"));
  });
});
