import { describe, it, expect, vi } from "vitest";
import {
  normalizeInterests,
  rank,
  scoreRecord,
} from "../../src/filter/relevance.js";
import { KnowledgeBase } from "../../src/sources/knowledge_base.js";
import type { CandidateRecord } from "../../src/sources/types.js";

vi.mock("@actions/core", () => ({
  info: vi.fn(),
  debug: vi.fn(),
}));

const makeRecord = (
  name: string,
  tags: string[] = [],
  category?: string,
  description?: string
): CandidateRecord => ({
  name,
  description,
  attributes: { tags, category },
});

describe("normalizeInterests", () => {
  it("trims, lower-cases and drops empties and duplicates", () => {
    expect(normalizeInterests([" Food ", "food", "", "  ", "Art"])).toEqual([
      "food",
      "art",
    ]);
  });
});

describe("scoreRecord", () => {
  it("adds 1.0 once per interest that overlaps any tag", () => {
    const record = makeRecord("Market", ["street food", "food", "markets"]);
    expect(scoreRecord(record, ["food"])).toBe(1);
  });

  it("matches interests that contain a tag", () => {
    const record = makeRecord("Museum", ["art"]);
    expect(scoreRecord(record, ["modern art"])).toBe(1);
  });

  it("adds 0.5 for a category match and 0.3 for a description match", () => {
    const record = makeRecord(
      "Ramen Alley",
      ["ramen"],
      "food",
      "Late-night food counters"
    );
    expect(scoreRecord(record, ["food"])).toBeCloseTo(0.8);
  });

  it("sums over interests", () => {
    const record = makeRecord("Shrine", ["temples", "gardens"], "religious");
    expect(scoreRecord(record, ["temples", "gardens", "religious"])).toBeCloseTo(
      2.5
    );
  });

  it("ignores empty tags", () => {
    const record = makeRecord("Blank", ["", "  "]);
    expect(scoreRecord(record, ["food"])).toBe(0);
  });

  it("is case-insensitive on record fields", () => {
    const record = makeRecord("Gallery", ["Modern ART"], "Museum");
    expect(scoreRecord(record, ["art", "museum"])).toBeCloseTo(1.5);
  });
});

describe("rank", () => {
  it("orders by score with ties in input order", () => {
    const records = [
      makeRecord("A", ["food"]),
      makeRecord("B", ["food"], "food"),
      makeRecord("C", ["food"]),
      makeRecord("D", ["nightlife"]),
    ];

    const ranked = rank(records, ["food"], 10);

    expect(ranked.map((c) => c.record.name)).toEqual(["B", "A", "C"]);
    expect(ranked.map((c) => c.score)).toEqual([1.5, 1, 1]);
  });

  it("excludes records that match no interest", () => {
    const ranked = rank([makeRecord("Mall", ["shopping"])], ["temples"], 10);
    expect(ranked).toEqual([]);
  });

  it("keeps one record per case-insensitive name, the higher ranked one", () => {
    const records = [
      makeRecord("Night Market", ["food"]),
      makeRecord("  night market ", ["food"], "market", "food stalls"),
    ];

    const ranked = rank(records, ["food"], 10);

    expect(ranked).toHaveLength(1);
    expect(ranked[0].record).toBe(records[1]);
  });

  it("truncates to the limit", () => {
    const records = Array.from({ length: 20 }, (_, i) =>
      makeRecord(`Stall ${i}`, ["food"])
    );

    expect(rank(records, ["food"], 12)).toHaveLength(12);
  });

  it("returns records in input order when there are no interests", () => {
    const records = [
      makeRecord("Zoo", [], "park"),
      makeRecord("Aquarium", ["food"], "food"),
      makeRecord("Bridge"),
    ];

    const ranked = rank(records, [], 10);

    expect(ranked.map((c) => c.record.name)).toEqual(["Zoo", "Aquarium", "Bridge"]);
    expect(ranked.every((c) => c.score === 0)).toBe(true);
  });

  it("caps the unscored list at the limit", () => {
    const records = Array.from({ length: 15 }, (_, i) => makeRecord(`Place ${i}`));

    const ranked = rank(records, ["   "], 10);

    expect(ranked.map((c) => c.record.name)).toEqual(
      records.slice(0, 10).map((r) => r.name)
    );
  });

  it("gives the same order on repeated calls", () => {
    const records = [
      makeRecord("A", ["art"], "museum"),
      makeRecord("B", ["food", "art"]),
      makeRecord("C", ["art"]),
    ];

    const first = rank(records, ["art", "food"], 10);
    const second = rank(records, ["food", "art"], 10);

    expect(second).toEqual(first);
  });

  it("ranks the Tokyo catalog for food and temples", () => {
    const tokyo = KnowledgeBase.load().lookup("Tokyo");
    if (!tokyo) throw new Error("expected Tokyo in the knowledge base");

    const names = rank(tokyo, ["food", "temples"], 10).map((c) => c.record.name);

    expect(names).toEqual([
      "Ramen Street",
      "Omoide Yokocho",
      "Tsukiji Outer Market",
      "Senso-ji Temple",
      "Meiji Shrine",
      "Nezu Shrine",
    ]);
    expect(names).not.toContain("Ginza");
  });
});
