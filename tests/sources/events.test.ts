import { describe, it, expect } from "vitest";
import { sampleDeals, sampleEvents } from "../../src/sources/events.js";

describe("sampleEvents", () => {
  it("lists events at the location", () => {
    expect(sampleEvents("Lisbon")).toEqual([
      { name: "Local Food Festival", date: "This weekend", location: "Lisbon" },
      { name: "Art Gallery Opening", date: "Next Friday", location: "Lisbon" },
      { name: "Cultural Performance", date: "Every evening", location: "Lisbon" },
    ]);
  });

  it("is the same on every call", () => {
    expect(sampleEvents("Lisbon")).toEqual(sampleEvents("Lisbon"));
  });

  it("names a generic place for a blank location", () => {
    expect(sampleEvents("  ").map((e) => e.location)).toEqual([
      "the city",
      "the city",
      "the city",
    ]);
  });
});

describe("sampleDeals", () => {
  it("returns the fixed deal list", () => {
    expect(sampleDeals().map((d) => d.discount)).toEqual(["10%", "100%", "20%"]);
    expect(sampleDeals()).toEqual(sampleDeals());
  });
});
