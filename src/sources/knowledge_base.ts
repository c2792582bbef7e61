import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import * as core from "@actions/core";
import { z } from "zod";
import { CandidateRecordSchema } from "./schema.js";
import type { CandidateRecord } from "./types.js";

export const DEFAULT_KNOWLEDGE_BASE_PATH = fileURLToPath(
  new URL("../../data/knowledge-base.json", import.meta.url)
);

const LocationEntrySchema = z.object({
  country: z.string(),
  places: z.array(CandidateRecordSchema),
});

const KnowledgeBaseSchema = z.record(LocationEntrySchema);

export type LocationEntry = z.infer<typeof LocationEntrySchema>;

/** "New York, USA" and "NewYork" -> "newyork" */
export function normalizeLocationKey(location: string): string {
  const [city = ""] = location.toLowerCase().replace(/\s+/g, "").split(",");
  return city;
}

/** Read-only catalog of curated places per location. */
export class KnowledgeBase {
  private readonly entries: Map<string, LocationEntry>;

  constructor(entries: Record<string, LocationEntry>) {
    this.entries = new Map(
      Object.entries(entries).map(([location, entry]) => [
        normalizeLocationKey(location),
        entry,
      ])
    );
  }

  static parse(json: string): KnowledgeBase {
    return new KnowledgeBase(KnowledgeBaseSchema.parse(JSON.parse(json)));
  }

  static load(path: string = DEFAULT_KNOWLEDGE_BASE_PATH): KnowledgeBase {
    const kb = KnowledgeBase.parse(readFileSync(path, "utf-8"));
    core.debug(`Loaded knowledge base with ${kb.locations().length} locations`);
    return kb;
  }

  lookup(location: string): CandidateRecord[] | undefined {
    return this.entries.get(normalizeLocationKey(location))?.places;
  }

  locations(): string[] {
    return [...this.entries.keys()];
  }
}
