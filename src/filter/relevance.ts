import * as core from "@actions/core";
import type { CandidateRecord, ScoredCandidate } from "../sources/types.js";
import { dedupByName } from "./dedup.js";

const TAG_WEIGHT = 1.0;
const CATEGORY_WEIGHT = 0.5;
const DESCRIPTION_WEIGHT = 0.3;

export function normalizeInterests(interests: Iterable<string>): string[] {
  const normalized = new Set<string>();
  for (const interest of interests) {
    const value = interest.trim().toLowerCase();
    if (value) normalized.add(value);
  }
  return [...normalized];
}

/**
 * Scores a record against normalized interests. Each interest earns
 * the tag weight once if it overlaps any tag, plus the category and
 * description weights when it appears in those fields.
 */
export function scoreRecord(
  record: CandidateRecord,
  interests: string[]
): number {
  const tags = (record.attributes.tags ?? [])
    .map((t) => t.trim().toLowerCase())
    .filter(Boolean);
  const category = (record.attributes.category ?? "").toLowerCase();
  const description = (record.description ?? "").toLowerCase();

  let score = 0;
  for (const interest of interests) {
    if (tags.some((tag) => tag.includes(interest) || interest.includes(tag))) {
      score += TAG_WEIGHT;
    }
    if (category.includes(interest)) {
      score += CATEGORY_WEIGHT;
    }
    if (description.includes(interest)) {
      score += DESCRIPTION_WEIGHT;
    }
  }
  return score;
}

/**
 * Ranks records by relevance, highest first, ties in input order.
 * Records that match no interest are dropped. With no interests, the
 * records keep their input order.
 */
export function rank(
  records: CandidateRecord[],
  interests: Iterable<string>,
  limit: number
): ScoredCandidate[] {
  const normalized = normalizeInterests(interests);

  if (normalized.length === 0) {
    const unscored = records.map((record) => ({ record, score: 0 }));
    return dedupByName(unscored, (c) => c.record).slice(0, limit);
  }

  const scored = records
    .map((record) => ({ record, score: scoreRecord(record, normalized) }))
    .filter((c) => c.score > 0);

  // Array.prototype.sort is stable, so equal scores keep input order.
  scored.sort((a, b) => b.score - a.score);

  const ranked = dedupByName(scored, (c) => c.record).slice(0, limit);
  core.debug(
    `Ranked ${records.length} records: ${scored.length} matched, ${ranked.length} kept`
  );
  return ranked;
}
