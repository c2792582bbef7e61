import * as core from "@actions/core";
import type { DiscoveryConfig } from "../config.js";
import type { SearchHit, SearchProvider } from "./search.js";
import { toSourceKey } from "./source_key.js";
import type { InterestQuery, SourceCandidate } from "./types.js";

export function buildSearchQuery(query: InterestQuery): string {
  const interests = query.interests.map((i) => i.trim()).filter(Boolean);
  const parts = [
    interests.length > 0
      ? `best ${interests.join(", ")} in ${query.location}`
      : `top things to do in ${query.location}`,
  ];

  if (query.constraints?.budget) {
    parts.push(`budget ${query.constraints.budget}`);
  }
  if (query.constraints?.travelDates) {
    parts.push(`visiting ${query.constraints.travelDates}`);
  }

  return parts.join(" ");
}

export function isAllowedUrl(url: string, allowedDomains: string[]): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }
  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    return false;
  }

  const host = parsed.hostname.toLowerCase();
  return allowedDomains.some((domain) => {
    const d = domain.toLowerCase();
    return host === d || host.endsWith(`.${d}`);
  });
}

export class SourceSelector {
  constructor(
    private readonly provider: SearchProvider,
    private readonly config: DiscoveryConfig
  ) {}

  /**
   * Candidate sources for a query, restricted to the allow-list. Never
   * rejects: a failed search means no live data for this request.
   */
  async select(
    query: InterestQuery,
    maxSources: number,
    signal?: AbortSignal
  ): Promise<SourceCandidate[]> {
    if (maxSources <= 0) return [];

    const searchQuery = buildSearchQuery(query);
    core.info(`Searching sources: ${searchQuery}`);

    let hits: SearchHit[];
    try {
      hits = await this.provider.search(searchQuery, {
        numResults: this.config.sources.num_results,
        signal,
      });
    } catch (error) {
      core.warning(
        `Source search failed: ${error instanceof Error ? error.message : String(error)}`
      );
      return [];
    }

    const selected: SourceCandidate[] = [];
    const seen = new Set<string>();

    for (const hit of hits) {
      if (!isAllowedUrl(hit.url, this.config.sources.allowed_domains)) {
        core.debug(`Skipping non-allow-listed source ${hit.url}`);
        continue;
      }
      const key = toSourceKey(hit.url);
      if (seen.has(key)) continue;
      seen.add(key);

      selected.push({ key, url: hit.url, title: hit.title });
      if (selected.length >= maxSources) break;
    }

    core.info(
      `Selected ${selected.length} of ${hits.length} search results as sources`
    );
    return selected;
  }
}
