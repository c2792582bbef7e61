import * as core from "@actions/core";
import pLimit from "p-limit";
import type { BlacklistRegistry } from "./cache/blacklist.js";
import type { KeyedLock } from "./cache/key_lock.js";
import type { CacheStore } from "./cache/store.js";
import type { DiscoveryConfig } from "./config.js";
import { buildInstruction } from "./extractor/web_pages.js";
import { isExtractionFailed, type ContentExtractor } from "./extractor/types.js";
import { rank } from "./filter/relevance.js";
import { sampleDeals, sampleEvents } from "./sources/events.js";
import { fallbackRecords } from "./sources/fallback.js";
import type { KnowledgeBase } from "./sources/knowledge_base.js";
import type { SourceSelector } from "./sources/selector.js";
import type {
  CandidateRecord,
  DiscoveryOrigin,
  DiscoveryResult,
  InterestQuery,
  SourceCandidate,
} from "./sources/types.js";

const RESTAURANT_CATEGORIES = new Set(["restaurant", "food", "market"]);
const ATTRACTION_CATEGORIES = new Set([
  "landmark",
  "museum",
  "historical",
  "park",
]);

/**
 * Collaborators of a discovery run. The cache, blacklist and lock carry
 * all state shared between runs; share one set across concurrent calls.
 */
export interface DiscoveryDeps {
  knowledgeBase: KnowledgeBase;
  selector: Pick<SourceSelector, "select">;
  extractor: ContentExtractor;
  cache: CacheStore;
  blacklist: BlacklistRegistry;
  locks: KeyedLock;
}

export interface DiscoverOptions {
  signal?: AbortSignal;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function buildResult(
  query: InterestQuery,
  origin: DiscoveryOrigin,
  candidates: CandidateRecord[]
): DiscoveryResult {
  const inCategories = (categories: Set<string>) =>
    candidates.filter((c) =>
      categories.has((c.attributes.category ?? "").toLowerCase())
    );

  return {
    location: query.location,
    interests: query.interests,
    origin,
    totalResults: candidates.length,
    candidates,
    restaurants: inCategories(RESTAURANT_CATEGORIES),
    attractions: inCategories(ATTRACTION_CATEGORIES),
    events: sampleEvents(query.location),
    deals: sampleDeals(),
  };
}

async function persist(
  action: string,
  write: () => Promise<void>
): Promise<void> {
  try {
    await write();
  } catch (error) {
    core.warning(`Could not ${action}: ${errorMessage(error)}`);
  }
}

/**
 * Resolves with `task`, or with `onAbort` once `signal` fires. The task
 * keeps running after an abort; whatever it writes to the cache is
 * still valid for later requests.
 */
function untilAborted<T>(
  task: Promise<T>,
  signal: AbortSignal,
  onAbort: T
): Promise<T> {
  if (signal.aborted) return Promise.resolve(onAbort);

  return new Promise<T>((resolve, reject) => {
    const abort = () => resolve(onAbort);
    signal.addEventListener("abort", abort, { once: true });
    task.then(
      (value) => {
        signal.removeEventListener("abort", abort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", abort);
        reject(error);
      }
    );
  });
}

function sourceSignal(timeoutMs: number, request?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return request ? AbortSignal.any([request, timeout]) : timeout;
}

/**
 * Blacklist check, cache lookup, extraction and write-back for one
 * source, serialized per source key.
 */
async function loadSource(
  source: SourceCandidate,
  instruction: string,
  deps: DiscoveryDeps,
  signal: AbortSignal
): Promise<CandidateRecord[]> {
  return deps.locks.run(source.key, async () => {
    if (await deps.blacklist.isBlocked(source.key)) {
      core.info(`Skipping blacklisted source ${source.url}`);
      return [];
    }

    const cached = await deps.cache.get(source.key);
    if (cached && deps.cache.isFresh(cached)) {
      core.info(`Cache hit for ${source.url} (${cached.payload.length} records)`);
      return cached.payload;
    }

    if (signal.aborted) return [];

    let records: CandidateRecord[];
    try {
      records = await deps.extractor.extract(source, instruction, signal);
    } catch (error) {
      if (isExtractionFailed(error) && error.reason === "size_budget") {
        core.warning(`Extraction budget exceeded for ${source.url}`);
        await persist(`blacklist ${source.key}`, () =>
          deps.blacklist.block(source.key, "quota_exceeded", source.url)
        );
      } else {
        core.warning(`Skipping ${source.url}: ${errorMessage(error)}`);
      }
      return [];
    }

    await persist(`cache ${source.key}`, () =>
      deps.cache.put(source.key, source.url, records)
    );
    await persist(`clear blacklist entry for ${source.key}`, () =>
      deps.blacklist.clear(source.key)
    );
    core.info(`Extracted ${records.length} records from ${source.url}`);
    return records;
  });
}

async function fetchSources(
  sources: SourceCandidate[],
  query: InterestQuery,
  config: DiscoveryConfig,
  deps: DiscoveryDeps,
  requestSignal?: AbortSignal
): Promise<CandidateRecord[]> {
  const instruction = buildInstruction(query);
  const limit = pLimit(config.fetch.concurrency);

  const payloads = await Promise.all(
    sources.map((source) =>
      limit(async () => {
        if (requestSignal?.aborted) return [];
        const signal = sourceSignal(config.fetch.timeout_ms, requestSignal);
        const records = await untilAborted<CandidateRecord[] | undefined>(
          loadSource(source, instruction, deps, signal),
          signal,
          undefined
        );
        if (!records) {
          core.warning(`Gave up waiting for ${source.url}`);
          return [];
        }
        return records;
      })
    )
  );

  return payloads.flat();
}

function fallback(query: InterestQuery): DiscoveryResult {
  core.info(`Using fallback candidates for ${query.location}`);
  return buildResult(query, "fallback", fallbackRecords(query.location));
}

/**
 * Discovers ranked candidates for a location. The knowledge base answers
 * when it covers the location; otherwise live sources are selected,
 * fetched through the cache and blacklist, and ranked. Never rejects for
 * lack of data: the fallback set is returned instead.
 */
export async function discover(
  query: InterestQuery,
  config: DiscoveryConfig,
  deps: DiscoveryDeps,
  options: DiscoverOptions = {}
): Promise<DiscoveryResult> {
  core.info(`Discovering candidates for "${query.location}"`);

  const catalog = deps.knowledgeBase.lookup(query.location);
  if (catalog) {
    const ranked = rank(catalog, query.interests, config.ranking.catalog_limit);
    core.info(`  Knowledge base: ${ranked.length} of ${catalog.length} places`);
    return buildResult(
      query,
      "catalog",
      ranked.map((c) => c.record)
    );
  }

  const sources = await deps.selector.select(
    query,
    config.sources.max_sources,
    options.signal
  );
  if (sources.length === 0) {
    return fallback(query);
  }

  const records = await fetchSources(
    sources,
    query,
    config,
    deps,
    options.signal
  );
  core.info(`  Live sources: ${records.length} records from ${sources.length} sources`);

  const ranked = rank(records, query.interests, config.ranking.live_limit);
  if (ranked.length === 0) {
    return fallback(query);
  }

  return buildResult(
    query,
    "live",
    ranked.map((c) => c.record)
  );
}
