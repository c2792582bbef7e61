import Anthropic from "@anthropic-ai/sdk";
import * as core from "@actions/core";
import { BlacklistRegistry } from "./cache/blacklist.js";
import { KeyedLock } from "./cache/key_lock.js";
import { FileRecordStorage } from "./cache/storage.js";
import { CacheStore } from "./cache/store.js";
import { cacheTtlMs, cooldownMs, loadConfig } from "./config.js";
import type { DiscoveryConfig } from "./config.js";
import {
  WebPageExtractor,
  createAnthropicGenerator,
  extractorOptions,
} from "./extractor/web_pages.js";
import { discover, type DiscoveryDeps } from "./pipeline.js";
import { KnowledgeBase } from "./sources/knowledge_base.js";
import { ExaSearchProvider } from "./sources/search.js";
import { SourceSelector } from "./sources/selector.js";
import type { InterestQuery } from "./sources/types.js";

function buildDeps(config: DiscoveryConfig): DiscoveryDeps {
  const storage = new FileRecordStorage(config.cache.dir);
  const anthropic = new Anthropic({
    apiKey: core.getInput("anthropic_api_key"),
  });

  return {
    knowledgeBase: KnowledgeBase.load(config.knowledge_base.path),
    selector: new SourceSelector(
      new ExaSearchProvider(core.getInput("exa_api_key")),
      config
    ),
    extractor: new WebPageExtractor(
      createAnthropicGenerator(anthropic, config.extraction.model),
      extractorOptions(config)
    ),
    cache: new CacheStore(storage, cacheTtlMs(config)),
    blacklist: new BlacklistRegistry(storage, (reason) =>
      cooldownMs(config, reason)
    ),
    locks: new KeyedLock(),
  };
}

function readQuery(): InterestQuery {
  const budget = core.getInput("budget");
  const travelDates = core.getInput("travel_dates");

  return {
    location: core.getInput("location", { required: true }),
    interests: core
      .getInput("interests")
      .split(",")
      .map((i) => i.trim())
      .filter(Boolean),
    constraints:
      budget || travelDates
        ? { budget: budget || undefined, travelDates: travelDates || undefined }
        : undefined,
  };
}

async function run(): Promise<void> {
  try {
    const configPath = core.getInput("config_path");

    core.info(`Loading config from ${configPath}`);
    const config = loadConfig(configPath);
    const query = readQuery();

    const result = await discover(query, config, buildDeps(config));

    core.setOutput("total_results", result.totalResults);
    core.setOutput("origin", result.origin);
    core.setOutput("candidates", JSON.stringify(result.candidates));
    core.setOutput("events", JSON.stringify(result.events));
    core.setOutput("deals", JSON.stringify(result.deals));
  } catch (error) {
    if (error instanceof Error) {
      core.setFailed(error.message);
    } else {
      core.setFailed("An unexpected error occurred");
    }
  }
}

void run();
