import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

const DAY_MS = 24 * 60 * 60 * 1000;

export const BlacklistReasonSchema = z.enum([
  "quota_exceeded",
  "extraction_failed",
  "other",
]);

const CacheSchema = z.object({
  dir: z.string().min(1).default(".discovery-cache"),
  ttl_days: z.number().positive().default(7),
});

const BlacklistSchema = z.object({
  cooldown_days: z.number().positive().default(30),
  cooldown_overrides: z
    .record(BlacklistReasonSchema, z.number().positive())
    .default({}),
});

const SourcesSchema = z.object({
  allowed_domains: z
    .array(
      z
        .string()
        .regex(/^[a-z0-9.-]+$/i, "Must be a bare domain (e.g. example.com)")
    )
    .min(1)
    .default([
      "tripadvisor.com",
      "lonelyplanet.com",
      "timeout.com",
      "wikivoyage.org",
      "atlasobscura.com",
    ]),
  max_sources: z.number().int().positive().default(5),
  num_results: z.number().int().positive().default(10),
});

const FetchSchema = z.object({
  concurrency: z.number().int().positive().default(3),
  timeout_ms: z.number().int().positive().default(20_000),
  max_page_bytes: z.number().int().positive().default(2_000_000),
});

const ExtractionSchema = z.object({
  model: z.string().default("claude-haiku-4-5-20251001"),
  max_input_chars: z.number().int().positive().default(15_000),
  max_tokens: z.number().int().positive().default(4096),
});

// The two limits are kept apart on purpose; see DESIGN.md.
const RankingSchema = z.object({
  catalog_limit: z.number().int().positive().default(10),
  live_limit: z.number().int().positive().default(12),
});

const KnowledgeBaseSchema = z.object({
  path: z.string().min(1).optional(),
});

export const DiscoveryConfigSchema = z.object({
  cache: CacheSchema.default({}),
  blacklist: BlacklistSchema.default({}),
  sources: SourcesSchema.default({}),
  fetch: FetchSchema.default({}),
  extraction: ExtractionSchema.default({}),
  ranking: RankingSchema.default({}),
  knowledge_base: KnowledgeBaseSchema.default({}),
});

export type DiscoveryConfig = z.infer<typeof DiscoveryConfigSchema>;
export type BlacklistReason = z.infer<typeof BlacklistReasonSchema>;

export function parseConfig(yamlContent: string): DiscoveryConfig {
  const raw: unknown = parseYaml(yamlContent);
  return DiscoveryConfigSchema.parse(raw ?? {});
}

export function loadConfig(filePath: string): DiscoveryConfig {
  const content = readFileSync(filePath, "utf-8");
  return parseConfig(content);
}

export function cacheTtlMs(config: DiscoveryConfig): number {
  return config.cache.ttl_days * DAY_MS;
}

export function cooldownMs(
  config: DiscoveryConfig,
  reason: BlacklistReason
): number {
  const days =
    config.blacklist.cooldown_overrides[reason] ??
    config.blacklist.cooldown_days;
  return days * DAY_MS;
}
