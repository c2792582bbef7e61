import * as core from "@actions/core";
import type { BlacklistReason } from "../config.js";
import type { SourceKey } from "../sources/types.js";
import type { RecordStorage } from "./storage.js";
import type { Clock } from "./store.js";

export interface BlacklistEntry {
  key: SourceKey;
  reason: BlacklistReason;
  blacklistedAt: number;
  cooldownMs: number;
}

export type CooldownPolicy = (reason: BlacklistReason) => number;

/**
 * Suppresses sources that failed in a way worth remembering. Each `block`
 * replaces the previous entry with a fresh, fixed cool-down; repeated
 * failures do not lengthen it.
 */
export class BlacklistRegistry {
  constructor(
    private readonly storage: RecordStorage,
    private readonly cooldownFor: CooldownPolicy,
    private readonly now: Clock = Date.now
  ) {}

  async lookup(key: SourceKey): Promise<BlacklistEntry | undefined> {
    const file = await this.storage.read(key);
    if (!file?.blacklisted || !file.reason || !file.timestamp) {
      return undefined;
    }

    return {
      key,
      reason: file.reason,
      blacklistedAt: Date.parse(file.timestamp),
      cooldownMs: file.cooldown_ms ?? this.cooldownFor(file.reason),
    };
  }

  async isBlocked(key: SourceKey): Promise<boolean> {
    const entry = await this.lookup(key);
    if (!entry) return false;
    return this.now() - entry.blacklistedAt < entry.cooldownMs;
  }

  async block(
    key: SourceKey,
    reason: BlacklistReason,
    source = ""
  ): Promise<void> {
    const existing = await this.storage.read(key);
    const cooldownMs = this.cooldownFor(reason);
    await this.storage.write(key, {
      ...existing,
      key,
      source: existing?.source || source,
      blacklisted: true,
      reason,
      timestamp: new Date(this.now()).toISOString(),
      cooldown_ms: cooldownMs,
    });
    core.info(
      `Blacklisted ${key} (${reason}) for ${Math.round(cooldownMs / 3_600_000)}h`
    );
  }

  async clear(key: SourceKey): Promise<void> {
    const existing = await this.storage.read(key);
    if (!existing?.blacklisted) return;

    const {
      blacklisted: _blacklisted,
      reason: _reason,
      timestamp: _timestamp,
      cooldown_ms: _cooldownMs,
      ...rest
    } = existing;

    if (rest.payload) {
      await this.storage.write(key, rest);
    } else {
      await this.storage.remove(key);
    }
    core.info(`Cleared blacklist entry for ${key}`);
  }
}
