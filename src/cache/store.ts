import type { CandidateRecord, SourceKey } from "../sources/types.js";
import type { RecordStorage } from "./storage.js";

export interface CacheEntry {
  key: SourceKey;
  source: string;
  payload: CandidateRecord[];
  fetchedAt: number;
}

export type Clock = () => number;

export class CacheStore {
  constructor(
    private readonly storage: RecordStorage,
    private readonly ttlMs: number,
    private readonly now: Clock = Date.now
  ) {}

  /** Pure lookup; stale entries are returned too, see `isFresh`. */
  async get(key: SourceKey): Promise<CacheEntry | undefined> {
    const file = await this.storage.read(key);
    if (!file?.payload || !file.fetched_at) return undefined;

    return {
      key,
      source: file.source,
      payload: file.payload,
      fetchedAt: Date.parse(file.fetched_at),
    };
  }

  async put(
    key: SourceKey,
    source: string,
    payload: CandidateRecord[]
  ): Promise<void> {
    const existing = await this.storage.read(key);
    await this.storage.write(key, {
      ...existing,
      key,
      source,
      payload,
      fetched_at: new Date(this.now()).toISOString(),
    });
  }

  isFresh(entry: CacheEntry): boolean {
    return this.now() - entry.fetchedAt < this.ttlMs;
  }

  /** Drops the cached payload so the next request re-fetches the source. */
  async delete(key: SourceKey): Promise<void> {
    const existing = await this.storage.read(key);
    if (!existing) return;

    const { payload: _payload, fetched_at: _fetchedAt, ...rest } = existing;
    if (rest.blacklisted) {
      await this.storage.write(key, rest);
    } else {
      await this.storage.remove(key);
    }
  }
}
