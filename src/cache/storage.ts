import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import * as core from "@actions/core";
import { z } from "zod";
import { BlacklistReasonSchema } from "../config.js";
import { CandidateRecordSchema } from "../sources/schema.js";
import type { SourceKey } from "../sources/types.js";

// Cache and blacklist state for one source share a file, so a single
// read shows both freshness and block status.
export const SourceFileSchema = z.object({
  key: z.string().min(1),
  source: z.string(),
  payload: z.array(CandidateRecordSchema).optional(),
  fetched_at: z.string().datetime().optional(),
  blacklisted: z.literal(true).optional(),
  reason: BlacklistReasonSchema.optional(),
  timestamp: z.string().datetime().optional(),
  cooldown_ms: z.number().nonnegative().optional(),
});

export type SourceFile = z.infer<typeof SourceFileSchema>;

export interface RecordStorage {
  read(key: SourceKey): Promise<SourceFile | undefined>;
  write(key: SourceKey, file: SourceFile): Promise<void>;
  remove(key: SourceKey): Promise<void>;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Stores one pretty-printed JSON document per source key under `dir`.
 * Files can be inspected and deleted by hand; an unreadable file is
 * reported and treated as absent.
 */
export class FileRecordStorage implements RecordStorage {
  constructor(private readonly dir: string) {}

  pathFor(key: SourceKey): string {
    return join(this.dir, `${key}.json`);
  }

  async read(key: SourceKey): Promise<SourceFile | undefined> {
    let content: string;
    try {
      content = await readFile(this.pathFor(key), "utf-8");
    } catch (error) {
      if (!isMissingFile(error)) {
        core.warning(
          `Could not read cache file for ${key}: ${error instanceof Error ? error.message : String(error)}`
        );
      }
      return undefined;
    }

    try {
      const parsed = SourceFileSchema.safeParse(JSON.parse(content));
      if (!parsed.success) {
        core.warning(`Ignoring invalid cache file for ${key}`);
        return undefined;
      }
      return parsed.data;
    } catch {
      core.warning(`Ignoring unparseable cache file for ${key}`);
      return undefined;
    }
  }

  async write(key: SourceKey, file: SourceFile): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const target = this.pathFor(key);
    const temp = `${target}.${process.pid}.tmp`;
    await writeFile(temp, `${JSON.stringify(file, null, 2)}\n`, "utf-8");
    await rename(temp, target);
  }

  async remove(key: SourceKey): Promise<void> {
    await rm(this.pathFor(key), { force: true });
  }
}
