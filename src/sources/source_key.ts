import { createHash } from "node:crypto";
import type { SourceKey } from "./types.js";

const MAX_SLUG_LENGTH = 80;
const HASH_LENGTH = 16;

export function normalizeAddress(address: string): string {
  const trimmed = address.trim();
  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    return trimmed.toLowerCase();
  }

  url.hash = "";
  if (url.pathname.length > 1 && url.pathname.endsWith("/")) {
    url.pathname = url.pathname.replace(/\/+$/, "");
  }
  return url.href;
}

function slugify(normalized: string): string {
  return normalized
    .replace(/^[a-z][a-z0-9+.-]*:\/\//, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .slice(0, MAX_SLUG_LENGTH);
}

/**
 * Derives the storage key for a source address. The slug keeps keys
 * readable on disk; the hash suffix keeps truncated slugs unique.
 */
export function toSourceKey(address: string): SourceKey {
  const normalized = normalizeAddress(address);
  const hash = createHash("sha256")
    .update(normalized)
    .digest("hex")
    .slice(0, HASH_LENGTH);
  const slug = slugify(normalized) || "source";
  return `${slug}-${hash}`;
}
