import type {
  AttributeValue,
  CandidateAttributes,
  CandidateRecord,
} from "../sources/types.js";

const MAX_TEXT_LENGTH = 1000;

const KNOWN_KEYS = new Set([
  "name",
  "description",
  "category",
  "interests",
  "tags",
  "rating",
  "price_range",
  "priceRange",
  "opening_hours",
  "openingHours",
  "contact_info",
  "contact",
  "address",
  "why_recommended",
  "whyRecommended",
]);

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function text(value: unknown): string | undefined {
  if (typeof value === "number") return String(value);
  if (typeof value !== "string") return undefined;
  const trimmed = value.replace(/\s+/g, " ").trim();
  return trimmed ? trimmed.slice(0, MAX_TEXT_LENGTH) : undefined;
}

function stringList(value: unknown): string[] | undefined {
  if (typeof value === "string") {
    const items = value.split(",").map((s) => s.trim()).filter(Boolean);
    return items.length > 0 ? items : undefined;
  }
  if (!Array.isArray(value)) return undefined;
  const items = value
    .filter((v): v is string => typeof v === "string")
    .map((s) => s.trim())
    .filter(Boolean);
  return items.length > 0 ? items : undefined;
}

function rating(value: unknown): number | undefined {
  const n = typeof value === "string" ? parseFloat(value) : value;
  return typeof n === "number" && Number.isFinite(n) ? n : undefined;
}

function attributeValue(value: unknown): AttributeValue | undefined {
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  return stringList(value);
}

/**
 * Converts one loosely-shaped extracted item into a candidate record.
 * Returns undefined for items without a usable name.
 */
export function toCandidateRecord(raw: unknown): CandidateRecord | undefined {
  if (!isObject(raw)) return undefined;

  const name = text(raw.name);
  if (!name) return undefined;

  const attributes: CandidateAttributes = {};
  const category = text(raw.category);
  if (category) attributes.category = category.toLowerCase();
  const tags = stringList(raw.interests) ?? stringList(raw.tags);
  if (tags) attributes.tags = tags;
  const score = rating(raw.rating);
  if (score !== undefined) attributes.rating = score;
  const priceRange = text(raw.price_range ?? raw.priceRange);
  if (priceRange) attributes.priceRange = priceRange;
  const openingHours = text(raw.opening_hours ?? raw.openingHours);
  if (openingHours) attributes.openingHours = openingHours;
  const contact = text(raw.contact_info ?? raw.contact);
  if (contact) attributes.contact = contact;
  const address = text(raw.address);
  if (address) attributes.address = address;
  const why = text(raw.why_recommended ?? raw.whyRecommended);
  if (why) attributes.whyRecommended = why;

  const extra: Record<string, AttributeValue> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (KNOWN_KEYS.has(key)) continue;
    const v = attributeValue(value);
    if (v !== undefined) extra[key] = v;
  }
  if (Object.keys(extra).length > 0) attributes.extra = extra;

  const record: CandidateRecord = { name, attributes };
  const description = text(raw.description);
  if (description) record.description = description;
  return record;
}

export function toCandidateRecords(items: unknown[]): CandidateRecord[] {
  const records: CandidateRecord[] = [];
  for (const item of items) {
    const record = toCandidateRecord(item);
    if (record) records.push(record);
  }
  return records;
}
