/** Filesystem-safe identifier of a source, see `toSourceKey`. */
export type SourceKey = string;

export type AttributeValue = string | number | boolean | string[];

export interface CandidateAttributes {
  category?: string;
  tags?: string[];
  rating?: number;
  priceRange?: string;
  openingHours?: string;
  contact?: string;
  address?: string;
  whyRecommended?: string;
  extra?: Record<string, AttributeValue>;
}

export interface CandidateRecord {
  name: string;
  description?: string;
  attributes: CandidateAttributes;
}

export interface ScoredCandidate {
  record: CandidateRecord;
  score: number;
}

export interface QueryConstraints {
  budget?: string;
  travelDates?: string;
}

export interface InterestQuery {
  location: string;
  interests: string[];
  constraints?: QueryConstraints;
}

export interface SourceCandidate {
  key: SourceKey;
  url: string;
  title?: string;
}

export interface LocalEvent {
  name: string;
  date: string;
  location: string;
}

export interface LocalDeal {
  description: string;
  discount: string;
  expires: string;
}

export type DiscoveryOrigin = "catalog" | "live" | "fallback";

export interface DiscoveryResult {
  location: string;
  interests: string[];
  origin: DiscoveryOrigin;
  totalResults: number;
  candidates: CandidateRecord[];
  restaurants: CandidateRecord[];
  attractions: CandidateRecord[];
  events: LocalEvent[];
  deals: LocalDeal[];
}
