import type { CandidateRecord, SourceCandidate } from "../sources/types.js";

export type ExtractionFailureReason = "size_budget" | "unreachable" | "malformed";

export class ExtractionFailed extends Error {
  override name = "ExtractionFailed";

  constructor(
    readonly reason: ExtractionFailureReason,
    readonly source: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Turns one source into candidate records. Implementations reject with
 * `ExtractionFailed` when the source cannot be used.
 */
export interface ContentExtractor {
  extract(
    source: SourceCandidate,
    instruction: string,
    signal?: AbortSignal
  ): Promise<CandidateRecord[]>;
}

export function isExtractionFailed(error: unknown): error is ExtractionFailed {
  return error instanceof ExtractionFailed;
}
