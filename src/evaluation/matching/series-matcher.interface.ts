export type SeriesMatchingStrategy = 'exact' | 'fuzzy';

export interface SeriesPair {
  predicted: string;
  reference: string;
}

export interface SeriesMatchResult {
  pairs: SeriesPair[];
  matchFraction: number;
}

export interface SeriesMatcher {
  readonly strategy: SeriesMatchingStrategy;
  match(predicted: readonly string[], reference: readonly string[]): SeriesMatchResult;
}

/**
 * Share of predicted series that found a partner. An empty prediction scores
 * 1.0 only when the reference is empty too.
 */
export function matchFraction(matched: number, predictedCount: number, referenceCount: number): number {
  if (predictedCount === 0) {
    return referenceCount === 0 ? 1.0 : 0.0;
  }
  return matched / predictedCount;
}
