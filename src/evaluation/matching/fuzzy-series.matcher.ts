import { matchFraction, SeriesMatcher, SeriesMatchResult, SeriesPair } from './series-matcher.interface';
import { seriesNameSimilarity } from './string-similarity';

export const DEFAULT_SERIES_MATCH_THRESHOLD = 0.7;

/**
 * Pairs series whose names are similar enough, best pairs first, each name
 * used at most once on either side.
 */
export class FuzzySeriesMatcher implements SeriesMatcher {
  readonly strategy = 'fuzzy' as const;

  constructor(private readonly threshold: number = DEFAULT_SERIES_MATCH_THRESHOLD) {}

  match(predicted: readonly string[], reference: readonly string[]): SeriesMatchResult {
    const predictedNames = [...new Set(predicted)];
    const referenceNames = [...new Set(reference)];

    const candidates: Array<SeriesPair & { similarity: number }> = [];
    for (const p of predictedNames) {
      for (const r of referenceNames) {
        const similarity = seriesNameSimilarity(p, r);
        if (similarity >= this.threshold) {
          candidates.push({ predicted: p, reference: r, similarity });
        }
      }
    }
    candidates.sort((a, b) => b.similarity - a.similarity);

    const usedPredicted = new Set<string>();
    const usedReference = new Set<string>();
    const pairs: SeriesPair[] = [];
    for (const candidate of candidates) {
      if (usedPredicted.has(candidate.predicted) || usedReference.has(candidate.reference)) {
        continue;
      }
      usedPredicted.add(candidate.predicted);
      usedReference.add(candidate.reference);
      pairs.push({ predicted: candidate.predicted, reference: candidate.reference });
    }

    return {
      pairs,
      matchFraction: matchFraction(pairs.length, predictedNames.length, referenceNames.length),
    };
  }
}
