import { matchFraction, SeriesMatcher, SeriesMatchResult } from './series-matcher.interface';

/**
 * Case-sensitive name equality, no normalization.
 */
export class ExactSeriesMatcher implements SeriesMatcher {
  readonly strategy = 'exact' as const;

  match(predicted: readonly string[], reference: readonly string[]): SeriesMatchResult {
    const predictedNames = new Set(predicted);
    const referenceNames = new Set(reference);

    const pairs = [...predictedNames]
      .filter((name) => referenceNames.has(name))
      .map((name) => ({ predicted: name, reference: name }));

    return {
      pairs,
      matchFraction: matchFraction(pairs.length, predictedNames.size, referenceNames.size),
    };
  }
}
