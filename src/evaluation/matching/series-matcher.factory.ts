import { ExactSeriesMatcher } from './exact-series.matcher';
import { DEFAULT_SERIES_MATCH_THRESHOLD, FuzzySeriesMatcher } from './fuzzy-series.matcher';
import { SeriesMatcher, SeriesMatchingStrategy } from './series-matcher.interface';

export function createSeriesMatcher(
  strategy: SeriesMatchingStrategy,
  threshold: number = DEFAULT_SERIES_MATCH_THRESHOLD,
): SeriesMatcher {
  switch (strategy) {
    case 'fuzzy':
      return new FuzzySeriesMatcher(threshold);
    case 'exact':
    default:
      return new ExactSeriesMatcher();
  }
}
