import { createDataSeries } from '../../plot-data/plot-data.factory';
import { DataSeries } from '../../plot-data/interfaces/plot-data.interface';
import { CurveSimilarityScorer } from './curve-similarity';

function series(name: string, points: Array<[number, number]>): DataSeries {
  return createDataSeries({ name, points: points.map(([x, y]) => ({ x, y })) });
}

describe('CurveSimilarityScorer', () => {
  const scorer = new CurveSimilarityScorer();
  const diagonal = series('A', [
    [0, 0],
    [10, 10],
  ]);

  it('should score identical curves as 1', () => {
    const result = scorer.score([{ predicted: diagonal, reference: diagonal }]);

    expect(result.numericalScore).toBe(1);
    expect(result.averageRmse).toBe(0);
    expect(result.series).toEqual([{ status: 'scored', predicted: 'A', reference: 'A', rmse: 0 }]);
  });

  it('should not depend on point order or sampling density', () => {
    const dense = series('A', [
      [10, 10],
      [5, 5],
      [0, 0],
      [2.5, 2.5],
    ]);
    const result = scorer.score([{ predicted: dense, reference: diagonal }]);

    expect(result.averageRmse).toBeCloseTo(0, 12);
    expect(result.numericalScore).toBeCloseTo(1, 12);
  });

  it('should give 0 for a flat line against a diagonal', () => {
    const flat = series('A', [
      [0, 5],
      [10, 5],
    ]);
    const result = scorer.score([{ predicted: flat, reference: diagonal }]);

    // differences 0.5 - x on the 11-point grid average to 0.1 when squared
    expect(result.averageRmse).toBeCloseTo(Math.sqrt(0.1), 10);
    expect(result.numericalScore).toBe(0);
  });

  it('should fall as a uniform offset grows', () => {
    const offsetBy = (epsilon: number) =>
      series('A', [
        [0, epsilon],
        [10, 10 + epsilon],
      ]);

    const small = scorer.score([{ predicted: offsetBy(0.1), reference: diagonal }]);
    const large = scorer.score([{ predicted: offsetBy(0.5), reference: diagonal }]);

    expect(small.averageRmse).toBeCloseTo(0.1 / 10.1, 10);
    expect(small.numericalScore).toBeCloseTo(1 - 1 / 10.1, 10);
    expect(large.numericalScore).toBeCloseTo(1 - 5 / 10.5, 10);
    expect(large.numericalScore).toBeLessThan(small.numericalScore);
  });

  it('should honour a custom cutoff', () => {
    const offset = series('A', [
      [0, 0.1],
      [10, 10.1],
    ]);
    const result = new CurveSimilarityScorer({ rmseCutoff: 0.2 }).score([
      { predicted: offset, reference: diagonal },
    ]);

    expect(result.numericalScore).toBeCloseTo(1 - 0.5 / 10.1, 10);
  });

  it('should score series with hundreds of thousands of points', () => {
    const points = Array.from({ length: 250_000 }, (_, i) => ({ x: i, y: i % 7 }));
    const large = createDataSeries({ name: 'A', points });

    const result = scorer.score([{ predicted: large, reference: large }]);

    expect(result.averageRmse).toBe(0);
    expect(result.numericalScore).toBe(1);
  });

  describe('skipped series', () => {
    it('should skip an empty series', () => {
      const result = scorer.score([{ predicted: series('A', []), reference: diagonal }]);

      expect(result.numericalScore).toBe(0);
      expect(result.averageRmse).toBeNull();
      expect(result.series).toEqual([
        { status: 'skipped', predicted: 'A', reference: 'A', reason: 'empty-series' },
      ]);
      expect(result.skipped).toEqual({ 'empty-series': 1, 'zero-range': 0, 'insufficient-x-span': 0 });
    });

    it('should skip when the joint box has no height', () => {
      const flat = series('A', [
        [0, 5],
        [10, 5],
      ]);
      const result = scorer.score([{ predicted: flat, reference: flat }]);

      expect(result.skipped['zero-range']).toBe(1);
    });

    it('should skip a series that covers less than one grid step', () => {
      const single = series('A', [[5, 5]]);
      const result = scorer.score([{ predicted: single, reference: diagonal }]);

      expect(result.skipped['insufficient-x-span']).toBe(1);
      expect(result.numericalScore).toBe(0);
    });

    it('should average only the scored series', () => {
      const result = scorer.score([
        { predicted: diagonal, reference: diagonal },
        { predicted: series('B', []), reference: series('B', [[0, 0]]) },
      ]);

      expect(result.numericalScore).toBe(1);
      expect(result.averageRmse).toBe(0);
      expect(result.skipped['empty-series']).toBe(1);
    });
  });
});
