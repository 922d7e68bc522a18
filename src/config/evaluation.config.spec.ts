import { loadEvaluationSettings, weightsSumToOne } from './evaluation.config';

function reader(env: Record<string, string>) {
  return (key: string): string | undefined => env[key];
}

describe('loadEvaluationSettings', () => {
  it('should fall back to defaults', () => {
    expect(loadEvaluationSettings(reader({}))).toEqual({
      weights: { metadata: 0.2, series: 0.2, numerical: 0.6 },
      precision: 0.1,
      rmseCutoff: 0.1,
      seriesMatching: 'exact',
      seriesMatchThreshold: 0.7,
      pointErrorMetric: 'rmse',
    });
  });

  it('should parse overrides', () => {
    const settings = loadEvaluationSettings(
      reader({
        PLOT_METRIC_WEIGHTS: '0.5, 0.25, 0.25',
        PLOT_METRIC_PRECISION: '0.05',
        PLOT_METRIC_RMSE_CUTOFF: '0.2',
        SERIES_MATCHING: 'fuzzy',
        SERIES_MATCH_THRESHOLD: '0.8',
        POINT_METRIC_ERROR: 'mae',
      }),
    );

    expect(settings).toEqual({
      weights: { metadata: 0.5, series: 0.25, numerical: 0.25 },
      precision: 0.05,
      rmseCutoff: 0.2,
      seriesMatching: 'fuzzy',
      seriesMatchThreshold: 0.8,
      pointErrorMetric: 'mae',
    });
  });

  it('should reject an unknown matching strategy', () => {
    expect(() => loadEvaluationSettings(reader({ SERIES_MATCHING: 'loose' }))).toThrow(
      'Invalid evaluation configuration: SERIES_MATCHING:',
    );
  });

  it('should reject a malformed weight list', () => {
    expect(() => loadEvaluationSettings(reader({ PLOT_METRIC_WEIGHTS: '0.5,0.5' }))).toThrow(
      /PLOT_METRIC_WEIGHTS/,
    );
    expect(() => loadEvaluationSettings(reader({ PLOT_METRIC_WEIGHTS: '0.2,abc,0.6' }))).toThrow(
      /PLOT_METRIC_WEIGHTS/,
    );
  });

  it('should reject a precision above 1', () => {
    expect(() => loadEvaluationSettings(reader({ PLOT_METRIC_PRECISION: '2' }))).toThrow(
      /PLOT_METRIC_PRECISION/,
    );
  });
});

describe('weightsSumToOne', () => {
  it('should accept the default weights', () => {
    expect(weightsSumToOne(loadEvaluationSettings(reader({})))).toBe(true);
  });

  it('should flag weights that do not add up', () => {
    expect(weightsSumToOne(loadEvaluationSettings(reader({ PLOT_METRIC_WEIGHTS: '0.5,0.5,0.5' })))).toBe(false);
  });
});
