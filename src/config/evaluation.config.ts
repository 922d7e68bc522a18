import { z } from 'zod';
import { EvaluationSettings } from '../evaluation/interfaces/evaluation.interface';
import { formatZodIssues } from '../plot-data/plot-data.errors';

const weight = z.number().finite().min(0);

const evaluationEnvSchema = z.object({
  PLOT_METRIC_WEIGHTS: z
    .string()
    .default('0.2,0.2,0.6')
    .transform((value) => value.split(',').map((part) => Number(part.trim())))
    .pipe(z.tuple([weight, weight, weight], { invalid_type_error: 'expected three comma-separated weights' })),
  PLOT_METRIC_PRECISION: z.coerce.number().positive().max(1).default(0.1),
  PLOT_METRIC_RMSE_CUTOFF: z.coerce.number().positive().default(0.1),
  SERIES_MATCHING: z.enum(['exact', 'fuzzy']).default('exact'),
  SERIES_MATCH_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  POINT_METRIC_ERROR: z.enum(['rmse', 'mae']).default('rmse'),
});

export const EVALUATION_ENV_KEYS = [
  'PLOT_METRIC_WEIGHTS',
  'PLOT_METRIC_PRECISION',
  'PLOT_METRIC_RMSE_CUTOFF',
  'SERIES_MATCHING',
  'SERIES_MATCH_THRESHOLD',
  'POINT_METRIC_ERROR',
] as const;

/**
 * Builds metric settings from environment-style string values. Unset keys
 * fall back to the defaults; anything unparseable throws.
 */
export function loadEvaluationSettings(read: (key: string) => string | undefined): EvaluationSettings {
  const raw = Object.fromEntries(EVALUATION_ENV_KEYS.map((key) => [key, read(key)]));

  const parsed = evaluationEnvSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid evaluation configuration: ${formatZodIssues(parsed.error).join('; ')}`);
  }

  const env = parsed.data;
  const [metadata, series, numerical] = env.PLOT_METRIC_WEIGHTS;
  return {
    weights: { metadata, series, numerical },
    precision: env.PLOT_METRIC_PRECISION,
    rmseCutoff: env.PLOT_METRIC_RMSE_CUTOFF,
    seriesMatching: env.SERIES_MATCHING,
    seriesMatchThreshold: env.SERIES_MATCH_THRESHOLD,
    pointErrorMetric: env.POINT_METRIC_ERROR,
  };
}

export function weightsSumToOne(settings: EvaluationSettings): boolean {
  const { metadata, series, numerical } = settings.weights;
  return Math.abs(metadata + series + numerical - 1) < 1e-9;
}
