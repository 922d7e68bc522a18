import { PlotMetadata } from '../../plot-data/interfaces/plot-data.interface';

const SCORED_FIELDS = ['xAxisLabel', 'leftYAxisLabel'] as const;

/**
 * Fraction of the x and left-y axis labels that agree after trimming and
 * lower-casing. Empty labels never count as agreement.
 */
export function scoreMetadata(predicted: PlotMetadata, reference: PlotMetadata): number {
  let points = 0;
  for (const field of SCORED_FIELDS) {
    const predictedValue = predicted[field].trim().toLowerCase();
    const referenceValue = reference[field].trim().toLowerCase();
    if (predictedValue !== '' && predictedValue === referenceValue) {
      points++;
    }
  }
  return points / SCORED_FIELDS.length;
}
