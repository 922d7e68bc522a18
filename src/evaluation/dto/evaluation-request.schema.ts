import { z } from 'zod';
import { coordinateSchema, extractedPlotDataInputSchema } from '../../plot-data/plot-data.schema';

export const evaluatePlotsRequestSchema = z.object({
  predicted: z.array(extractedPlotDataInputSchema),
  reference: z.array(extractedPlotDataInputSchema),
});

const coordinateMapSchema = z.record(z.string(), z.array(coordinateSchema));

export const evaluatePointsRequestSchema = z.object({
  predicted: coordinateMapSchema,
  reference: coordinateMapSchema,
  errorMetric: z.enum(['rmse', 'mae']).optional(),
});
