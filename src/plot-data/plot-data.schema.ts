import { z } from 'zod';

const coordinateValue = z.number().finite();
const seriesName = z.string().min(1, 'series name must not be empty');

export const axisSideSchema = z.enum(['left', 'right']);

export const coordinateSchema = z.tuple([coordinateValue, coordinateValue]);

export const dataPointInputSchema = z.object({
  x: coordinateValue,
  y: coordinateValue,
  seriesName: seriesName.optional(),
  axis: axisSideSchema.optional(),
});

export const dataSeriesInputSchema = z
  .object({
    name: seriesName,
    points: z.array(dataPointInputSchema),
    axis: axisSideSchema.default('left'),
    color: z.string().optional(),
    markerStyle: z.string().optional(),
  })
  .superRefine((series, ctx) => {
    series.points.forEach((point, index) => {
      if (point.seriesName !== undefined && point.seriesName !== series.name) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['points', index, 'seriesName'],
          message: `point belongs to "${point.seriesName}" but is listed under "${series.name}"`,
        });
      }
      if (point.axis !== undefined && point.axis !== series.axis) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['points', index, 'axis'],
          message: `point is on the ${point.axis} axis but its series is on the ${series.axis} axis`,
        });
      }
    });
  });

export const plotMetadataInputSchema = z
  .object({
    xAxisLabel: z.string().default(''),
    xAxisUnit: z.string().default(''),
    leftYAxisLabel: z.string().default(''),
    leftYAxisUnit: z.string().default(''),
    rightYAxisLabel: z.string().nullish(),
    rightYAxisUnit: z.string().nullish(),
    plotTitle: z.string().default(''),
    isDualAxis: z.boolean().default(false),
  })
  .superRefine((metadata, ctx) => {
    if (metadata.isDualAxis) {
      return;
    }
    for (const field of ['rightYAxisLabel', 'rightYAxisUnit'] as const) {
      if (metadata[field]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [field],
          message: 'must be empty when the plot has a single y-axis',
        });
      }
    }
  });

export const extractedPlotDataInputSchema = z
  .object({
    metadata: plotMetadataInputSchema,
    dataSeries: z.array(dataSeriesInputSchema),
    technicalTakeaways: z.array(z.string()).default([]),
  })
  .superRefine((plot, ctx) => {
    const seen = new Set<string>();
    plot.dataSeries.forEach((series, index) => {
      if (seen.has(series.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['dataSeries', index, 'name'],
          message: `duplicate series name "${series.name}"`,
        });
      }
      seen.add(series.name);

      if (series.axis === 'right' && !plot.metadata.isDualAxis) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['dataSeries', index, 'axis'],
          message: 'right-axis series on a plot with a single y-axis',
        });
      }
    });
  });

export const linePlotDataInputSchema = z.object({
  nameToCoordinates: z.record(z.string(), z.array(coordinateSchema)),
  title: z.string().nullish(),
  xAxisLabel: z.string().nullish(),
  xAxisUnit: z.string().nullish(),
  yLeftAxisLabel: z.string().nullish(),
  yLeftAxisUnit: z.string().nullish(),
});

export type DataPointInput = z.input<typeof dataPointInputSchema>;
export type DataSeriesInput = z.input<typeof dataSeriesInputSchema>;
export type PlotMetadataInput = z.input<typeof plotMetadataInputSchema>;
export type ExtractedPlotDataInput = z.input<typeof extractedPlotDataInputSchema>;
export type LinePlotDataInput = z.input<typeof linePlotDataInputSchema>;
