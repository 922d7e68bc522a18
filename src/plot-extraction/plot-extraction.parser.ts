import { z } from 'zod';
import { errorMessage } from '../common/error-message';
import { ExtractedPlotData, LinePlotData } from '../plot-data/interfaces/plot-data.interface';
import { formatZodIssues } from '../plot-data/plot-data.errors';
import { createExtractedPlotData, createLinePlotData } from '../plot-data/plot-data.factory';
import { axisSideSchema, coordinateSchema } from '../plot-data/plot-data.schema';

export class PlotResponseParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PlotResponseParseError';
  }
}

const label = z
  .string()
  .nullish()
  .transform((value) => value?.trim() ?? '');

const visionSeriesSchema = z.object({
  name: z.string().min(1),
  axis: z
    .string()
    .nullish()
    .transform((value) => value?.trim().toLowerCase() || 'left')
    .pipe(axisSideSchema),
  color: z.string().nullish(),
  marker_style: z.string().nullish(),
  points: z.array(z.object({ x: z.number(), y: z.number() })).default([]),
});

const visionPlotSchema = z.object({
  subplots: z.array(
    z.object({
      metadata: z
        .object({
          x_axis_label: label,
          x_axis_unit: label,
          left_y_axis_label: label,
          left_y_axis_unit: label,
          right_y_axis_label: label,
          right_y_axis_unit: label,
          plot_title: label,
          is_dual_axis: z.boolean().nullish(),
        })
        .default({}),
      data_series: z.array(visionSeriesSchema).default([]),
      technical_takeaways: z.array(z.string()).default([]),
    }),
  ),
});

type VisionSubplot = z.infer<typeof visionPlotSchema>['subplots'][number];

function extractJsonObject(response: string): unknown {
  const match = response.trim().match(/\{[\s\S]*\}/);
  if (!match) {
    throw new PlotResponseParseError('No JSON object found in model response');
  }
  try {
    return JSON.parse(match[0]);
  } catch (error) {
    throw new PlotResponseParseError(`Model response is not valid JSON: ${errorMessage(error)}`);
  }
}

function toPlotData(subplot: VisionSubplot): ExtractedPlotData {
  const { metadata } = subplot;
  // A right-axis series implies a second y-axis even when the flag was missed
  const isDualAxis = !!metadata.is_dual_axis || subplot.data_series.some((s) => s.axis === 'right');

  return createExtractedPlotData({
    metadata: {
      xAxisLabel: metadata.x_axis_label,
      xAxisUnit: metadata.x_axis_unit,
      leftYAxisLabel: metadata.left_y_axis_label,
      leftYAxisUnit: metadata.left_y_axis_unit,
      rightYAxisLabel: isDualAxis ? metadata.right_y_axis_label : '',
      rightYAxisUnit: isDualAxis ? metadata.right_y_axis_unit : '',
      plotTitle: metadata.plot_title,
      isDualAxis,
    },
    dataSeries: subplot.data_series.map((series) => ({
      name: series.name,
      axis: series.axis,
      color: series.color ?? undefined,
      markerStyle: series.marker_style ?? undefined,
      points: series.points,
    })),
    technicalTakeaways: subplot.technical_takeaways,
  });
}

/**
 * Parses the JSON reply to the structured plot prompt into one
 * ExtractedPlotData per subplot, in the order the model listed them.
 */
export function parseStructuredPlotResponse(response: string): ExtractedPlotData[] {
  const parsed = visionPlotSchema.safeParse(extractJsonObject(response));
  if (!parsed.success) {
    throw new PlotResponseParseError(
      `Model response does not match the plot schema: ${formatZodIssues(parsed.error).join('; ')}`,
    );
  }
  return parsed.data.subplots.map(toPlotData);
}

type LinePlotMetadataKey = 'title' | 'xAxisLabel' | 'xAxisUnit' | 'yLeftAxisLabel' | 'yLeftAxisUnit';

const METADATA_PATTERNS: Array<[LinePlotMetadataKey, RegExp]> = [
  ['title', /^title:\s*(.*)$/],
  ['xAxisLabel', /^x_axis_label:\s*(.*)$/],
  ['xAxisUnit', /^x_axis_unit:\s*(.*)$/],
  ['yLeftAxisLabel', /^y_left_axis_label:\s*(.*)$/],
  ['yLeftAxisUnit', /^y_left_axis_unit:\s*(.*)$/],
];

const SERIES_LINE_PATTERN = /^(.*?):\s*(\[\[.*\]\])$/;
const coordinateListSchema = z.array(coordinateSchema);

/**
 * Parses the line-oriented reply to the line plot prompt:
 * `Series name: [[x1, y1], [x2, y2]]` lines followed by `key: value` metadata.
 */
export function parseLinePlotResponse(response: string): LinePlotData {
  const nameToCoordinates: Record<string, Array<[number, number]>> = {};
  const metadata: Record<LinePlotMetadataKey, string | null> = {
    title: null,
    xAxisLabel: null,
    xAxisUnit: null,
    yLeftAxisLabel: null,
    yLeftAxisUnit: null,
  };

  for (const rawLine of response.trim().split('\n')) {
    const line = rawLine.trim();

    const seriesMatch = line.match(SERIES_LINE_PATTERN);
    if (seriesMatch) {
      const [, name, coordinates] = seriesMatch;
      let values: unknown;
      try {
        values = JSON.parse(coordinates);
      } catch {
        throw new PlotResponseParseError(`Unreadable coordinates for series "${name}"`);
      }
      const parsed = coordinateListSchema.safeParse(values);
      if (!parsed.success) {
        throw new PlotResponseParseError(
          `Invalid coordinates for series "${name}": ${formatZodIssues(parsed.error).join('; ')}`,
        );
      }
      nameToCoordinates[name.trim()] = parsed.data;
      continue;
    }

    for (const [key, pattern] of METADATA_PATTERNS) {
      const match = line.match(pattern);
      if (match) {
        metadata[key] = match[1].trim() || null;
        break;
      }
    }
  }

  if (Object.keys(nameToCoordinates).length === 0) {
    throw new PlotResponseParseError('No data series found in model response');
  }

  return createLinePlotData({ nameToCoordinates, ...metadata });
}
