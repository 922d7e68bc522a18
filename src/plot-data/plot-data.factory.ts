import { z } from 'zod';
import {
  AxisSide,
  Coordinate,
  DataPoint,
  DataSeries,
  ExtractedPlotData,
  LinePlotData,
  PlotMetadata,
} from './interfaces/plot-data.interface';
import {
  dataPointInputSchema,
  DataPointInput,
  dataSeriesInputSchema,
  DataSeriesInput,
  extractedPlotDataInputSchema,
  ExtractedPlotDataInput,
  linePlotDataInputSchema,
  LinePlotDataInput,
  plotMetadataInputSchema,
  PlotMetadataInput,
} from './plot-data.schema';
import { PlotDataValidationError } from './plot-data.errors';

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown, subject: string): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw PlotDataValidationError.fromZodError(subject, parsed.error);
  }
  return parsed.data;
}

type ParsedPoint = z.output<typeof dataPointInputSchema>;
type ParsedSeries = z.output<typeof dataSeriesInputSchema>;
type ParsedMetadata = z.output<typeof plotMetadataInputSchema>;

function buildPoint(point: ParsedPoint, seriesName: string, axis: AxisSide): DataPoint {
  return Object.freeze({ x: point.x, y: point.y, seriesName, axis });
}

function buildSeries(series: ParsedSeries): DataSeries {
  const points = Object.freeze(series.points.map((p) => buildPoint(p, series.name, series.axis)));
  return Object.freeze({
    name: series.name,
    points,
    axis: series.axis,
    ...(series.color !== undefined ? { color: series.color } : {}),
    ...(series.markerStyle !== undefined ? { markerStyle: series.markerStyle } : {}),
  });
}

function buildMetadata(metadata: ParsedMetadata): PlotMetadata {
  return Object.freeze({
    xAxisLabel: metadata.xAxisLabel,
    xAxisUnit: metadata.xAxisUnit,
    leftYAxisLabel: metadata.leftYAxisLabel,
    leftYAxisUnit: metadata.leftYAxisUnit,
    rightYAxisLabel: metadata.rightYAxisLabel ?? '',
    rightYAxisUnit: metadata.rightYAxisUnit ?? '',
    plotTitle: metadata.plotTitle,
    isDualAxis: metadata.isDualAxis,
  });
}

export function createDataPoint(input: DataPointInput & { seriesName: string }): DataPoint {
  const point = parseOrThrow(dataPointInputSchema.required({ seriesName: true }), input, 'data point');
  return buildPoint(point, point.seriesName, point.axis ?? 'left');
}

export function createDataSeries(input: DataSeriesInput): DataSeries {
  return buildSeries(parseOrThrow(dataSeriesInputSchema, input, `data series "${input.name}"`));
}

export function createPlotMetadata(input: PlotMetadataInput = {}): PlotMetadata {
  return buildMetadata(parseOrThrow(plotMetadataInputSchema, input, 'plot metadata'));
}

export function createExtractedPlotData(input: ExtractedPlotDataInput): ExtractedPlotData {
  const plot = parseOrThrow(extractedPlotDataInputSchema, input, 'plot data');
  return Object.freeze({
    metadata: buildMetadata(plot.metadata),
    dataSeries: Object.freeze(plot.dataSeries.map(buildSeries)),
    technicalTakeaways: Object.freeze([...plot.technicalTakeaways]),
  });
}

export function createLinePlotData(input: LinePlotDataInput): LinePlotData {
  const plot = parseOrThrow(linePlotDataInputSchema, input, 'line plot data');
  const nameToCoordinates: Record<string, readonly Coordinate[]> = {};
  for (const [name, coordinates] of Object.entries(plot.nameToCoordinates)) {
    nameToCoordinates[name] = Object.freeze(
      coordinates.map(([x, y]) => {
        const pair: Coordinate = [x, y];
        return Object.freeze(pair);
      }),
    );
  }

  return Object.freeze({
    nameToCoordinates: Object.freeze(nameToCoordinates),
    title: plot.title ?? null,
    xAxisLabel: plot.xAxisLabel ?? null,
    xAxisUnit: plot.xAxisUnit ?? null,
    yLeftAxisLabel: plot.yLeftAxisLabel ?? null,
    yLeftAxisUnit: plot.yLeftAxisUnit ?? null,
  });
}

/**
 * Builds series from a plain coordinate map, every point on the left axis.
 */
export function seriesFromCoordinates(
  nameToCoordinates: Readonly<Record<string, readonly Coordinate[]>>,
): DataSeriesInput[] {
  return Object.entries(nameToCoordinates).map(([name, coordinates]) => ({
    name,
    axis: 'left',
    points: coordinates.map(([x, y]) => ({ x, y })),
  }));
}
