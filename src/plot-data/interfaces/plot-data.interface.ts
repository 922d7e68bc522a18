export type AxisSide = 'left' | 'right';

export type Coordinate = readonly [number, number];

export interface DataPoint {
  readonly x: number;
  readonly y: number;
  readonly seriesName: string;
  readonly axis: AxisSide;
}

/**
 * One named trace of a plot. Point order carries no meaning; the points are
 * geometric samples, not a sequence.
 */
export interface DataSeries {
  readonly name: string;
  readonly points: readonly DataPoint[];
  readonly axis: AxisSide;
  readonly color?: string;
  readonly markerStyle?: string;
}

export interface PlotMetadata {
  readonly xAxisLabel: string;
  readonly xAxisUnit: string;
  readonly leftYAxisLabel: string;
  readonly leftYAxisUnit: string;
  // Empty unless isDualAxis
  readonly rightYAxisLabel: string;
  readonly rightYAxisUnit: string;
  readonly plotTitle: string;
  readonly isDualAxis: boolean;
}

/**
 * Structured digitization of a single subplot. Series names are unique within
 * one instance.
 */
export interface ExtractedPlotData {
  readonly metadata: PlotMetadata;
  readonly dataSeries: readonly DataSeries[];
  readonly technicalTakeaways: readonly string[];
}

/**
 * Lower-ceremony digitization: series name to its [x, y] pairs, plus the flat
 * labels the extractor managed to read.
 */
export interface LinePlotData {
  readonly nameToCoordinates: Readonly<Record<string, readonly Coordinate[]>>;
  readonly title: string | null;
  readonly xAxisLabel: string | null;
  readonly xAxisUnit: string | null;
  readonly yLeftAxisLabel: string | null;
  readonly yLeftAxisUnit: string | null;
}
