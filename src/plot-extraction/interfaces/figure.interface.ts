/**
 * A figure handed over by the upstream figure extractor.
 */
export interface FigureInput {
  id: string;
  imageBuffer: Buffer;
  mimeType: string;
  // Caption and surrounding paper text
  context: string;
}

export interface PlotExtractionResult<T> {
  figureId: string;
  data: T | null;
  errors: string[];
  model?: string;
}
