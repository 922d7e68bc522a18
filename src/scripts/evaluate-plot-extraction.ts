import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { promises as fs } from 'fs';
import * as path from 'path';
import { AppModule } from '../app.module';
import { EvaluationService } from '../evaluation/evaluation.service';
import { GroundTruthService } from '../ground-truth/ground-truth.service';
import { LLMTokenUsage } from '../llm/interfaces/llm.interface';
import { LLMService } from '../llm/llm.service';
import { PlotExtractionService } from '../plot-extraction/plot-extraction.service';

const IMAGE_MIME_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
};

export function summarize(scores: readonly number[]): { count: number; mean: number; std: number } {
  if (scores.length === 0) {
    return { count: 0, mean: 0, std: 0 };
  }
  const mean = scores.reduce((sum, s) => sum + s, 0) / scores.length;
  const variance = scores.reduce((sum, s) => sum + (s - mean) ** 2, 0) / scores.length;
  return { count: scores.length, mean, std: Math.sqrt(variance) };
}

export function formatTokenUsage(usage: Readonly<Record<string, LLMTokenUsage>>): string[] {
  return Object.entries(usage).map(
    ([model, { inputTokens, outputTokens, totalTokens }]) =>
      `${model}: ${inputTokens} in / ${outputTokens} out / ${totalTokens} total tokens`,
  );
}

/**
 * Extracts every figure image in a directory and scores it against the
 * ground truth file of the same base name.
 */
async function evaluatePlotExtraction(imageDir: string, labelDir: string) {
  const app = await NestFactory.createApplicationContext(AppModule);
  const extractionService = app.get(PlotExtractionService);
  const groundTruthService = app.get(GroundTruthService);
  const evaluationService = app.get(EvaluationService);
  const llmService = app.get(LLMService);

  try {
    const images = (await fs.readdir(imageDir))
      .filter((file) => Object.hasOwn(IMAGE_MIME_TYPES, path.extname(file).toLowerCase()))
      .sort();
    console.log(`Evaluating ${images.length} figure(s) from ${imageDir}...`);

    const scores: number[] = [];
    for (const image of images) {
      const extension = path.extname(image);
      const figureId = path.basename(image, extension);
      const labelPath = path.join(labelDir, `${figureId}.json`);

      let score = 0.0;
      try {
        const reference = await groundTruthService.loadPlots(labelPath);
        const extraction = await extractionService.extractPlotData(
          {
            id: figureId,
            imageBuffer: await fs.readFile(path.join(imageDir, image)),
            mimeType: IMAGE_MIME_TYPES[extension.toLowerCase()],
            context: '',
          },
          reference.length,
        );

        if (extraction.data) {
          score = evaluationService.evaluatePlots(extraction.data, reference).score;
        } else {
          console.error(`Extraction failed for ${figureId}: ${extraction.errors.join('; ')}`);
        }
      } catch (error) {
        console.error(`Failed to evaluate figure ${figureId}:`, error);
      }

      scores.push(score);
      console.log(`${figureId}: ${score.toFixed(4)}`);
    }

    const { count, mean, std } = summarize(scores);
    console.log(`Figures: ${count}`);
    console.log(`Mean score: ${mean.toFixed(4)}`);
    console.log(`Std score: ${std.toFixed(4)}`);
    for (const line of formatTokenUsage(llmService.getAndResetTokenUsage())) {
      console.log(line);
    }
  } catch (error) {
    console.error('Error evaluating plot extraction:', error);
    process.exitCode = 1;
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  const [imageDir, labelDir] = process.argv.slice(2);
  if (!imageDir) {
    console.error('Usage: evaluate-plot-extraction <imageDir> [labelDir]');
    process.exit(1);
  }
  void evaluatePlotExtraction(imageDir, labelDir ?? imageDir);
}
