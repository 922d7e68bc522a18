import { Module } from '@nestjs/common';
import { PlotExtractionService } from './plot-extraction.service';
import { LLMModule } from '../llm/llm.module';

@Module({
  imports: [LLMModule],
  providers: [PlotExtractionService],
  exports: [PlotExtractionService],
})
export class PlotExtractionModule {}
