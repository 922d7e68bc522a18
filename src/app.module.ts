import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EvaluationModule } from './evaluation/evaluation.module';
import { GroundTruthModule } from './ground-truth/ground-truth.module';
import { PlotExtractionModule } from './plot-extraction/plot-extraction.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    EvaluationModule,
    GroundTruthModule,
    PlotExtractionModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
