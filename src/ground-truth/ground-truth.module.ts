import { Module } from '@nestjs/common';
import { GroundTruthService } from './ground-truth.service';

@Module({
  providers: [GroundTruthService],
  exports: [GroundTruthService],
})
export class GroundTruthModule {}
