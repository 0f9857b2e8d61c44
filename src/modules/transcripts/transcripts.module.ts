import { Module } from '@nestjs/common';
import { SegmentRefinerService } from './segment-refiner.service';
import { TranscriptsService } from './transcripts.service';

@Module({
  providers: [TranscriptsService, SegmentRefinerService],
  exports: [TranscriptsService, SegmentRefinerService],
})
export class TranscriptsModule {}
