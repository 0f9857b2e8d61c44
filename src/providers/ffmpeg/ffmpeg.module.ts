import { Module, Global } from '@nestjs/common';
import { FfmpegService } from './ffmpeg.service';
import { AUDIO_DECODER } from '../../modules/pipeline/pipeline.interfaces';

@Global()
@Module({
  providers: [FfmpegService, { provide: AUDIO_DECODER, useExisting: FfmpegService }],
  exports: [FfmpegService, AUDIO_DECODER],
})
export class FfmpegModule {}
