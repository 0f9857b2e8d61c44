import { Module, Global } from '@nestjs/common';
import { DeepgramService } from './deepgram.service';
import { SPEECH_ENGINE } from '../../modules/pipeline/pipeline.interfaces';

@Global()
@Module({
  providers: [DeepgramService, { provide: SPEECH_ENGINE, useExisting: DeepgramService }],
  exports: [DeepgramService, SPEECH_ENGINE],
})
export class DeepgramModule {}
