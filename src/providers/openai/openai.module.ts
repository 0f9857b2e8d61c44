import { Module, Global } from '@nestjs/common';
import { OpenAIService } from './openai.service';
import { LLM_CLIENT } from '../../modules/pipeline/pipeline.interfaces';

@Global()
@Module({
  providers: [OpenAIService, { provide: LLM_CLIENT, useExisting: OpenAIService }],
  exports: [OpenAIService, LLM_CLIENT],
})
export class OpenAIModule {}
