import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SupabaseService } from '../../providers/supabase/supabase.service';
import {
  ARTIFACT_STORAGE,
  AUDIO_DECODER,
  ArtifactStorage,
  AudioDecoder,
  LLM_CLIENT,
  LlmClient,
  SPEECH_ENGINE,
  SpeechEngine,
  SpeechEngineInfo,
} from '../pipeline/pipeline.interfaces';

export interface HealthResponseDto {
  /** 解码器与语音引擎都可用时为 healthy */
  status: 'healthy' | 'degraded';
  version: string;
  engine: SpeechEngineInfo;
  decoder: { available: boolean };
  diarization: { enabled_by_default: boolean };
  refinement: { available: boolean };
  storage: { available: boolean };
  persistence: 'supabase' | 'memory';
  queue: 'bullmq' | 'local';
}

/**
 * 健康检查：汇总各能力对象的可用性
 */
@Injectable()
export class HealthService {
  constructor(
    @Inject(AUDIO_DECODER) private readonly decoder: AudioDecoder,
    @Inject(SPEECH_ENGINE) private readonly engine: SpeechEngine,
    @Inject(LLM_CLIENT) private readonly llm: LlmClient,
    @Inject(ARTIFACT_STORAGE) private readonly storage: ArtifactStorage,
    private readonly supabaseService: SupabaseService,
    private readonly configService: ConfigService,
  ) {}

  async getHealth(): Promise<HealthResponseDto> {
    const engine = this.engine.info();
    const decoderAvailable = await this.decoder.canRun();

    return {
      status: engine.loaded && decoderAvailable ? 'healthy' : 'degraded',
      version: this.configService.get<string>('version') ?? 'unknown',
      engine,
      decoder: { available: decoderAvailable },
      diarization: { enabled_by_default: this.configService.get<boolean>('defaults.diarization') ?? true },
      refinement: { available: this.llm.isAvailable() },
      storage: { available: this.storage.isAvailable() },
      persistence: this.supabaseService.isConfigured() ? 'supabase' : 'memory',
      queue: this.configService.get<boolean>('redis.enabled') ? 'bullmq' : 'local',
    };
  }
}
