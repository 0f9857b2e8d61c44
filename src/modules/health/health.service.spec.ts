import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { SupabaseService } from '../../providers/supabase/supabase.service';
import {
  ARTIFACT_STORAGE,
  AUDIO_DECODER,
  LLM_CLIENT,
  SPEECH_ENGINE,
  SpeechEngineInfo,
} from '../pipeline/pipeline.interfaces';
import { HealthService } from './health.service';

describe('HealthService', () => {
  let decoderUsable: boolean;
  let engineInfo: SpeechEngineInfo;
  let service: HealthService;

  beforeEach(async () => {
    decoderUsable = true;
    engineInfo = { engine: 'deepgram', model: 'nova-2', loaded: true };
    const config = new ConfigService({
      version: '1.2.3',
      defaults: { diarization: false },
      redis: { enabled: true },
    });

    const moduleRef = await Test.createTestingModule({
      providers: [
        HealthService,
        { provide: AUDIO_DECODER, useValue: { canRun: async () => decoderUsable } },
        { provide: SPEECH_ENGINE, useValue: { info: () => engineInfo } },
        { provide: LLM_CLIENT, useValue: { isAvailable: () => false } },
        { provide: ARTIFACT_STORAGE, useValue: { isAvailable: () => true } },
        { provide: SupabaseService, useValue: new SupabaseService(config) },
        { provide: ConfigService, useValue: config },
      ],
    }).compile();

    service = moduleRef.get(HealthService);
  });

  it('should report every capability', async () => {
    await expect(service.getHealth()).resolves.toEqual({
      status: 'healthy',
      version: '1.2.3',
      engine: { engine: 'deepgram', model: 'nova-2', loaded: true },
      decoder: { available: true },
      diarization: { enabled_by_default: false },
      refinement: { available: false },
      storage: { available: true },
      persistence: 'memory',
      queue: 'bullmq',
    });
  });

  it('should be degraded when the decoder cannot run', async () => {
    decoderUsable = false;

    const health = await service.getHealth();

    expect(health.status).toBe('degraded');
    expect(health.decoder).toEqual({ available: false });
  });

  it('should be degraded when the speech engine is not initialized', async () => {
    engineInfo = { engine: 'deepgram', model: 'nova-2', loaded: false };

    await expect(service.getHealth()).resolves.toMatchObject({ status: 'degraded', engine: { loaded: false } });
  });
});
