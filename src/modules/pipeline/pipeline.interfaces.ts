import {
  AlignedSegment,
  DecodedAudio,
  SpeakerTurn,
  TranscriptionResult,
} from '../../database/entities';
import { RefineCandidate } from '../transcripts/reanchor';

/**
 * 外部能力对象
 * 在模块初始化时加载一次，跨任务复用，关闭时释放
 */
export const AUDIO_DECODER = Symbol('AUDIO_DECODER');
export const SPEECH_ENGINE = Symbol('SPEECH_ENGINE');
export const LLM_CLIENT = Symbol('LLM_CLIENT');
export const ARTIFACT_STORAGE = Symbol('ARTIFACT_STORAGE');

export interface AudioDecoder {
  /** 解码为 16kHz 单声道 WAV；失败时抛出 InferenceError */
  decode(inputRef: string, taskId: string): Promise<DecodedAudio>;
  /** 解码结果是否仍可复用（断点续跑时检查临时文件） */
  isAvailable(audio: DecodedAudio): Promise<boolean>;
  release(audio: DecodedAudio): Promise<void>;
  /** 解码器本身能否运行（健康检查） */
  canRun(): Promise<boolean>;
}

export interface DiarizeOptions {
  min_speakers: number | null;
  max_speakers: number | null;
}

export interface SpeechEngineInfo {
  engine: string;
  model: string;
  /** 已完成初始化、可以接受请求 */
  loaded: boolean;
}

export interface SpeechEngine {
  info(): SpeechEngineInfo;
  transcribe(audio: DecodedAudio, options: { language: string | null }): Promise<TranscriptionResult>;
  align(audio: DecodedAudio, transcription: TranscriptionResult): Promise<AlignedSegment[]>;
  diarize(audio: DecodedAudio, options: DiarizeOptions): Promise<SpeakerTurn[]>;
}

export interface LlmClient {
  isAvailable(): boolean;
  /** 失败时抛出 LLMError；signal 中止时放弃进行中的请求 */
  refine(serializedTranscript: string, instruction: string, signal?: AbortSignal): Promise<RefineCandidate[]>;
}

export interface ArtifactStorage {
  isAvailable(): boolean;
  upload(key: string, body: string, contentType: string): Promise<string>;
}
