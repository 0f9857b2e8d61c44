import { Injectable, OnModuleInit, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile } from 'fs/promises';
import { InferenceError, errorMessage } from '../../common/errors/pipeline.errors';
import {
  AlignedSegment,
  DecodedAudio,
  PipelineStage,
  SpeakerTurn,
  TranscriptionResult,
  TranscriptionSegment,
  Word,
} from '../../database/entities';
import {
  DiarizeOptions,
  SpeechEngine,
  SpeechEngineInfo,
} from '../../modules/pipeline/pipeline.interfaces';

/**
 * Deepgram 转录参数
 * @see https://developers.deepgram.com/docs/features
 */
export interface DeepgramListenOptions {
  /** 指定音频语言（BCP-47 格式）；为空时自动检测 */
  language?: string | null;
  /** 识别说话人变化，为每个词分配 speaker ID */
  diarize?: boolean;
}

export interface DeepgramWord {
  word: string;
  start: number;
  end: number;
  confidence: number;
  speaker?: number;
  punctuated_word?: string;
}

// Deepgram utterance（按语义分段的结果）
export interface DeepgramUtterance {
  start: number;
  end: number;
  confidence: number;
  channel: number;
  transcript: string;
  speaker?: number;
  words: DeepgramWord[];
}

export interface DeepgramListenResponse {
  metadata?: { duration?: number; request_id?: string };
  results: {
    channels: Array<{
      detected_language?: string;
      alternatives: Array<{
        transcript: string;
        confidence: number;
        words: DeepgramWord[];
      }>;
    }>;
    // utterances 是按语义分段的结果，比 words 更适合做字幕
    utterances?: DeepgramUtterance[];
  };
}

function isListenResponse(body: unknown): body is DeepgramListenResponse {
  if (typeof body !== 'object' || body === null || !('results' in body)) return false;
  const { results } = body;
  return (
    typeof results === 'object' &&
    results !== null &&
    'channels' in results &&
    Array.isArray(results.channels)
  );
}

// 无 utterances 时，按超过 1 秒的停顿切分
const TIME_GAP_THRESHOLD = 1.0;

function toWord(word: DeepgramWord): Word {
  return {
    text: word.punctuated_word || word.word,
    start: word.start,
    end: word.end,
    confidence: word.confidence,
  };
}

export function speakerLabel(speaker: number): string {
  return `SPEAKER_${String(speaker).padStart(2, '0')}`;
}

/**
 * 从 Deepgram 结果提取 ASR 分段
 * 优先使用 utterances，fallback 到按停顿切分 words
 */
export function extractSegments(response: DeepgramListenResponse): TranscriptionSegment[] {
  const utterances = response.results.utterances ?? [];
  if (utterances.length > 0) {
    return utterances.map((u) => ({
      start: u.start,
      end: u.end,
      text: u.transcript.trim(),
      words: u.words.map(toWord),
    }));
  }

  const words = response.results.channels[0]?.alternatives[0]?.words ?? [];
  const segments: TranscriptionSegment[] = [];
  let current: Word[] = [];

  const flush = () => {
    if (current.length === 0) return;
    segments.push({
      start: current[0].start,
      end: current[current.length - 1].end,
      text: current.map((w) => w.text).join(' '),
      words: current,
    });
    current = [];
  };

  for (const raw of words) {
    const word = toWord(raw);
    const last = current[current.length - 1];
    if (last && word.start - last.end > TIME_GAP_THRESHOLD) {
      flush();
    }
    current.push(word);
  }
  flush();

  return segments;
}

/**
 * 从 diarize 结果提取说话人发言，合并同一说话人的相邻发言
 */
export function extractTurns(response: DeepgramListenResponse): SpeakerTurn[] {
  const utterances = [...(response.results.utterances ?? [])].sort((a, b) => a.start - b.start);
  if (utterances.length === 0) {
    return [];
  }
  if (utterances.every((u) => u.speaker === undefined)) {
    throw new InferenceError(PipelineStage.DIARIZE, 'Deepgram response carries no speaker labels');
  }

  const turns: SpeakerTurn[] = [];
  for (const utterance of utterances) {
    if (utterance.speaker === undefined) continue;
    const speaker_id = speakerLabel(utterance.speaker);
    const last = turns[turns.length - 1];
    if (last && last.speaker_id === speaker_id) {
      last.end = Math.max(last.end, utterance.end);
    } else {
      turns.push({ speaker_id, start: utterance.start, end: utterance.end });
    }
  }
  return turns;
}

/**
 * 基于 Deepgram 的语音引擎
 * 转录结果自带词级时间戳，因此对齐阶段直接采用这些时间戳
 */
@Injectable()
export class DeepgramService implements SpeechEngine, OnModuleInit {
  private readonly logger = new Logger(DeepgramService.name);
  private apiKey = '';
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly requestTimeoutMs: number;

  constructor(private configService: ConfigService) {
    this.baseUrl = this.configService.get<string>('deepgram.baseUrl') || 'https://api.deepgram.com/v1';
    this.model = this.configService.get<string>('deepgram.model') || 'nova-2';
    this.requestTimeoutMs = this.configService.get<number>('deepgram.requestTimeoutMs') ?? 30 * 60 * 1000;
  }

  onModuleInit() {
    this.apiKey = this.configService.get<string>('deepgram.apiKey') || '';
    if (!this.apiKey) {
      this.logger.warn('Deepgram API key not configured');
    } else {
      this.logger.log('Deepgram service initialized');
    }
  }

  info(): SpeechEngineInfo {
    return { engine: 'deepgram', model: this.model, loaded: this.apiKey.length > 0 };
  }

  async transcribe(
    audio: DecodedAudio,
    options: { language: string | null },
  ): Promise<TranscriptionResult> {
    const response = await this.listen(audio, PipelineStage.TRANSCRIBE, {
      language: options.language,
      diarize: false,
    });

    const segments = extractSegments(response);
    const language =
      response.results.channels[0]?.detected_language || options.language || 'unknown';

    this.logger.log(
      `Deepgram transcription: duration=${response.metadata?.duration ?? audio.duration_sec}s, ` +
        `language=${language}, segments=${segments.length}`,
    );
    return { language, segments };
  }

  async align(_audio: DecodedAudio, transcription: TranscriptionResult): Promise<AlignedSegment[]> {
    return transcription.segments.map((segment, i) => {
      if (!segment.words) {
        throw new InferenceError(PipelineStage.ALIGN, `Segment ${i} has no word timestamps`);
      }
      return { text: segment.text, words: segment.words };
    });
  }

  async diarize(audio: DecodedAudio, options: DiarizeOptions): Promise<SpeakerTurn[]> {
    if (options.min_speakers !== null || options.max_speakers !== null) {
      this.logger.debug('Deepgram does not accept speaker count hints, ignoring min/max speakers');
    }

    const response = await this.listen(audio, PipelineStage.DIARIZE, { diarize: true });
    const turns = extractTurns(response);

    const speakers = new Set(turns.map((t) => t.speaker_id));
    this.logger.log(`Deepgram diarization: turns=${turns.length}, speakers=${speakers.size}`);
    return turns;
  }

  /**
   * 上传音频并同步等待结果
   */
  private async listen(
    audio: DecodedAudio,
    stage: PipelineStage,
    options: DeepgramListenOptions,
  ): Promise<DeepgramListenResponse> {
    if (!this.apiKey) {
      throw new InferenceError(stage, 'Deepgram API key not configured');
    }

    const params = new URLSearchParams({
      model: this.model,
      punctuate: 'true', // 添加标点
      smart_format: 'true',
      utterances: 'true', // 返回语义分段
      diarize: String(options.diarize ?? false),
    });

    if (options.language) {
      params.set('language', options.language);
    } else {
      params.set('detect_language', 'true'); // 自动检测语言
    }

    let body: unknown;
    try {
      const content = await readFile(audio.path);
      const response = await fetch(`${this.baseUrl}/listen?${params.toString()}`, {
        method: 'POST',
        headers: {
          Authorization: `Token ${this.apiKey}`,
          'Content-Type': 'audio/wav',
        },
        body: new Uint8Array(content),
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });

      if (!response.ok) {
        const error = await response.text();
        throw new Error(`Deepgram API error: ${response.status} - ${error}`);
      }

      body = await response.json();
    } catch (error) {
      throw new InferenceError(stage, errorMessage(error));
    }

    if (!isListenResponse(body)) {
      throw new InferenceError(stage, 'Unexpected Deepgram response format');
    }
    return body;
  }
}
