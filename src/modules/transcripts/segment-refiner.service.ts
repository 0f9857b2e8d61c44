import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LLMError, errorMessage } from '../../common/errors/pipeline.errors';
import { retryWithBackoff, throwIfAborted } from '../../common/utils/async.utils';
import {
  RefinementOptions,
  RefinementResult,
  Segment,
  SpeakerAssignment,
} from '../../database/entities';
import { LLM_CLIENT, LlmClient } from '../pipeline/pipeline.interfaces';
import { AnchoredSpan, RefineCandidate, reanchor } from './reanchor';
import { buildInstruction, serializeTranscript } from './refinement-prompt';
import { buildSegment, joinWords, renumber } from './segment-builder';

export interface RefinerSettings {
  maxRetries: number;
  retryDelayMs: number;
  anchorThreshold: number;
  maxGapWords: number;
  batchSize: number;
}

interface Batch {
  segments: Segment[];
  assignments: SpeakerAssignment[];
  /** 每个片段在 assignments 中的起始下标（长度为片段数 + 1） */
  bounds: number[];
}

/**
 * 片段精修服务
 *
 * 把 ASR + 说话人分离的结果交给 LLM 重新分段、纠错、润色和翻译，
 * 再把 LLM 返回的片段重新锚定到原始词时间戳上。LLM 的输出只是建议：
 * 时间戳永远来自原始词，无法回溯的部分回退到原始分段。
 */
@Injectable()
export class SegmentRefinerService {
  private readonly logger = new Logger(SegmentRefinerService.name);
  private readonly settings: RefinerSettings;

  constructor(
    @Inject(LLM_CLIENT) private readonly llm: LlmClient,
    configService: ConfigService,
  ) {
    this.settings = {
      maxRetries: configService.get<number>('refinement.maxRetries') ?? 2,
      retryDelayMs: configService.get<number>('refinement.retryDelayMs') ?? 1000,
      anchorThreshold: configService.get<number>('refinement.anchorThreshold') ?? 0.6,
      maxGapWords: configService.get<number>('refinement.maxGapWords') ?? 3,
      batchSize: configService.get<number>('refinement.batchSize') ?? 40,
    };
  }

  isAvailable(): boolean {
    return this.llm.isAvailable();
  }

  /**
   * 精修字幕
   * @param segments 原始分段（按顺序完整覆盖 assignments）
   * @param assignments 每个词的说话人归属
   * @param signal 中止后不再发起新的批次或重试，并以中止原因拒绝
   */
  async refine(
    segments: Segment[],
    assignments: SpeakerAssignment[],
    options: RefinementOptions,
    language: string | null = null,
    signal?: AbortSignal,
  ): Promise<RefinementResult> {
    const result: RefinementResult = { segments: [], degraded: false, partial: false, errors: [] };
    if (segments.length === 0) {
      return result;
    }

    const instruction = buildInstruction(options);
    const batches = this.toBatches(segments, assignments);
    const output: Segment[] = [];

    for (const [index, batch] of batches.entries()) {
      throwIfAborted(signal);
      const label = `batch ${index + 1}/${batches.length}`;

      let candidates: RefineCandidate[];
      try {
        candidates = await this.requestCandidates(batch, instruction, label, signal);
      } catch (error) {
        throwIfAborted(signal);
        if (!(error instanceof LLMError)) throw error;
        this.logger.warn(`Refinement ${label} degraded, keeping original segments: ${error.message}`);
        result.degraded = true;
        result.errors.push(`${error.reason}: ${error.message}`);
        output.push(...batch.segments);
        continue;
      }

      const words = batch.assignments.map((a) => a.word);
      const { spans, mismatches } = reanchor(candidates, words, {
        threshold: this.settings.anchorThreshold,
        maxGapWords: this.settings.maxGapWords,
      });

      if (mismatches.length > 0) {
        this.logger.warn(
          `Refinement ${label}: ${mismatches.length}/${candidates.length} candidates could not be anchored`,
        );
      }

      for (const span of spans) {
        const built = this.buildFromSpan(span, batch, options, language);
        if (built.some((s) => s.refinement_partial)) result.partial = true;
        output.push(...built);
      }
    }

    result.segments = renumber(output);
    this.logger.log(
      `Refined ${segments.length} -> ${result.segments.length} segments` +
        `${result.degraded ? ' (degraded)' : ''}${result.partial ? ' (partial)' : ''}`,
    );
    return result;
  }

  private async requestCandidates(
    batch: Batch,
    instruction: string,
    label: string,
    signal?: AbortSignal,
  ): Promise<RefineCandidate[]> {
    const payload = serializeTranscript(batch.segments);

    return retryWithBackoff(() => this.llm.refine(payload, instruction, signal), {
      signal,
      retries: this.settings.maxRetries,
      baseDelayMs: this.settings.retryDelayMs,
      shouldRetry: (error) => error instanceof LLMError && error.reason !== 'unavailable',
      onRetry: (error, attempt, delayMs) =>
        this.logger.warn(
          `Refinement ${label} failed (${errorMessage(error)}), retry ${attempt}/${this.settings.maxRetries} in ${delayMs}ms`,
        ),
    });
  }

  private toBatches(segments: Segment[], assignments: SpeakerAssignment[]): Batch[] {
    const size = Math.max(1, this.settings.batchSize);
    const batches: Batch[] = [];
    let offset = 0;

    for (let i = 0; i < segments.length; i += size) {
      const group = segments.slice(i, i + size);
      const bounds = [0];
      for (const seg of group) {
        bounds.push(bounds[bounds.length - 1] + seg.words.length);
      }
      const count = bounds[bounds.length - 1];
      batches.push({ segments: group, assignments: assignments.slice(offset, offset + count), bounds });
      offset += count;
    }

    return batches;
  }

  private buildFromSpan(
    span: AnchoredSpan,
    batch: Batch,
    options: RefinementOptions,
    language: string | null,
  ): Segment[] {
    if (span.kind === 'anchored') {
      const translation = options.translate_to ? span.translation?.trim() || null : null;
      return [
        buildSegment(0, {
          text: span.text,
          assignments: batch.assignments.slice(span.firstWord, span.lastWord + 1),
          translated_text: translation,
          refinement_partial: span.partial,
        }),
      ];
    }

    // 回退：按原始分段边界切分该范围
    const fallback: Segment[] = [];
    batch.segments.forEach((seg, i) => {
      const segFirst = batch.bounds[i];
      const segLast = batch.bounds[i + 1] - 1;
      const first = Math.max(span.firstWord, segFirst);
      const last = Math.min(span.lastWord, segLast);
      if (first > last) return;

      const slice = batch.assignments.slice(first, last + 1);
      const whole = first === segFirst && last === segLast;
      fallback.push(
        buildSegment(0, {
          text: whole
            ? seg.text
            : joinWords(
                slice.map((a) => a.word),
                language,
              ),
          assignments: slice,
          refinement_partial: true,
        }),
      );
    });
    return fallback;
  }
}
