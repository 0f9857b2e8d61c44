import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  ErrorKind,
  StageTimeoutError,
  TaskCancelledError,
  errorKind,
  errorMessage,
} from '../../common/errors/pipeline.errors';
import { withTimeout } from '../../common/utils/async.utils';
import {
  DecodedAudio,
  EncodingResult,
  OutputFormat,
  PipelineStage,
  RefinementOptions,
  RefinementResult,
  Segment,
  SpeakerTurn,
  StageResults,
  Task,
  TaskPatch,
  TaskStatus,
  canAdvance,
  isTerminal,
} from '../../database/entities';
import {
  AUDIO_DECODER,
  AudioDecoder,
  SPEECH_ENGINE,
  SpeechEngine,
} from '../pipeline/pipeline.interfaces';
import { SegmentRefinerService } from '../transcripts/segment-refiner.service';
import { buildBaseSegments, normalizeAlignedSegments } from '../transcripts/segment-builder';
import { TranscriptsService } from '../transcripts/transcripts.service';
import { TASK_STORE } from './constants';
import { TaskStore } from './task-store';

export interface TaskJobData {
  task_id: string;
}

/**
 * 单个阶段的执行结果
 */
type StageOutcome<T> =
  | { status: 'success'; value: T; reused: boolean }
  | { status: 'degraded'; value: T; error: unknown }
  | { status: 'fatal'; error: unknown };

interface StageDefinition<T> {
  /** 之前投递中已记录的结果 */
  recorded: T | undefined;
  /** 把结果写回 stage_results */
  record: (value: T) => StageResults;
  /** 超时后 signal 被中止，阶段应停止发起新的外部调用 */
  run: (signal: AbortSignal) => Promise<T>;
  /** 失败时的降级结果；未提供表示该阶段失败即任务失败 */
  fallback?: (error: unknown) => T;
  /** 已记录的结果能否直接复用（默认可以） */
  reusable?: (recorded: T) => Promise<boolean>;
}

/**
 * 存储拒绝了写入：任务已被其他写入方（取消、清理）置为终态
 */
class TaskSupersededError extends Error {
  constructor(readonly taskId: string) {
    super(`Task ${taskId} was finished by another writer`);
  }
}

/**
 * 致命阶段失败（仅在本文件内部传递）
 */
class FatalStageError extends Error {
  constructor(
    readonly stage: PipelineStage,
    readonly failure: unknown,
  ) {
    super(errorMessage(failure));
  }
}

const STAGE_STATUS: Record<PipelineStage, TaskStatus> = {
  [PipelineStage.DECODE]: TaskStatus.DECODING,
  [PipelineStage.TRANSCRIBE]: TaskStatus.TRANSCRIBING,
  [PipelineStage.ALIGN]: TaskStatus.ALIGNING,
  [PipelineStage.DIARIZE]: TaskStatus.DIARIZING,
  [PipelineStage.REFINE]: TaskStatus.REFINING,
  [PipelineStage.ENCODE]: TaskStatus.ENCODING,
};

/**
 * 任务编排（流水线状态机）
 *
 * decode → transcribe → align → [diarize] → [refine] → encode
 * 每个阶段的产出先写入 stage_results 再推进，重新投递的任务从第一个
 * 没有记录的阶段继续。取消请求在阶段边界处理。
 */
@Injectable()
export class TaskProcessorService {
  private readonly logger = new Logger(TaskProcessorService.name);

  constructor(
    @Inject(TASK_STORE) private readonly store: TaskStore,
    @Inject(AUDIO_DECODER) private readonly decoder: AudioDecoder,
    @Inject(SPEECH_ENGINE) private readonly engine: SpeechEngine,
    private readonly refiner: SegmentRefinerService,
    private readonly transcriptsService: TranscriptsService,
  ) {}

  /**
   * 处理任务（核心逻辑），返回任务最终状态
   * 阶段错误按策略记录到任务上；存储等基础设施错误向上抛出，交给队列重试
   */
  async processTask(taskId: string): Promise<TaskStatus> {
    const task = await this.store.get(taskId);
    if (!task) {
      this.logger.warn(`[Task ${taskId}] not found, skipping`);
      return TaskStatus.FAILED;
    }
    if (isTerminal(task.status)) {
      this.logger.log(`[Task ${taskId}] already ${task.status}, skipping`);
      return task.status;
    }

    this.logger.log(`[Task ${taskId}] processing (status: ${task.status})`);
    const startedAt = Date.now();

    try {
      await this.runPipeline(task);
      this.logger.log(`[Task ${taskId}] ${task.status} in ${Date.now() - startedAt}ms`);
      return task.status;
    } catch (error) {
      if (error instanceof TaskSupersededError) {
        await this.adoptStoredStatus(task);
        this.logger.warn(`[Task ${taskId}] became ${task.status} while running, stopping`);
        await this.releaseAudio(task, task.stage_results.decode);
        return task.status;
      }
      if (error instanceof TaskCancelledError) {
        await this.finish(task, TaskStatus.CANCELLED, {});
        this.logger.log(`[Task ${taskId}] cancelled`);
        return task.status;
      }
      if (error instanceof FatalStageError) {
        const message = errorMessage(error.failure);
        this.logger.error(`[Task ${taskId}] failed at ${error.stage}: ${message}`);
        await this.finish(task, TaskStatus.FAILED, {
          error: { kind: errorKind(error.failure), message, stage: error.stage },
        });
        return task.status;
      }
      throw error;
    }
  }

  private async runPipeline(task: Task): Promise<void> {
    const { config } = task;

    const audio = await this.unwrap(
      task,
      PipelineStage.DECODE,
      await this.runStage(task, PipelineStage.DECODE, {
        recorded: task.stage_results.decode,
        record: (decode) => ({ ...task.stage_results, decode }),
        run: () => this.decoder.decode(task.input_ref, task.id),
        // 临时文件可能已被清理
        reusable: (recorded) => this.decoder.isAvailable(recorded),
      }),
    );
    if (task.duration_sec === null) {
      await this.patch(task, { duration_sec: audio.duration_sec });
    }

    const transcription = await this.unwrap(
      task,
      PipelineStage.TRANSCRIBE,
      await this.runStage(task, PipelineStage.TRANSCRIBE, {
        recorded: task.stage_results.transcribe,
        record: (transcribe) => ({ ...task.stage_results, transcribe }),
        run: () => this.engine.transcribe(audio, { language: config.language }),
      }),
    );
    const language = transcription.language || config.language;
    if (task.language !== language) {
      await this.patch(task, { language });
    }

    const aligned = await this.unwrap(
      task,
      PipelineStage.ALIGN,
      await this.runStage(task, PipelineStage.ALIGN, {
        recorded: task.stage_results.align,
        record: (align) => ({ ...task.stage_results, align }),
        run: async () => ({
          segments: normalizeAlignedSegments(await this.engine.align(audio, transcription)),
        }),
      }),
    );

    let turns: SpeakerTurn[] = [];
    if (config.diarization.enabled) {
      const diarization = await this.unwrap(
        task,
        PipelineStage.DIARIZE,
        await this.runStage(task, PipelineStage.DIARIZE, {
          recorded: task.stage_results.diarize,
          record: (diarize) => ({ ...task.stage_results, diarize }),
          run: async () => ({
            turns: await this.engine.diarize(audio, {
              min_speakers: config.diarization.min_speakers,
              max_speakers: config.diarization.max_speakers,
            }),
            degraded: false,
          }),
          fallback: () => ({ turns: [], degraded: true }),
        }),
      );
      turns = diarization.turns;
    }

    const base = buildBaseSegments(aligned.segments, turns, language);
    let segments: Segment[] = base.segments;

    if (config.refinement.enabled) {
      const options: RefinementOptions = {
        semantic_segmentation: config.refinement.semantic_segmentation,
        error_correction: config.refinement.error_correction,
        expression_optimization: config.refinement.expression_optimization,
        translate_to: config.refinement.translate_to,
      };
      const outcome = await this.runStage(task, PipelineStage.REFINE, {
        recorded: task.stage_results.refine,
        record: (refine) => ({ ...task.stage_results, refine }),
        run: (signal) => this.refiner.refine(base.segments, base.assignments, options, language, signal),
        fallback: (error): RefinementResult => ({
          segments: base.segments,
          degraded: true,
          partial: false,
          errors: [errorMessage(error)],
        }),
      });
      const refinement = await this.unwrap(task, PipelineStage.REFINE, outcome);
      if (outcome.status === 'success' && !outcome.reused) {
        await this.recordRefinementFlags(task, refinement);
      }
      segments = refinement.segments;
    }

    const encodeOptions = { language, speakerLabels: config.speaker_labels };
    const encodeOutcome = await this.runStage(task, PipelineStage.ENCODE, {
      recorded: task.stage_results.encode,
      record: (encode) => ({ ...task.stage_results, encode }),
      run: () => this.transcriptsService.exportTranscript(task.id, segments, config.formats, encodeOptions),
      fallback: (error) => failAllFormats(config.formats, errorMessage(error)),
    });
    const encoding = await this.unwrap(task, PipelineStage.ENCODE, encodeOutcome);
    if (encodeOutcome.status === 'success' && !encodeOutcome.reused) {
      await this.recordEncodingFlags(task, encoding);
    }

    await this.checkCancellation(task);
    await this.finish(task, TaskStatus.COMPLETED, { result: segments, language });
  }

  /**
   * 执行单个阶段：检查取消 → 复用已记录结果或推进状态并在超时内执行 → 记录结果
   */
  private async runStage<T>(
    task: Task,
    stage: PipelineStage,
    definition: StageDefinition<T>,
  ): Promise<StageOutcome<T>> {
    await this.checkCancellation(task);

    const { recorded } = definition;
    if (recorded !== undefined) {
      const reusable = definition.reusable ? await definition.reusable(recorded) : true;
      if (reusable) {
        this.logger.log(`[Task ${task.id}] reusing recorded ${stage} result`);
        return { status: 'success', value: recorded, reused: true };
      }
    }

    await this.advance(task, STAGE_STATUS[stage]);

    const timeoutMs = task.config.timeouts[stage];
    const startedAt = Date.now();
    let outcome: StageOutcome<T>;

    const controller = new AbortController();
    try {
      const value = await withTimeout(
        definition.run(controller.signal),
        timeoutMs,
        () => new StageTimeoutError(stage, timeoutMs),
        controller,
      );
      outcome = { status: 'success', value, reused: false };
      this.logger.log(`[Task ${task.id}] ${stage} finished in ${Date.now() - startedAt}ms`);
    } catch (error) {
      if (!definition.fallback) {
        return { status: 'fatal', error };
      }
      outcome = { status: 'degraded', value: definition.fallback(error), error };
    }

    await this.patch(task, { stage_results: definition.record(outcome.value) });
    return outcome;
  }

  /**
   * 取出阶段结果；降级时记录告警，致命时中止流水线
   */
  private async unwrap<T>(task: Task, stage: PipelineStage, outcome: StageOutcome<T>): Promise<T> {
    if (outcome.status === 'fatal') {
      throw new FatalStageError(stage, outcome.error);
    }
    if (outcome.status === 'degraded') {
      const message = errorMessage(outcome.error);
      this.logger.warn(`[Task ${task.id}] ${stage} degraded: ${message}`);

      const warning = { stage, kind: errorKind(outcome.error), message };
      const flags = { ...task.flags, warnings: [...task.flags.warnings, warning] };
      if (stage === PipelineStage.DIARIZE) flags.diarization_degraded = true;
      if (stage === PipelineStage.REFINE) flags.refinement_degraded = true;
      if (stage === PipelineStage.ENCODE) flags.failed_formats = [...task.config.formats];
      await this.patch(task, { flags });
    }
    return outcome.value;
  }

  private async recordRefinementFlags(task: Task, refinement: RefinementResult): Promise<void> {
    if (!refinement.degraded && !refinement.partial) return;

    const warnings = refinement.errors.map((message) => ({
      stage: PipelineStage.REFINE,
      kind: ErrorKind.LLM,
      message,
    }));
    await this.patch(task, {
      flags: {
        ...task.flags,
        refinement_degraded: task.flags.refinement_degraded || refinement.degraded,
        refinement_partial: task.flags.refinement_partial || refinement.partial,
        warnings: [...task.flags.warnings, ...warnings],
      },
    });
  }

  private async recordEncodingFlags(task: Task, encoding: EncodingResult): Promise<void> {
    const failed: OutputFormat[] = [];
    const warnings = [...task.flags.warnings];

    for (const format of task.config.formats) {
      const artifact = encoding.artifacts[format];
      if (artifact?.status === 'failed') {
        failed.push(format);
        warnings.push({
          stage: PipelineStage.ENCODE,
          kind: ErrorKind.INFERENCE,
          message: `${format}: ${artifact.error}`,
        });
      }
    }
    if (failed.length === 0) return;

    this.logger.warn(`[Task ${task.id}] formats failed: ${failed.join(', ')}`);
    await this.patch(task, { flags: { ...task.flags, failed_formats: failed, warnings } });
  }

  /**
   * 在阶段边界检查取消请求（从存储读取最新状态）
   */
  private async checkCancellation(task: Task): Promise<void> {
    const current = await this.store.get(task.id);
    if (!current) {
      throw new Error(`Task ${task.id} disappeared from the store`);
    }
    if (current.cancel_requested || current.status === TaskStatus.CANCELLED) {
      throw new TaskCancelledError(task.id);
    }
  }

  /**
   * 推进状态（只前进，不回退）
   */
  private async advance(task: Task, status: TaskStatus): Promise<void> {
    if (!canAdvance(task.status, status)) return;
    await this.patch(task, { status });
  }

  /**
   * 进入终态并释放解码后的音频
   * 任务已被其他写入方置为终态时沿用存储中的状态
   */
  private async finish(task: Task, status: TaskStatus, patch: TaskPatch): Promise<void> {
    try {
      await this.patch(task, { ...patch, status });
    } catch (error) {
      if (!(error instanceof TaskSupersededError)) throw error;
      await this.adoptStoredStatus(task);
    }
    await this.releaseAudio(task, task.stage_results.decode);
  }

  private async adoptStoredStatus(task: Task): Promise<void> {
    const current = await this.store.get(task.id);
    if (current) task.status = current.status;
  }

  private async releaseAudio(task: Task, audio: DecodedAudio | undefined): Promise<void> {
    if (!audio) return;
    try {
      await this.decoder.release(audio);
    } catch (error) {
      this.logger.warn(`[Task ${task.id}] failed to release decoded audio: ${errorMessage(error)}`);
    }
  }

  /**
   * 条件写入；存储拒绝时中止流水线
   */
  private async patch(task: Task, patch: TaskPatch): Promise<void> {
    if (!(await this.store.update(task.id, patch))) {
      throw new TaskSupersededError(task.id);
    }
    Object.assign(task, patch);
  }
}

function failAllFormats(formats: OutputFormat[], error: string): EncodingResult {
  const artifacts: EncodingResult['artifacts'] = {};
  for (const format of formats) {
    artifacts[format] = { status: 'failed', error };
  }
  return { artifacts };
}
