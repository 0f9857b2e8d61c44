import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import {
  ConfigError,
  ErrorKind,
  NotReadyError,
  TaskCancelledError,
  TaskFailedError,
  TaskNotFoundError,
} from '../../common/errors/pipeline.errors';
import {
  OutputFormat,
  PipelineStage,
  Task,
  TaskConfig,
  TaskStatus,
  emptyFlags,
  isTerminal,
} from '../../database/entities';
import { SegmentRefinerService } from '../transcripts/segment-refiner.service';
import { TranscriptsService } from '../transcripts/transcripts.service';
import { CONTENT_TYPES } from '../transcripts/encoders';
import { TASK_DISPATCHER, TASK_STORE } from './constants';
import { TaskDispatcher } from './task-dispatcher';
import { TaskStore } from './task-store';
import { InputPolicy, resolveInputRef } from './input-ref';
import { CreateTaskDto, CreateTaskResponseDto } from './dto/create-task.dto';
import {
  CancelTaskResponseDto,
  ExportResponseDto,
  TaskResultResponseDto,
  TaskStatusResponseDto,
} from './dto/task.dto';

const OUTPUT_FORMATS: readonly string[] = Object.values(OutputFormat);

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.includes(value);
}

@Injectable()
export class TasksService {
  private readonly logger = new Logger(TasksService.name);
  private readonly pollInterval: number;
  private readonly inputPolicy: InputPolicy;

  constructor(
    @Inject(TASK_STORE) private readonly store: TaskStore,
    @Inject(TASK_DISPATCHER) private readonly dispatcher: TaskDispatcher,
    private readonly refiner: SegmentRefinerService,
    private readonly transcriptsService: TranscriptsService,
    private readonly configService: ConfigService,
  ) {
    this.pollInterval = this.configService.get<number>('task.pollIntervalSeconds') || 5;
    this.inputPolicy = {
      allowedExtensions: this.configService.get<string[]>('input.allowedExtensions') ?? [],
      root: this.configService.get<string | null>('input.root') ?? null,
      allowedSchemes: this.configService.get<string[]>('input.allowedSchemes') ?? [],
    };
  }

  /**
   * 创建任务
   * 配置在提交时校验并固化到任务上，校验失败不会入队
   */
  async createTask(dto: CreateTaskDto): Promise<CreateTaskResponseDto> {
    const inputRef = resolveInputRef(dto.input_ref, this.inputPolicy);
    const config = this.buildConfig(dto);
    const now = new Date().toISOString();

    const task: Task = {
      id: uuidv4(),
      status: TaskStatus.QUEUED,
      input_ref: inputRef,
      config,
      stage_results: {},
      result: null,
      flags: emptyFlags(),
      error: null,
      cancel_requested: false,
      language: null,
      duration_sec: null,
      created_at: now,
      updated_at: now,
    };

    await this.store.create(task);
    await this.dispatcher.dispatch(task.id);

    this.logger.log(`Task created and queued: ${task.id}`);

    return {
      task_id: task.id,
      status: TaskStatus.QUEUED,
      retry_after: this.pollInterval,
    };
  }

  /**
   * 获取任务状态
   */
  async getStatus(taskId: string): Promise<TaskStatusResponseDto> {
    const task = await this.findTask(taskId);

    const response: TaskStatusResponseDto = {
      task_id: task.id,
      status: task.status,
      flags: task.flags,
      error: task.error,
      cancel_requested: task.cancel_requested,
      language: task.language,
      duration_sec: task.duration_sec,
      created_at: task.created_at,
      updated_at: task.updated_at,
    };

    // 进行中的任务添加 retry_after
    if (!isTerminal(task.status)) {
      response.retry_after = this.pollInterval;
    }

    return response;
  }

  /**
   * 获取任务结果（仅 COMPLETED 可用）
   */
  async getResult(taskId: string): Promise<TaskResultResponseDto> {
    const task = await this.findCompletedTask(taskId);

    const segments = task.result ?? [];
    const speakers = new Set<string>();
    for (const seg of segments) {
      if (seg.speaker_id) speakers.add(seg.speaker_id);
    }

    return {
      task_id: task.id,
      language: task.language,
      duration_sec: task.duration_sec,
      speakers: [...speakers].sort(),
      segments,
      flags: task.flags,
      artifacts: task.stage_results.encode?.artifacts ?? {},
    };
  }

  /**
   * 按需重新编码最终字幕
   */
  async exportTranscript(taskId: string, format: string): Promise<ExportResponseDto> {
    if (!isOutputFormat(format)) {
      throw new ConfigError(`Unsupported format: ${format}`);
    }
    const task = await this.findCompletedTask(taskId);

    const content = this.transcriptsService.render(format, task.result ?? [], {
      language: task.language,
      speakerLabels: task.config.speaker_labels,
    });

    return {
      format,
      filename: `${task.id}.${format}`,
      content_type: CONTENT_TYPES[format],
      content,
    };
  }

  /**
   * 取消任务
   * 排队中的任务立即取消；运行中的任务在下一个阶段边界取消；终态任务不受影响
   */
  async cancelTask(taskId: string): Promise<CancelTaskResponseDto> {
    const task = await this.findTask(taskId);

    if (isTerminal(task.status)) {
      return { task_id: task.id, status: task.status, cancel_requested: task.cancel_requested };
    }

    if (await this.store.cancelIfQueued(taskId)) {
      this.logger.log(`Task ${taskId} cancelled while queued`);
      return { task_id: taskId, status: TaskStatus.CANCELLED, cancel_requested: true };
    }

    await this.store.requestCancel(taskId);
    const current = await this.findTask(taskId);
    this.logger.log(`Cancellation requested for task ${taskId} (status: ${current.status})`);
    return { task_id: taskId, status: current.status, cancel_requested: current.cancel_requested };
  }

  private async findTask(taskId: string): Promise<Task> {
    const task = await this.store.get(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    return task;
  }

  private async findCompletedTask(taskId: string): Promise<Task> {
    const task = await this.findTask(taskId);

    switch (task.status) {
      case TaskStatus.COMPLETED:
        return task;
      case TaskStatus.FAILED:
        throw new TaskFailedError(
          taskId,
          task.error ?? { kind: ErrorKind.INFERENCE, message: 'Unknown error', stage: null },
        );
      case TaskStatus.CANCELLED:
        throw new TaskCancelledError(taskId);
      default:
        throw new NotReadyError(taskId, task.status);
    }
  }

  /**
   * 合并请求参数与默认配置，生成任务配置快照
   */
  private buildConfig(dto: CreateTaskDto): TaskConfig {
    const defaultFormats = (this.configService.get<string[]>('defaults.formats') ?? []).filter(isOutputFormat);
    const formats = [...new Set(dto.formats ?? defaultFormats)];
    if (formats.length === 0) {
      throw new ConfigError('At least one output format is required');
    }

    const diarizationEnabled =
      dto.diarization?.enabled ?? this.configService.get<boolean>('defaults.diarization') ?? true;
    const minSpeakers = dto.diarization?.min_speakers ?? null;
    const maxSpeakers = dto.diarization?.max_speakers ?? null;
    if (minSpeakers !== null && maxSpeakers !== null && minSpeakers > maxSpeakers) {
      throw new ConfigError(`min_speakers (${minSpeakers}) must not exceed max_speakers (${maxSpeakers})`);
    }
    if (!diarizationEnabled && (minSpeakers !== null || maxSpeakers !== null)) {
      throw new ConfigError('Speaker count hints require diarization to be enabled');
    }

    const refinement = {
      semantic_segmentation: dto.refinement?.semantic_segmentation ?? false,
      error_correction: dto.refinement?.error_correction ?? false,
      expression_optimization: dto.refinement?.expression_optimization ?? false,
      translate_to: dto.refinement?.translate_to?.trim() || null,
    };
    const anyOption =
      refinement.semantic_segmentation ||
      refinement.error_correction ||
      refinement.expression_optimization ||
      refinement.translate_to !== null;
    const refinementEnabled = dto.refinement?.enabled ?? anyOption;

    if (refinementEnabled && !anyOption) {
      throw new ConfigError('Refinement is enabled but no refinement option is selected');
    }
    if (refinementEnabled && !this.refiner.isAvailable()) {
      throw new ConfigError('Refinement requested but no LLM backend is configured');
    }

    return {
      language: dto.language?.trim() || null,
      formats,
      speaker_labels: dto.speaker_labels ?? this.configService.get<boolean>('defaults.speakerLabels') ?? true,
      diarization: {
        enabled: diarizationEnabled,
        min_speakers: minSpeakers,
        max_speakers: maxSpeakers,
      },
      refinement: { ...refinement, enabled: refinementEnabled },
      timeouts: this.stageTimeouts(),
    };
  }

  private stageTimeouts(): Record<PipelineStage, number> {
    const timeout = (stage: PipelineStage) =>
      this.configService.get<number>(`pipeline.timeouts.${stage}`) ?? 0;

    return {
      [PipelineStage.DECODE]: timeout(PipelineStage.DECODE),
      [PipelineStage.TRANSCRIBE]: timeout(PipelineStage.TRANSCRIBE),
      [PipelineStage.ALIGN]: timeout(PipelineStage.ALIGN),
      [PipelineStage.DIARIZE]: timeout(PipelineStage.DIARIZE),
      [PipelineStage.REFINE]: timeout(PipelineStage.REFINE),
      [PipelineStage.ENCODE]: timeout(PipelineStage.ENCODE),
    };
  }
}
