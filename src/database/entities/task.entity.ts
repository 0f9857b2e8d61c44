import {
  AlignedSegment,
  OutputFormat,
  Segment,
  SpeakerTurn,
  TranscriptionResult,
} from './transcript.entity';

/**
 * 任务状态枚举
 * 顺序即推进顺序，状态只前进不回退
 */
export enum TaskStatus {
  QUEUED = 'queued',
  DECODING = 'decoding',
  TRANSCRIBING = 'transcribing',
  ALIGNING = 'aligning',
  DIARIZING = 'diarizing',
  REFINING = 'refining',
  ENCODING = 'encoding',
  COMPLETED = 'completed',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

export const TERMINAL_STATUSES: readonly TaskStatus[] = [
  TaskStatus.COMPLETED,
  TaskStatus.FAILED,
  TaskStatus.CANCELLED,
];

export const RUNNING_STATUSES: readonly TaskStatus[] = [
  TaskStatus.DECODING,
  TaskStatus.TRANSCRIBING,
  TaskStatus.ALIGNING,
  TaskStatus.DIARIZING,
  TaskStatus.REFINING,
  TaskStatus.ENCODING,
];

const STATUS_RANK: Record<TaskStatus, number> = {
  [TaskStatus.QUEUED]: 0,
  [TaskStatus.DECODING]: 1,
  [TaskStatus.TRANSCRIBING]: 2,
  [TaskStatus.ALIGNING]: 3,
  [TaskStatus.DIARIZING]: 4,
  [TaskStatus.REFINING]: 5,
  [TaskStatus.ENCODING]: 6,
  [TaskStatus.COMPLETED]: 7,
  [TaskStatus.FAILED]: 7,
  [TaskStatus.CANCELLED]: 7,
};

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * 判断状态迁移是否合法（只允许前进；终态不可再迁移）
 */
export function canAdvance(from: TaskStatus, to: TaskStatus): boolean {
  if (isTerminal(from)) return false;
  return STATUS_RANK[to] > STATUS_RANK[from];
}

/**
 * 允许写入更新的存储状态：非终态；更新带状态时还必须是前进
 */
export function writableStatuses(target?: TaskStatus): TaskStatus[] {
  return Object.values(TaskStatus).filter(
    (status) => !isTerminal(status) && (target === undefined || canAdvance(status, target)),
  );
}

/**
 * 流水线阶段
 */
export enum PipelineStage {
  DECODE = 'decode',
  TRANSCRIBE = 'transcribe',
  ALIGN = 'align',
  DIARIZE = 'diarize',
  REFINE = 'refine',
  ENCODE = 'encode',
}

export interface RefinementOptions {
  semantic_segmentation: boolean;
  error_correction: boolean;
  expression_optimization: boolean;
  translate_to: string | null;
}

/**
 * 任务配置快照（提交时固化）
 */
export interface TaskConfig {
  language: string | null;
  formats: OutputFormat[];
  speaker_labels: boolean;
  diarization: {
    enabled: boolean;
    min_speakers: number | null;
    max_speakers: number | null;
  };
  refinement: RefinementOptions & { enabled: boolean };
  timeouts: Record<PipelineStage, number>; // 毫秒
}

/**
 * 解码后的音频（16kHz 单声道 WAV）
 */
export interface DecodedAudio {
  path: string;
  duration_sec: number;
  sample_rate: number;
}

export interface DiarizationResult {
  turns: SpeakerTurn[];
  degraded: boolean;
}

export interface RefinementResult {
  segments: Segment[];
  degraded: boolean;
  partial: boolean;
  errors: string[];
}

export type ArtifactResult =
  | { status: 'succeeded'; url: string | null; bytes: number }
  | { status: 'failed'; error: string };

export interface EncodingResult {
  artifacts: Partial<Record<OutputFormat, ArtifactResult>>;
}

/**
 * 各阶段产出（按阶段记录，用于断点续跑与排查）
 */
export interface StageOutputs {
  [PipelineStage.DECODE]: DecodedAudio;
  [PipelineStage.TRANSCRIBE]: TranscriptionResult;
  [PipelineStage.ALIGN]: { segments: AlignedSegment[] };
  [PipelineStage.DIARIZE]: DiarizationResult;
  [PipelineStage.REFINE]: RefinementResult;
  [PipelineStage.ENCODE]: EncodingResult;
}

export type StageResults = Partial<StageOutputs>;

export interface TaskWarning {
  stage: PipelineStage;
  kind: string;
  message: string;
}

/**
 * 降级标记（非致命错误全部记录在此）
 */
export interface TaskFlags {
  diarization_degraded: boolean;
  refinement_degraded: boolean;
  refinement_partial: boolean;
  failed_formats: OutputFormat[];
  warnings: TaskWarning[];
}

export interface TaskError {
  kind: string;
  message: string;
  stage: PipelineStage | null;
}

/**
 * 任务实体（对应 tasks 表）
 */
export interface Task {
  id: string; // uuid
  status: TaskStatus;
  input_ref: string;
  config: TaskConfig;
  stage_results: StageResults;
  result: Segment[] | null; // 完成后回填
  flags: TaskFlags;
  error: TaskError | null;
  cancel_requested: boolean;
  language: string | null;
  duration_sec: number | null;
  created_at: string;
  updated_at: string;
}

export type TaskPatch = Partial<Omit<Task, 'id' | 'created_at'>>;

export function emptyFlags(): TaskFlags {
  return {
    diarization_degraded: false,
    refinement_degraded: false,
    refinement_partial: false,
    failed_formats: [],
    warnings: [],
  };
}
