import { PipelineStage, TaskStatus } from '../../database/entities';

/**
 * 流水线错误类型
 * kind 会原样写入任务记录并通过状态接口返回
 */
export enum ErrorKind {
  INFERENCE = 'InferenceError',
  LLM = 'LLMError',
  ALIGNMENT_MISMATCH = 'AlignmentMismatchError',
  CONFIG = 'ConfigError',
  TIMEOUT = 'TimeoutError',
  NOT_READY = 'NotReady',
  NOT_FOUND = 'TaskNotFound',
  TASK_FAILED = 'TaskFailed',
  TASK_CANCELLED = 'TaskCancelled',
}

export abstract class PipelineError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * 解码 / 转录 / 对齐 / 说话人分离等推理调用失败
 */
export class InferenceError extends PipelineError {
  readonly kind = ErrorKind.INFERENCE;

  constructor(
    readonly stage: PipelineStage,
    message: string,
  ) {
    super(message);
  }
}

export type LLMErrorReason =
  | 'timeout'
  | 'rate_limited'
  | 'malformed_response'
  | 'empty_output'
  | 'unavailable'
  | 'request_failed';

export class LLMError extends PipelineError {
  readonly kind = ErrorKind.LLM;

  constructor(
    readonly reason: LLMErrorReason,
    message: string,
  ) {
    super(message);
  }
}

/**
 * LLM 文本无法回溯到原始词序列（仅在精修内部使用，不对外暴露）
 */
export class AlignmentMismatchError extends PipelineError {
  readonly kind = ErrorKind.ALIGNMENT_MISMATCH;

  constructor(
    readonly similarity: number,
    readonly threshold: number,
    message = `Candidate similarity ${similarity.toFixed(3)} is below threshold ${threshold}`,
  ) {
    super(message);
  }
}

export class ConfigError extends PipelineError {
  readonly kind = ErrorKind.CONFIG;
}

export class StageTimeoutError extends PipelineError {
  readonly kind = ErrorKind.TIMEOUT;

  constructor(
    readonly stage: PipelineStage | null,
    readonly timeoutMs: number,
  ) {
    super(`${stage ?? 'operation'} timed out after ${timeoutMs}ms`);
  }
}

export class NotReadyError extends PipelineError {
  readonly kind = ErrorKind.NOT_READY;

  constructor(
    readonly taskId: string,
    readonly status: TaskStatus,
  ) {
    super(`Task ${taskId} is not ready (status: ${status})`);
  }
}

export class TaskNotFoundError extends PipelineError {
  readonly kind = ErrorKind.NOT_FOUND;

  constructor(readonly taskId: string) {
    super(`Task ${taskId} not found`);
  }
}

export class TaskFailedError extends PipelineError {
  readonly kind = ErrorKind.TASK_FAILED;

  constructor(
    readonly taskId: string,
    readonly failure: { kind: string; message: string; stage: PipelineStage | null },
  ) {
    super(`Task ${taskId} failed: ${failure.kind}: ${failure.message}`);
  }
}

export class TaskCancelledError extends PipelineError {
  readonly kind = ErrorKind.TASK_CANCELLED;

  constructor(readonly taskId: string) {
    super(`Task ${taskId} was cancelled`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * 未分类的异常按推理错误处理
 */
export function errorKind(error: unknown): string {
  return error instanceof PipelineError ? error.kind : ErrorKind.INFERENCE;
}
