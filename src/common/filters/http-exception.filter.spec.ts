import { HttpStatus } from '@nestjs/common';
import {
  ConfigError,
  NotReadyError,
  StageTimeoutError,
  TaskCancelledError,
  TaskFailedError,
  TaskNotFoundError,
} from '../errors/pipeline.errors';
import { PipelineStage, TaskStatus } from '../../database/entities';
import { ErrorCode } from '../interfaces/response.interface';
import { describePipelineError } from './http-exception.filter';

describe('describePipelineError', () => {
  it('should map lookups of unknown tasks to 404', () => {
    expect(describePipelineError(new TaskNotFoundError('t1'))).toEqual({
      status: HttpStatus.NOT_FOUND,
      error: { code: ErrorCode.NOT_FOUND, message: 'Task t1 not found' },
    });
  });

  it('should include the current status for unfinished tasks', () => {
    expect(describePipelineError(new NotReadyError('t1', TaskStatus.ALIGNING))).toEqual({
      status: HttpStatus.CONFLICT,
      error: {
        code: ErrorCode.NOT_READY,
        message: 'Task t1 is not ready (status: aligning)',
        details: { status: 'aligning' },
      },
    });
  });

  it('should map invalid configuration to 400', () => {
    const { status, error } = describePipelineError(new ConfigError('Unsupported format: docx'));

    expect(status).toBe(HttpStatus.BAD_REQUEST);
    expect(error).toEqual({ code: ErrorCode.CONFIG_ERROR, message: 'Unsupported format: docx' });
  });

  it('should expose the recorded failure of a failed task', () => {
    const failure = { kind: 'InferenceError', message: 'engine down', stage: PipelineStage.TRANSCRIBE };

    expect(describePipelineError(new TaskFailedError('t1', failure))).toEqual({
      status: HttpStatus.UNPROCESSABLE_ENTITY,
      error: {
        code: ErrorCode.TASK_FAILED,
        message: 'engine down',
        details: { kind: 'InferenceError', stage: 'transcribe' },
      },
    });
  });

  it('should map cancelled tasks to 410', () => {
    expect(describePipelineError(new TaskCancelledError('t1')).status).toBe(HttpStatus.GONE);
  });

  it('should treat other pipeline errors as internal', () => {
    expect(describePipelineError(new StageTimeoutError(PipelineStage.ENCODE, 50))).toEqual({
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      error: {
        code: ErrorCode.INTERNAL_ERROR,
        message: 'encode timed out after 50ms',
        details: { kind: 'TimeoutError' },
      },
    });
  });
});
