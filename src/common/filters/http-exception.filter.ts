import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { FastifyReply } from 'fastify';
import { ApiError, ApiResponse, ErrorCode } from '../interfaces/response.interface';
import {
  ConfigError,
  NotReadyError,
  PipelineError,
  TaskCancelledError,
  TaskFailedError,
  TaskNotFoundError,
} from '../errors/pipeline.errors';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 把领域错误映射为 HTTP 状态与错误码
 */
export function describePipelineError(exception: PipelineError): { status: number; error: ApiError } {
  if (exception instanceof TaskNotFoundError) {
    return { status: HttpStatus.NOT_FOUND, error: { code: ErrorCode.NOT_FOUND, message: exception.message } };
  }
  if (exception instanceof NotReadyError) {
    return {
      status: HttpStatus.CONFLICT,
      error: { code: ErrorCode.NOT_READY, message: exception.message, details: { status: exception.status } },
    };
  }
  if (exception instanceof ConfigError) {
    return { status: HttpStatus.BAD_REQUEST, error: { code: ErrorCode.CONFIG_ERROR, message: exception.message } };
  }
  if (exception instanceof TaskFailedError) {
    return {
      status: HttpStatus.UNPROCESSABLE_ENTITY,
      error: {
        code: ErrorCode.TASK_FAILED,
        message: exception.failure.message,
        details: { kind: exception.failure.kind, stage: exception.failure.stage },
      },
    };
  }
  if (exception instanceof TaskCancelledError) {
    return { status: HttpStatus.GONE, error: { code: ErrorCode.TASK_CANCELLED, message: exception.message } };
  }
  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    error: { code: ErrorCode.INTERNAL_ERROR, message: exception.message, details: { kind: exception.kind } },
  };
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<FastifyReply>();

    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let error: ApiError = { code: ErrorCode.INTERNAL_ERROR, message: 'Internal server error' };

    if (exception instanceof PipelineError) {
      ({ status, error } = describePipelineError(exception));
    } else if (exception instanceof HttpException) {
      status = exception.getStatus();
      const exceptionResponse = exception.getResponse();

      if (isRecord(exceptionResponse)) {
        // ValidationPipe 返回的 message 是数组
        const { message, code, details } = exceptionResponse;
        error = {
          code: typeof code === 'string' ? code : this.mapStatusToErrorCode(status),
          message: Array.isArray(message)
            ? message.join('; ')
            : typeof message === 'string'
              ? message
              : exception.message,
          ...(isRecord(details) ? { details } : {}),
        };
      } else {
        error = { code: this.mapStatusToErrorCode(status), message: String(exceptionResponse) };
      }
    } else if (exception instanceof Error) {
      error = { code: ErrorCode.INTERNAL_ERROR, message: exception.message };
      this.logger.error(`Unhandled error: ${exception.message}`, exception.stack);
    }

    const errorResponse: ApiResponse = {
      data: null,
      error,
    };

    response.status(status).send(errorResponse);
  }

  private mapStatusToErrorCode(status: number): ErrorCode {
    switch (status) {
      case HttpStatus.BAD_REQUEST:
        return ErrorCode.INVALID_INPUT;
      case HttpStatus.NOT_FOUND:
        return ErrorCode.NOT_FOUND;
      case HttpStatus.CONFLICT:
        return ErrorCode.CONFLICT;
      default:
        return ErrorCode.INTERNAL_ERROR;
    }
  }
}
