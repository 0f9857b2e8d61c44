import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { FastifyReply } from 'fastify';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import { ApiResponse } from '../interfaces/response.interface';

/**
 * 响应体中的轮询间隔（秒）；任务未结束时才有
 */
export function retryAfterSeconds(data: unknown): number | null {
  if (typeof data !== 'object' || data === null || !('retry_after' in data)) {
    return null;
  }
  const value = data.retry_after;
  return typeof value === 'number' && value > 0 ? value : null;
}

/**
 * 统一响应拦截器
 * 成功响应包装为 { data: T, error: null }；带 retry_after 的响应同时设置 Retry-After 头
 */
@Injectable()
export class ResponseInterceptor<T> implements NestInterceptor<T, ApiResponse<T>> {
  intercept(
    context: ExecutionContext,
    next: CallHandler<T>,
  ): Observable<ApiResponse<T>> {
    const reply = context.switchToHttp().getResponse<FastifyReply>();

    return next.handle().pipe(
      map((data) => {
        const retryAfter = retryAfterSeconds(data);
        if (retryAfter !== null) {
          reply.header('Retry-After', String(retryAfter));
        }
        return { data, error: null };
      }),
    );
  }
}
