import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';

/**
 * Worker 入口
 * 独立进程运行，消费 BullMQ 队列任务（需要 REDIS_ENABLED=true）
 */
async function bootstrap() {
  const logger = new Logger('Worker');

  // 未启用 Redis 时任务由 HTTP 进程内的 worker 池执行，独立 worker 无事可做
  if (process.env.REDIS_ENABLED !== 'true') {
    logger.error('REDIS_ENABLED is not true, the worker has no queue to consume');
    process.exit(1);
  }

  // 创建应用上下文（不启动 HTTP 服务）
  const app = await NestFactory.createApplicationContext(AppModule.forRoot());

  logger.log('Worker started and listening for jobs...');

  // 优雅关闭
  const shutdown = (signal: string) => {
    logger.log(`Received ${signal}, shutting down...`);
    app
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

bootstrap().catch((error: unknown) => {
  new Logger('Worker').error(`Failed to start: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
