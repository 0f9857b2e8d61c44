import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { ValidationPipe, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { errorMessage } from './common/errors/pipeline.errors';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { ResponseInterceptor } from './common/interceptors/response.interceptor';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  // 只接收 JSON 任务描述，音频通过 input_ref 引用
  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule.forRoot(),
    new FastifyAdapter({ logger: true, bodyLimit: 256 * 1024 }),
  );

  const configService = app.get(ConfigService);
  const port = configService.get<number>('port') || 3000;
  const corsOrigins = configService.get<string[]>('cors.origins') ?? [];

  app.setGlobalPrefix('api');

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidNonWhitelisted: true,
    }),
  );
  app.useGlobalFilters(new HttpExceptionFilter());
  app.useGlobalInterceptors(new ResponseInterceptor());

  // 未配置 CORS_ORIGINS 时允许任意来源
  app.enableCors({
    origin: corsOrigins.length > 0 ? corsOrigins : true,
    methods: ['GET', 'POST'],
    exposedHeaders: ['Retry-After', 'Content-Disposition'],
  });

  // 关闭时释放能力对象、等待本地 worker 完成
  app.enableShutdownHooks();

  await app.listen(port, '0.0.0.0');

  const queue = configService.get<boolean>('redis.enabled') ? 'bullmq' : 'in-process';
  logger.log(`Subtitle API listening on http://localhost:${port}/api (dispatch: ${queue})`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(`Failed to start: ${errorMessage(error)}`);
  process.exit(1);
});
