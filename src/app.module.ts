import { Module, DynamicModule } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { ScheduleModule } from '@nestjs/schedule';
import { ConfigModule, ConfigService } from '@nestjs/config';
import configuration from './common/config/configuration';

// Providers
import { SupabaseModule } from './providers/supabase/supabase.module';
import { R2Module } from './providers/r2/r2.module';
import { DeepgramModule } from './providers/deepgram/deepgram.module';
import { OpenAIModule } from './providers/openai/openai.module';
import { FfmpegModule } from './providers/ffmpeg/ffmpeg.module';

// Business Modules
import { TasksModule } from './modules/tasks/tasks.module';
import { TranscriptsModule } from './modules/transcripts/transcripts.module';
import { HealthModule } from './modules/health/health.module';

/**
 * 解析 REDIS_URL（redis:// 或 rediss://）
 */
function redisConnection(redisUrl: string) {
  const url = new URL(redisUrl);
  return {
    host: url.hostname,
    port: Number(url.port || 6379),
    username: url.username || undefined,
    password: url.password ? decodeURIComponent(url.password) : undefined,
    db: url.pathname.length > 1 ? Number(url.pathname.slice(1)) : undefined,
    tls: url.protocol === 'rediss:' ? {} : undefined,
  };
}

@Module({})
export class AppModule {
  static forRoot(): DynamicModule {
    const imports: NonNullable<DynamicModule['imports']> = [
      // Config
      ConfigModule.forRoot({
        isGlobal: true,
        load: [configuration],
        envFilePath: ['.env.local', '.env'],
      }),

      // Schedule (定时任务)
      ScheduleModule.forRoot(),

      // Providers
      SupabaseModule,
      R2Module,
      DeepgramModule,
      OpenAIModule,
      FfmpegModule,

      // Business Modules
      TranscriptsModule,
      TasksModule,
      HealthModule,
    ];

    // 只有当 REDIS_ENABLED=true 时才加载 BullMQ
    if (process.env.REDIS_ENABLED === 'true') {
      imports.push(
        BullModule.forRootAsync({
          imports: [ConfigModule],
          useFactory: (configService: ConfigService) => ({
            connection: redisConnection(configService.get<string>('redis.url') || 'redis://localhost:6379'),
          }),
          inject: [ConfigService],
        }),
      );
    }

    return {
      module: AppModule,
      imports,
    };
  }
}
