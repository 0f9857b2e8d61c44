import { Logger, Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { SupabaseService } from '../../providers/supabase/supabase.service';
import { TranscriptsModule } from '../transcripts/transcripts.module';
import { TasksController } from './tasks.controller';
import { TasksService } from './tasks.service';
import { TasksProcessor } from './tasks.processor';
import { TaskProcessorService } from './task-processor.service';
import { TaskCleanupService } from './task-cleanup.service';
import { LocalTaskDispatcher, QueueTaskDispatcher } from './task-dispatcher';
import { InMemoryTaskStore } from './in-memory-task.store';
import { SupabaseTaskStore } from './supabase-task.store';
import { TaskStore } from './task-store';
import { TASKS_QUEUE, TASK_DISPATCHER, TASK_STORE } from './constants';

const redisEnabled = process.env.REDIS_ENABLED === 'true';

@Module({
  imports: [
    ...(redisEnabled
      ? [
          BullModule.registerQueue({
            name: TASKS_QUEUE,
          }),
        ]
      : []),
    TranscriptsModule,
  ],
  controllers: [TasksController],
  providers: [
    {
      provide: TASK_STORE,
      useFactory: (supabaseService: SupabaseService): TaskStore => {
        if (supabaseService.isConfigured()) {
          return new SupabaseTaskStore(supabaseService);
        }
        new Logger('TasksModule').warn('Supabase not configured, tasks are kept in memory');
        return new InMemoryTaskStore();
      },
      inject: [SupabaseService],
    },
    TasksService,
    TaskProcessorService,
    TaskCleanupService,
    ...(redisEnabled
      ? [TasksProcessor, QueueTaskDispatcher, { provide: TASK_DISPATCHER, useExisting: QueueTaskDispatcher }]
      : [LocalTaskDispatcher, { provide: TASK_DISPATCHER, useExisting: LocalTaskDispatcher }]),
  ],
  exports: [TasksService, TaskProcessorService],
})
export class TasksModule {}
