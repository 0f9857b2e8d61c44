import { Inject, Injectable, Logger, OnApplicationBootstrap, OnModuleDestroy } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { ConfigService } from '@nestjs/config';
import { Queue } from 'bullmq';
import pLimit from 'p-limit';
import { errorMessage } from '../../common/errors/pipeline.errors';
import { TaskStatus } from '../../database/entities';
import { TASKS_QUEUE, TASK_STORE } from './constants';
import { TaskJobData, TaskProcessorService } from './task-processor.service';
import { TaskStore } from './task-store';

/**
 * 任务投递：把已持久化的任务交给 worker 池
 */
export interface TaskDispatcher {
  dispatch(taskId: string): Promise<void>;
}

/**
 * 进程内 worker 池（未启用 Redis 时使用）
 * 超出并发上限的任务在 p-limit 内部排队；关闭时排队中的任务保持 QUEUED，
 * 下次启动时与中断的任务一起重新投递
 */
@Injectable()
export class LocalTaskDispatcher implements TaskDispatcher, OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(LocalTaskDispatcher.name);
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly inFlight = new Set<Promise<void>>();
  private closing = false;

  constructor(
    private readonly processor: TaskProcessorService,
    @Inject(TASK_STORE) private readonly store: TaskStore,
    configService: ConfigService,
  ) {
    const concurrency = Math.max(1, configService.get<number>('worker.concurrency') ?? 2);
    this.limit = pLimit(concurrency);
    this.logger.log(`Local worker pool started (concurrency: ${concurrency})`);
  }

  /**
   * 重新投递上次进程退出时未结束的任务（从已记录的阶段继续）
   */
  async onApplicationBootstrap() {
    const unfinished = await this.store.findUnfinished();
    if (unfinished.length === 0) return;

    this.logger.log(`Resuming ${unfinished.length} unfinished tasks`);
    for (const taskId of unfinished) {
      await this.dispatch(taskId);
    }
  }

  async dispatch(taskId: string): Promise<void> {
    if (this.closing) {
      this.logger.warn(`[Task ${taskId}] left queued, worker pool is shutting down`);
      return;
    }

    const run = this.limit(
      async (): Promise<TaskStatus | null> => (this.closing ? null : this.processor.processTask(taskId)),
    )
      .then((status) => {
        if (status === null) {
          this.logger.log(`[Task ${taskId}] left queued for the next start`);
        } else {
          this.logger.debug(`[Task ${taskId}] finished with status ${status}`);
        }
      })
      .catch((error: unknown) => {
        this.logger.error(`[Task ${taskId}] worker error: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.inFlight.delete(run);
      });
    this.inFlight.add(run);
  }

  /** 等待所有已投递任务结束 */
  async drain(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  /**
   * 停止接收新任务，等待运行中的任务结束；排队中的任务不再启动
   */
  async onModuleDestroy() {
    this.closing = true;
    if (this.inFlight.size > 0) {
      this.logger.log(`Waiting for ${this.limit.activeCount} running tasks...`);
    }
    await this.drain();
  }
}

/**
 * BullMQ 投递（REDIS_ENABLED=true）
 * jobId 使用 task_id，重复投递同一任务不会产生两个 job
 */
@Injectable()
export class QueueTaskDispatcher implements TaskDispatcher {
  private readonly logger = new Logger(QueueTaskDispatcher.name);
  private readonly attempts: number;

  constructor(
    @InjectQueue(TASKS_QUEUE) private readonly tasksQueue: Queue<TaskJobData>,
    configService: ConfigService,
  ) {
    this.attempts = configService.get<number>('worker.attempts') ?? 3;
  }

  async dispatch(taskId: string): Promise<void> {
    await this.tasksQueue.add(
      'process',
      { task_id: taskId },
      {
        jobId: taskId,
        attempts: this.attempts,
        backoff: {
          type: 'exponential',
          delay: 5000,
        },
        removeOnComplete: true,
      },
    );
    this.logger.log(`[Task ${taskId}] queued`);
  }
}
