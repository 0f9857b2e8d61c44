import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { ErrorKind, errorMessage } from '../../common/errors/pipeline.errors';
import { TaskStatus } from '../../database/entities';
import { TASK_STORE } from './constants';
import { TaskStore } from './task-store';

/**
 * 任务清理服务
 * 把卡在运行状态的任务标记为失败，并删除过期的终态任务
 */
@Injectable()
export class TaskCleanupService implements OnModuleInit {
  private readonly logger = new Logger(TaskCleanupService.name);
  // 超过此时间仍处于运行状态的任务视为卡住
  private readonly stuckAfterMinutes: number;
  // 终态任务保留时长，0 表示永久保留
  private readonly retentionHours: number;

  constructor(
    @Inject(TASK_STORE) private readonly store: TaskStore,
    configService: ConfigService,
  ) {
    this.stuckAfterMinutes = configService.get<number>('task.stuckAfterMinutes') ?? 180;
    this.retentionHours = configService.get<number>('task.retentionHours') ?? 0;
  }

  /**
   * 应用启动时执行一次清理
   */
  async onModuleInit() {
    this.logger.log('Running initial task cleanup...');
    await this.handleCron();
  }

  /**
   * 每 5 分钟执行一次
   */
  @Cron(CronExpression.EVERY_5_MINUTES)
  async handleCron() {
    try {
      await this.cleanupStuckTasks();
      await this.purgeExpiredTasks();
    } catch (error) {
      this.logger.error(`Task cleanup failed: ${errorMessage(error)}`);
    }
  }

  /**
   * 将超时仍处于运行状态的任务标记为失败
   */
  async cleanupStuckTasks(now: Date = new Date()): Promise<number> {
    const threshold = new Date(now.getTime() - this.stuckAfterMinutes * 60 * 1000);
    const stuck = await this.store.findStuck(threshold);

    if (stuck.length === 0) {
      this.logger.debug('No stuck tasks found');
      return 0;
    }

    this.logger.warn(`Found ${stuck.length} stuck tasks, marking as failed...`);

    const failed: string[] = [];
    for (const taskId of stuck) {
      // 查询之后任务可能已推进或结束：条件写入只处理仍然过期的非终态任务
      const applied = await this.store.update(
        taskId,
        {
          status: TaskStatus.FAILED,
          error: {
            kind: ErrorKind.TIMEOUT,
            message: `Task made no progress for more than ${this.stuckAfterMinutes} minutes`,
            stage: null,
          },
        },
        { staleBefore: threshold },
      );
      if (applied) failed.push(taskId);
    }

    if (failed.length > 0) {
      this.logger.log(`Marked ${failed.length} stuck tasks as failed: ${failed.join(', ')}`);
    }
    return failed.length;
  }

  /**
   * 删除超过保留期的终态任务
   */
  async purgeExpiredTasks(now: Date = new Date()): Promise<number> {
    if (this.retentionHours <= 0) {
      return 0;
    }

    const before = new Date(now.getTime() - this.retentionHours * 60 * 60 * 1000);
    const removed = await this.store.purgeFinishedBefore(before);
    if (removed > 0) {
      this.logger.log(`Purged ${removed} finished tasks older than ${this.retentionHours}h`);
    }
    return removed;
  }
}
