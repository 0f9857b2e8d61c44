import { Processor, WorkerHost, OnWorkerEvent } from '@nestjs/bullmq';
import { Logger } from '@nestjs/common';
import { Job } from 'bullmq';
import { TaskProcessorService, TaskJobData } from './task-processor.service';
import { TASKS_QUEUE, WORKER_CONCURRENCY } from './constants';

@Processor(TASKS_QUEUE, { concurrency: WORKER_CONCURRENCY })
export class TasksProcessor extends WorkerHost {
  private readonly logger = new Logger(TasksProcessor.name);

  constructor(private taskProcessorService: TaskProcessorService) {
    super();
  }

  async process(job: Job<TaskJobData>): Promise<void> {
    const status = await this.taskProcessorService.processTask(job.data.task_id);
    this.logger.debug(`Job ${job.id} finished with task status ${status}`);
  }

  @OnWorkerEvent('failed')
  onFailed(job: Job<TaskJobData>, error: Error) {
    this.logger.error(`Job ${job.id} (attempt ${job.attemptsMade}) failed: ${error.message}`);
  }
}
