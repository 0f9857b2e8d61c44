import { ConfigService } from '@nestjs/config';
import { PipelineStage, Task, TaskStatus, emptyFlags } from '../../database/entities';
import { InMemoryTaskStore } from './in-memory-task.store';
import { TaskCleanupService } from './task-cleanup.service';

const NOW = new Date('2026-03-01T12:00:00.000Z');

function makeTask(id: string, status: TaskStatus, updatedAt: string): Task {
  return {
    id,
    status,
    input_ref: `${id}.wav`,
    config: {
      language: null,
      formats: [],
      speaker_labels: false,
      diarization: { enabled: false, min_speakers: null, max_speakers: null },
      refinement: {
        enabled: false,
        semantic_segmentation: false,
        error_correction: false,
        expression_optimization: false,
        translate_to: null,
      },
      timeouts: {
        [PipelineStage.DECODE]: 0,
        [PipelineStage.TRANSCRIBE]: 0,
        [PipelineStage.ALIGN]: 0,
        [PipelineStage.DIARIZE]: 0,
        [PipelineStage.REFINE]: 0,
        [PipelineStage.ENCODE]: 0,
      },
    },
    stage_results: {},
    result: null,
    flags: emptyFlags(),
    error: null,
    cancel_requested: false,
    language: null,
    duration_sec: null,
    created_at: updatedAt,
    updated_at: updatedAt,
  };
}

describe('TaskCleanupService', () => {
  let store: InMemoryTaskStore;

  beforeEach(() => {
    store = new InMemoryTaskStore(() => NOW);
  });

  function createService(task: Record<string, number>): TaskCleanupService {
    return new TaskCleanupService(store, new ConfigService({ task }));
  }

  it('should fail tasks stuck in a running status', async () => {
    const service = createService({ stuckAfterMinutes: 60, retentionHours: 0 });
    await store.create(makeTask('stuck', TaskStatus.DIARIZING, '2026-03-01T10:30:00.000Z'));
    await store.create(makeTask('busy', TaskStatus.DIARIZING, '2026-03-01T11:30:00.000Z'));

    const count = await service.cleanupStuckTasks(NOW);

    expect(count).toBe(1);
    const stuck = await store.get('stuck');
    expect(stuck?.status).toBe(TaskStatus.FAILED);
    expect(stuck?.error).toEqual({
      kind: 'TimeoutError',
      message: 'Task made no progress for more than 60 minutes',
      stage: null,
    });
    expect((await store.get('busy'))?.status).toBe(TaskStatus.DIARIZING);
  });

  it('should leave a task that progressed after the lookup', async () => {
    class RacingStore extends InMemoryTaskStore {
      async findStuck(before: Date): Promise<string[]> {
        const stuck = await super.findStuck(before);
        // 查询返回后 worker 推进了任务
        await this.update('slow', { status: TaskStatus.REFINING });
        return stuck;
      }
    }
    store = new RacingStore(() => NOW);
    const service = createService({ stuckAfterMinutes: 60, retentionHours: 0 });
    await store.create(makeTask('slow', TaskStatus.DIARIZING, '2026-03-01T10:30:00.000Z'));

    const count = await service.cleanupStuckTasks(NOW);

    expect(count).toBe(0);
    const task = await store.get('slow');
    expect(task?.status).toBe(TaskStatus.REFINING);
    expect(task?.error).toBeNull();
  });

  it('should return zero when nothing is stuck', async () => {
    const service = createService({ stuckAfterMinutes: 60, retentionHours: 0 });
    await store.create(makeTask('queued', TaskStatus.QUEUED, '2026-02-01T00:00:00.000Z'));

    await expect(service.cleanupStuckTasks(NOW)).resolves.toBe(0);
  });

  it('should purge finished tasks past the retention window', async () => {
    const service = createService({ stuckAfterMinutes: 60, retentionHours: 24 });
    await store.create(makeTask('expired', TaskStatus.COMPLETED, '2026-02-28T11:00:00.000Z'));
    await store.create(makeTask('recent', TaskStatus.FAILED, '2026-02-28T13:00:00.000Z'));

    const removed = await service.purgeExpiredTasks(NOW);

    expect(removed).toBe(1);
    expect(await store.get('expired')).toBeNull();
    expect(await store.get('recent')).not.toBeNull();
  });

  it('should keep everything when retention is disabled', async () => {
    const service = createService({ stuckAfterMinutes: 60, retentionHours: 0 });
    await store.create(makeTask('ancient', TaskStatus.COMPLETED, '2020-01-01T00:00:00.000Z'));

    await expect(service.purgeExpiredTasks(NOW)).resolves.toBe(0);
    expect(await store.get('ancient')).not.toBeNull();
  });
});
