import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { PipelineStage, Task, TaskStatus, emptyFlags } from '../../database/entities';
import { TASK_STORE } from './constants';
import { InMemoryTaskStore } from './in-memory-task.store';
import { LocalTaskDispatcher } from './task-dispatcher';
import { TaskProcessorService } from './task-processor.service';

class FakeProcessor {
  readonly started: string[] = [];
  readonly blocked = new Set<string>();
  private readonly waiting = new Map<string, () => void>();

  async processTask(taskId: string): Promise<TaskStatus> {
    this.started.push(taskId);
    if (taskId.startsWith('broken')) {
      throw new Error('store unreachable');
    }
    if (this.blocked.has(taskId)) {
      await new Promise<void>((resolve) => this.waiting.set(taskId, resolve));
    }
    return TaskStatus.COMPLETED;
  }

  release(taskId: string): void {
    this.waiting.get(taskId)?.();
  }
}

function makeTask(id: string, status: TaskStatus, createdAt: string): Task {
  return {
    id,
    status,
    input_ref: `/data/${id}.wav`,
    config: {
      language: null,
      formats: [],
      speaker_labels: true,
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
    created_at: createdAt,
    updated_at: createdAt,
  };
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('LocalTaskDispatcher', () => {
  let processor: FakeProcessor;
  let store: InMemoryTaskStore;
  let dispatcher: LocalTaskDispatcher;

  beforeEach(async () => {
    processor = new FakeProcessor();
    store = new InMemoryTaskStore();

    const moduleRef = await Test.createTestingModule({
      providers: [
        LocalTaskDispatcher,
        { provide: TaskProcessorService, useValue: processor },
        { provide: TASK_STORE, useValue: store },
        { provide: ConfigService, useValue: new ConfigService({ worker: { concurrency: 1 } }) },
      ],
    }).compile();

    dispatcher = moduleRef.get(LocalTaskDispatcher);
  });

  it('should run tasks up to the concurrency limit', async () => {
    processor.blocked.add('first');

    await dispatcher.dispatch('first');
    await dispatcher.dispatch('second');
    await flush();

    expect(processor.started).toEqual(['first']);

    processor.release('first');
    await dispatcher.drain();

    expect(processor.started).toEqual(['first', 'second']);
  });

  it('should finish shutdown once the running task ends, leaving queued tasks unstarted', async () => {
    processor.blocked.add('running');
    await dispatcher.dispatch('running');
    await dispatcher.dispatch('waiting');
    await flush();

    const shutdown = dispatcher.onModuleDestroy();
    processor.release('running');
    await shutdown;

    expect(processor.started).toEqual(['running']);
  });

  it('should ignore dispatches after shutdown has begun', async () => {
    await dispatcher.onModuleDestroy();

    await dispatcher.dispatch('late');
    await dispatcher.drain();

    expect(processor.started).toEqual([]);
  });

  it('should keep draining after a task throws', async () => {
    await dispatcher.dispatch('broken-1');
    await dispatcher.dispatch('healthy');

    await dispatcher.drain();

    expect(processor.started).toEqual(['broken-1', 'healthy']);
  });

  it('should resume unfinished tasks on start-up, oldest first', async () => {
    await store.create(makeTask('later', TaskStatus.QUEUED, '2026-03-01T10:00:00.000Z'));
    await store.create(makeTask('earlier', TaskStatus.TRANSCRIBING, '2026-03-01T09:00:00.000Z'));
    await store.create(makeTask('done', TaskStatus.COMPLETED, '2026-03-01T08:00:00.000Z'));

    await dispatcher.onApplicationBootstrap();
    await dispatcher.drain();

    expect(processor.started).toEqual(['earlier', 'later']);
  });
});
