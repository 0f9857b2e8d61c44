import {
  RUNNING_STATUSES,
  Task,
  TaskPatch,
  TaskStatus,
  isTerminal,
  writableStatuses,
} from '../../database/entities';
import { TaskStore, UpdateGuard } from './task-store';

/**
 * 进程内任务存储（未配置 Supabase 时使用，进程重启后数据丢失）
 * 读写都做深拷贝，调用方拿到的对象互不共享
 */
export class InMemoryTaskStore implements TaskStore {
  private readonly tasks = new Map<string, Task>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(task: Task): Promise<void> {
    if (this.tasks.has(task.id)) {
      throw new Error(`Task ${task.id} already exists`);
    }
    this.tasks.set(task.id, structuredClone(task));
  }

  async get(taskId: string): Promise<Task | null> {
    const task = this.tasks.get(taskId);
    return task ? structuredClone(task) : null;
  }

  async update(taskId: string, patch: TaskPatch, guard: UpdateGuard = {}): Promise<boolean> {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new Error(`Task ${taskId} not found`);
    }
    if (!writableStatuses(patch.status).includes(task.status)) {
      return false;
    }
    if (guard.staleBefore && !(new Date(task.updated_at) < guard.staleBefore)) {
      return false;
    }
    this.write(task, patch);
    return true;
  }

  async cancelIfQueued(taskId: string): Promise<boolean> {
    const task = this.tasks.get(taskId);
    if (!task || task.status !== TaskStatus.QUEUED) {
      return false;
    }
    this.write(task, { status: TaskStatus.CANCELLED, cancel_requested: true });
    return true;
  }

  async requestCancel(taskId: string): Promise<void> {
    const task = this.tasks.get(taskId);
    if (task && !isTerminal(task.status)) {
      this.write(task, { cancel_requested: true });
    }
  }

  async findUnfinished(): Promise<string[]> {
    return [...this.tasks.values()]
      .filter((t) => !isTerminal(t.status))
      .sort((a, b) => a.created_at.localeCompare(b.created_at))
      .map((t) => t.id);
  }

  async findStuck(before: Date): Promise<string[]> {
    return [...this.tasks.values()]
      .filter((t) => RUNNING_STATUSES.includes(t.status) && new Date(t.updated_at) < before)
      .map((t) => t.id);
  }

  async purgeFinishedBefore(before: Date): Promise<number> {
    let removed = 0;
    for (const task of [...this.tasks.values()]) {
      if (isTerminal(task.status) && new Date(task.updated_at) < before) {
        this.tasks.delete(task.id);
        removed++;
      }
    }
    return removed;
  }

  private write(task: Task, patch: TaskPatch): void {
    this.tasks.set(task.id, {
      ...task,
      ...structuredClone(patch),
      updated_at: this.now().toISOString(),
    });
  }
}
