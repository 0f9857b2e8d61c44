import { Logger } from '@nestjs/common';
import { SupabaseService } from '../../providers/supabase/supabase.service';
import {
  RUNNING_STATUSES,
  TERMINAL_STATUSES,
  Task,
  TaskPatch,
  TaskStatus,
  writableStatuses,
} from '../../database/entities';
import { TaskStore, UpdateGuard } from './task-store';

const TABLE = 'tasks';

/**
 * 基于 Supabase 的任务存储（对应 tasks 表）
 */
export class SupabaseTaskStore implements TaskStore {
  private readonly logger = new Logger(SupabaseTaskStore.name);

  constructor(private readonly supabaseService: SupabaseService) {}

  async create(task: Task): Promise<void> {
    const { error } = await this.supabaseService.getClient().from(TABLE).insert(task);
    if (error) {
      this.logger.error(`Failed to create task: ${error.message}`);
      throw new Error(`Failed to create task: ${error.message}`);
    }
  }

  async get(taskId: string): Promise<Task | null> {
    const { data, error } = await this.supabaseService
      .getClient()
      .from(TABLE)
      .select('*')
      .eq('id', taskId)
      .maybeSingle<Task>();

    if (error) {
      throw new Error(`Failed to fetch task ${taskId}: ${error.message}`);
    }
    return data;
  }

  async update(taskId: string, patch: TaskPatch, guard: UpdateGuard = {}): Promise<boolean> {
    let query = this.supabaseService
      .getClient()
      .from(TABLE)
      .update({
        ...patch,
        updated_at: new Date().toISOString(),
      })
      .eq('id', taskId)
      .in('status', writableStatuses(patch.status));
    if (guard.staleBefore) {
      query = query.lt('updated_at', guard.staleBefore.toISOString());
    }

    const { data, error } = await query.select('id');
    if (error) {
      this.logger.error(`Failed to update task ${taskId}: ${error.message}`);
      throw new Error(`Failed to update task ${taskId}: ${error.message}`);
    }
    if ((data ?? []).length > 0) {
      return true;
    }

    // 没有命中行：区分任务不存在与条件不满足
    if (!(await this.get(taskId))) {
      throw new Error(`Task ${taskId} not found`);
    }
    return false;
  }

  async cancelIfQueued(taskId: string): Promise<boolean> {
    const { data, error } = await this.supabaseService
      .getClient()
      .from(TABLE)
      .update({
        status: TaskStatus.CANCELLED,
        cancel_requested: true,
        updated_at: new Date().toISOString(),
      })
      .eq('id', taskId)
      .eq('status', TaskStatus.QUEUED)
      .select('id');

    if (error) {
      throw new Error(`Failed to cancel task ${taskId}: ${error.message}`);
    }
    return (data ?? []).length > 0;
  }

  async requestCancel(taskId: string): Promise<void> {
    const { error } = await this.supabaseService
      .getClient()
      .from(TABLE)
      .update({ cancel_requested: true, updated_at: new Date().toISOString() })
      .eq('id', taskId)
      .not('status', 'in', `(${TERMINAL_STATUSES.join(',')})`);

    if (error) {
      throw new Error(`Failed to request cancellation of task ${taskId}: ${error.message}`);
    }
  }

  async findUnfinished(): Promise<string[]> {
    const { data, error } = await this.supabaseService
      .getClient()
      .from(TABLE)
      .select('id')
      .not('status', 'in', `(${TERMINAL_STATUSES.join(',')})`)
      .order('created_at', { ascending: true })
      .returns<Array<{ id: string }>>();

    if (error) {
      throw new Error(`Failed to query unfinished tasks: ${error.message}`);
    }
    return (data ?? []).map((row) => row.id);
  }

  async findStuck(before: Date): Promise<string[]> {
    const { data, error } = await this.supabaseService
      .getClient()
      .from(TABLE)
      .select('id')
      .in('status', [...RUNNING_STATUSES])
      .lt('updated_at', before.toISOString())
      .returns<Array<{ id: string }>>();

    if (error) {
      this.logger.error(`Failed to query stuck tasks: ${error.message}`);
      throw new Error(`Failed to query stuck tasks: ${error.message}`);
    }
    return (data ?? []).map((row) => row.id);
  }

  async purgeFinishedBefore(before: Date): Promise<number> {
    const { data, error } = await this.supabaseService
      .getClient()
      .from(TABLE)
      .delete()
      .in('status', [...TERMINAL_STATUSES])
      .lt('updated_at', before.toISOString())
      .select('id');

    if (error) {
      throw new Error(`Failed to purge tasks: ${error.message}`);
    }
    return (data ?? []).length;
  }
}
