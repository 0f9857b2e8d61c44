import { Task, TaskPatch } from '../../database/entities';

export interface UpdateGuard {
  /** 仅当 updated_at 早于此时间时写入（清理卡住任务时使用） */
  staleBefore?: Date;
}

/**
 * 任务持久化（按 task_id 存取）
 * 每个任务的 stage_results 只由执行它的 worker 写入
 */
export interface TaskStore {
  create(task: Task): Promise<void>;
  get(taskId: string): Promise<Task | null>;
  /**
   * 条件更新：仅当存储中的任务未进入终态、且 patch.status（如有）是前进时写入
   * 返回是否写入；任务不存在时抛出
   */
  update(taskId: string, patch: TaskPatch, guard?: UpdateGuard): Promise<boolean>;
  /** 仍在排队的任务直接标记为已取消，返回是否成功 */
  cancelIfQueued(taskId: string): Promise<boolean>;
  /** 运行中的任务：标记取消请求，由 worker 在下一个阶段边界处理 */
  requestCancel(taskId: string): Promise<void>;
  /** 所有未进入终态的任务，按创建时间排序 */
  findUnfinished(): Promise<string[]>;
  /** 运行状态下、updated_at 早于 before 的任务 */
  findStuck(before: Date): Promise<string[]>;
  /** 删除 updated_at 早于 before 的终态任务，返回删除数量 */
  purgeFinishedBefore(before: Date): Promise<number>;
}
