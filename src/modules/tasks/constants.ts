export const TASKS_QUEUE = 'tasks';
export const TASK_STORE = Symbol('TASK_STORE');
export const TASK_DISPATCHER = Symbol('TASK_DISPATCHER');

// BullMQ 的 worker 并发需要在装饰器中静态给出
export const WORKER_CONCURRENCY = Math.max(1, parseInt(process.env.WORKER_CONCURRENCY || '2', 10) || 2);
