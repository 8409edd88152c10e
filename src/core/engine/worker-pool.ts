/**
 * Worker Pool Implementation
 *
 * In-process pool for per-file work with:
 * - Bounded concurrency
 * - FIFO task queue
 * - One result per task, in submission order
 * - Statistics
 *
 * Tasks never share a result buffer: each task's output is returned on its
 * own result and merged by the caller after the batch completes.
 */

import { ErrorCode, InternalFaultError } from "../errors.js";

// =============================================================================
// Types
// =============================================================================

export interface WorkerPoolConfig {
  maxWorkers: number;
}

export interface WorkerTask<TInput> {
  id: string;
  input: TInput;
}

export type WorkerResult<TOutput> =
  | { taskId: string; success: true; output: TOutput; durationMs: number; workerId: string }
  | { taskId: string; success: false; error: unknown; durationMs: number; workerId: string };

export interface WorkerPoolStats {
  activeWorkers: number;
  idleWorkers: number;
  pendingTasks: number;
  totalSubmitted: number;
  totalCompleted: number;
  totalFailed: number;
  totalDurationMs: number;
  queueWaitTimeMs: number;
}

export type TaskExecutor<TInput, TOutput> = (input: TInput, workerId: string) => TOutput | Promise<TOutput>;

interface QueuedTask<TInput> {
  task: WorkerTask<TInput>;
  index: number;
  queuedAt: number;
}

interface WorkerState {
  id: string;
  busy: boolean;
  currentTaskId: string | null;
  completedTasks: number;
  failedTasks: number;
}

export const DEFAULT_MAX_WORKERS = 4;

// =============================================================================
// In-Process Worker Pool
// =============================================================================

export class InProcessWorkerPool<TInput, TOutput> {
  private readonly executor: TaskExecutor<TInput, TOutput>;
  private readonly config: WorkerPoolConfig;
  private workers: Map<string, WorkerState> = new Map();
  private taskQueue: QueuedTask<TInput>[] = [];
  private workerIdCounter = 0;
  private isShutdown = false;

  // Statistics
  private _stats = {
    totalSubmitted: 0,
    totalCompleted: 0,
    totalFailed: 0,
    totalDurationMs: 0,
    queueWaitTimeMs: 0,
  };

  constructor(executor: TaskExecutor<TInput, TOutput>, config: Partial<WorkerPoolConfig> = {}) {
    this.executor = executor;
    this.config = {
      maxWorkers: Math.max(1, Math.floor(config.maxWorkers ?? DEFAULT_MAX_WORKERS)),
    };
  }

  /**
   * Runs every task and resolves once all have finished. A task that throws
   * yields a failed result; it does not stop the others.
   */
  async submitBatch(tasks: WorkerTask<TInput>[]): Promise<WorkerResult<TOutput>[]> {
    if (this.isShutdown) {
      throw new InternalFaultError("Worker pool is shutdown", ErrorCode.INTERNAL_FAULT);
    }

    const results: (WorkerResult<TOutput> | undefined)[] = new Array(tasks.length);
    const queuedAt = Date.now();
    tasks.forEach((task, index) => {
      this.taskQueue.push({ task, index, queuedAt });
    });
    this._stats.totalSubmitted += tasks.length;

    const workerCount = Math.min(this.config.maxWorkers, this.taskQueue.length);
    const loops: Promise<void>[] = [];
    for (let i = 0; i < workerCount; i++) {
      loops.push(this.runWorker(this.createWorker(), results));
    }
    await Promise.all(loops);

    const completed: WorkerResult<TOutput>[] = [];
    for (const result of results) {
      if (!result) {
        throw new InternalFaultError("Worker pool lost a task result", ErrorCode.INTERNAL_FAULT);
      }
      completed.push(result);
    }
    return completed;
  }

  stats(): WorkerPoolStats {
    const workers = Array.from(this.workers.values());
    const activeWorkers = workers.filter((w) => w.busy).length;

    return {
      activeWorkers,
      idleWorkers: this.workers.size - activeWorkers,
      pendingTasks: this.taskQueue.length,
      totalSubmitted: this._stats.totalSubmitted,
      totalCompleted: this._stats.totalCompleted,
      totalFailed: this._stats.totalFailed,
      totalDurationMs: this._stats.totalDurationMs,
      queueWaitTimeMs: this._stats.queueWaitTimeMs,
    };
  }

  async shutdown(): Promise<void> {
    this.isShutdown = true;
    this.taskQueue = [];
    this.workers.clear();
  }

  // ==========================================================================
  // Internal Methods
  // ==========================================================================

  private createWorker(): WorkerState {
    const worker: WorkerState = {
      id: `worker-${++this.workerIdCounter}`,
      busy: false,
      currentTaskId: null,
      completedTasks: 0,
      failedTasks: 0,
    };
    this.workers.set(worker.id, worker);
    return worker;
  }

  /**
   * Pulls tasks until the queue is empty, then retires the worker.
   */
  private async runWorker(worker: WorkerState, results: (WorkerResult<TOutput> | undefined)[]): Promise<void> {
    for (;;) {
      const queued = this.taskQueue.shift();
      if (!queued) break;

      worker.busy = true;
      worker.currentTaskId = queued.task.id;
      this._stats.queueWaitTimeMs += Date.now() - queued.queuedAt;
      const startTime = performance.now();

      try {
        const output = await this.executor(queued.task.input, worker.id);
        const durationMs = performance.now() - startTime;
        this._stats.totalCompleted++;
        this._stats.totalDurationMs += durationMs;
        worker.completedTasks++;
        results[queued.index] = { taskId: queued.task.id, success: true, output, durationMs, workerId: worker.id };
      } catch (error) {
        const durationMs = performance.now() - startTime;
        this._stats.totalFailed++;
        worker.failedTasks++;
        results[queued.index] = { taskId: queued.task.id, success: false, error, durationMs, workerId: worker.id };
      } finally {
        worker.busy = false;
        worker.currentTaskId = null;
      }
    }

    this.workers.delete(worker.id);
  }
}
