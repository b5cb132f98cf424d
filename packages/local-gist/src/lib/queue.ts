import type { Logger } from "./logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface QueueTask<T> {
  /** Unique identifier for this task */
  id: string;
  /** Function that performs the actual work */
  execute: () => Promise<T>;
}

export interface QueueOptions<T> {
  /** Maximum number of tasks executing at once (>= 1) */
  concurrency: number;
  /** Tasks allowed to wait for a free slot before `enqueue` blocks (defaults to concurrency) */
  maxPending?: number;
  /** Logger instance for queue operations */
  logger: Logger;
  /** Called with the value of every task that resolves */
  onComplete?: (task: QueueTask<T>, result: T) => void;
  /** Called with the error of every task that rejects */
  onError?: (task: QueueTask<T>, error: unknown) => void;
}

export interface QueueStats {
  /** Number of tasks waiting for a slot */
  pending: number;
  /** Number of tasks currently holding a slot */
  active: number;
  /** Highest number of tasks that held a slot at the same time */
  peakActive: number;
  /** Number of tasks that resolved */
  completed: number;
  /** Number of tasks that rejected */
  failed: number;
  /** Total number of tasks processed (completed + failed) */
  totalProcessed: number;
  /** Average processing time in milliseconds */
  averageLatencyMs: number;
}

export interface ProcessingQueue<T> {
  /** Add a task; resolves once it is accepted into the pending buffer */
  enqueue(task: QueueTask<T>): Promise<void>;
  /** Get current queue statistics */
  getStats(): QueueStats;
  /** Wait for all pending and active tasks to complete */
  drain(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Maximum number of latency samples to keep for rolling average */
const MAX_LATENCY_SAMPLES = 100;

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create a bounded worker pool fed through a bounded pending buffer.
 *
 * At most `concurrency` tasks execute at once. A slot is released in `finally`,
 * whatever the task did. Producers that outrun the workers are suspended in
 * `enqueue` while the buffer is full, so memory stays proportional to
 * `concurrency + maxPending`, not to the number of tasks.
 */
export function createQueue<T>(options: QueueOptions<T>): ProcessingQueue<T> {
  const { concurrency, logger, onComplete, onError } = options;
  const maxPending = options.maxPending ?? concurrency;

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Queue concurrency must be an integer >= 1, got ${concurrency}`);
  }
  if (!Number.isInteger(maxPending) || maxPending < 1) {
    throw new RangeError(`Queue maxPending must be an integer >= 1, got ${maxPending}`);
  }

  const pending: QueueTask<T>[] = [];
  const active = new Set<string>();
  const latencies: number[] = [];
  const spaceWaiters: Array<() => void> = [];
  const drainWaiters: Array<() => void> = [];

  let completed = 0;
  let failed = 0;
  let peakActive = 0;

  function getStats(): QueueStats {
    const avgLatency =
      latencies.length > 0
        ? latencies.reduce((a, b) => a + b, 0) / latencies.length
        : 0;

    return {
      pending: pending.length,
      active: active.size,
      peakActive,
      completed,
      failed,
      totalProcessed: completed + failed,
      averageLatencyMs: Math.round(avgLatency),
    };
  }

  function checkDrainComplete(): void {
    if (pending.length === 0 && active.size === 0) {
      for (const resolve of drainWaiters.splice(0)) resolve();
    }
  }

  function processNext(): void {
    while (active.size < concurrency && pending.length > 0) {
      const task = pending.shift();
      if (!task) break;
      // Take the slot synchronously so the bound holds before the task runs
      active.add(task.id);
      peakActive = Math.max(peakActive, active.size);
      spaceWaiters.shift()?.();
      void processTask(task);
    }

    checkDrainComplete();
  }

  function runCallback(task: QueueTask<T>, name: string, callback: () => void): void {
    try {
      callback();
    } catch (error) {
      logger.error("Queue callback failed", {
        taskId: task.id,
        callback: name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async function processTask(task: QueueTask<T>): Promise<void> {
    const startTime = Date.now();
    logger.debug("Processing task", { taskId: task.id, active: active.size });

    let settled: { ok: true; result: T } | { ok: false; error: unknown };
    try {
      settled = { ok: true, result: await task.execute() };
    } catch (error) {
      settled = { ok: false, error };
    }

    // A task settles once; a throwing callback is logged, never counted as a failure
    if (settled.ok) {
      const { result } = settled;
      const latency = Date.now() - startTime;
      latencies.push(latency);

      // Keep only recent latencies for rolling average
      if (latencies.length > MAX_LATENCY_SAMPLES) latencies.shift();

      completed++;
      logger.debug("Task completed", { taskId: task.id, latencyMs: latency });
      if (onComplete) runCallback(task, "onComplete", () => onComplete(task, result));
    } else {
      const { error } = settled;
      failed++;
      logger.error("Task failed", {
        taskId: task.id,
        error: error instanceof Error ? error.message : String(error),
      });
      if (onError) runCallback(task, "onError", () => onError(task, error));
    }

    active.delete(task.id);
    processNext();
  }

  async function enqueue(task: QueueTask<T>): Promise<void> {
    while (pending.length >= maxPending) {
      await new Promise<void>((resolve) => spaceWaiters.push(resolve));
    }

    // Slots are keyed by id; a duplicate would slip past the concurrency bound
    if (active.has(task.id) || pending.some((queued) => queued.id === task.id)) {
      throw new Error(`Task "${task.id}" is already queued`);
    }

    pending.push(task);
    logger.debug("Task enqueued", {
      taskId: task.id,
      pendingCount: pending.length,
    });
    processNext();
  }

  function drain(): Promise<void> {
    if (pending.length === 0 && active.size === 0) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      drainWaiters.push(resolve);
    });
  }

  return {
    enqueue,
    getStats,
    drain,
  };
}
