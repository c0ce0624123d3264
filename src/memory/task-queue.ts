/**
 * Bounded background queue for work that must not block the reply path
 * (memory compaction). Tasks run with limited concurrency; drain() resolves once
 * everything queued so far has settled. Failures are logged, never rethrown.
 */

import type { Logger } from "pino";
import { logger as rootLogger } from "../logging";

export type BackgroundTask = () => Promise<unknown>;

export interface TaskQueueOptions {
  /** Max tasks running at once (default 2). */
  concurrency?: number;
  /** Max tasks waiting; enqueue() rejects new work beyond this (default 1000). */
  maxPending?: number;
  logger?: Logger;
}

interface QueuedTask {
  label: string;
  run: BackgroundTask;
}

export class BackgroundTaskQueue {
  private readonly pending: QueuedTask[] = [];
  private readonly concurrency: number;
  private readonly maxPending: number;
  private readonly log: Logger;
  private running = 0;
  private stopped = false;
  private idleWaiters: Array<() => void> = [];

  constructor(options: TaskQueueOptions = {}) {
    this.concurrency = Math.max(1, options.concurrency ?? 2);
    this.maxPending = Math.max(1, options.maxPending ?? 1000);
    this.log = options.logger ?? rootLogger;
  }

  /** Queue a task. Returns false when the queue is stopped or full. */
  enqueue(label: string, run: BackgroundTask): boolean {
    if (this.stopped) return false;
    if (this.pending.length >= this.maxPending) {
      this.log.warn({ event: "TASK_QUEUE_FULL", label, pending: this.pending.length }, "Background queue full; task dropped");
      return false;
    }
    this.pending.push({ label, run });
    this.pump();
    return true;
  }

  /** Resolves when no task is running or waiting. */
  drain(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /** Stop accepting work and wait for queued tasks to finish. */
  async stop(): Promise<void> {
    this.stopped = true;
    await this.drain();
  }

  get size(): number {
    return this.pending.length + this.running;
  }

  private isIdle(): boolean {
    return this.running === 0 && this.pending.length === 0;
  }

  private pump(): void {
    while (this.running < this.concurrency) {
      const task = this.pending.shift();
      if (!task) break;
      this.running++;
      void this.runTask(task);
    }
    if (this.isIdle()) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  private async runTask(task: QueuedTask): Promise<void> {
    try {
      await task.run();
    } catch (err) {
      this.log.warn(
        { event: "BACKGROUND_TASK_FAILED", label: task.label, err: err instanceof Error ? err.message : String(err) },
        "Background task failed"
      );
    } finally {
      this.running--;
      this.pump();
    }
  }
}
