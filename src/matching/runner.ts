/**
 * Runs correlation requests in the background and reports progress and
 * results through events, so an interactive caller never waits on the
 * pipeline.
 *
 * Two scheduling modes:
 *   - queue (default): requests run one at a time in submission order, and
 *             every one of them delivers; the waiting line is bounded and
 *             submitting past it throws QueueFullError.
 *   - latest: a new submission supersedes the one in flight; the stale
 *             request is aborted and never delivers a result.
 */

import { EventEmitter } from 'events';

import {
  QueueFullError,
  TaskCancelledError,
  type CancelReason,
} from '../errors.js';
import type { CorrelationResult, PipelineStage } from '../types/technique.js';
import { createLogger } from '../utils/logger.js';
import { assertQuery, correlate, DEFAULT_TOP_K, type CorrelationProviders } from './pipeline.js';

const logger = createLogger('runner');

export type RunnerMode = 'latest' | 'queue';

export interface RunnerOptions {
  mode?: RunnerMode;
  topK?: number;
  /** Waiting requests allowed in queue mode (the running one excluded). */
  maxQueued?: number;
}

export interface RunnerEventMap {
  progress: { taskId: number; percent: number; stage: PipelineStage };
  result: { taskId: number; result: CorrelationResult };
  failed: { taskId: number; query: string; error: Error };
  cancelled: { taskId: number; reason: CancelReason };
}

export type RunnerEvent = keyof RunnerEventMap;

export interface TaskHandle {
  readonly id: number;
  readonly query: string;
  /** Resolves with the result, or null when the task failed or was cancelled. */
  readonly result: Promise<CorrelationResult | null>;
  cancel(): void;
}

type TaskStatus = 'queued' | 'running' | 'cancelled' | 'done';

interface Task {
  id: number;
  query: string;
  status: TaskStatus;
  controller: AbortController;
  settle: (result: CorrelationResult | null) => void;
  done?: Promise<void>;
}

export const DEFAULT_MAX_QUEUED = 4;

export class CorrelationRunner extends EventEmitter {
  readonly mode: RunnerMode;
  private readonly topK: number;
  private readonly maxQueued: number;
  private readonly running = new Set<Task>();
  private readonly queue: Task[] = [];
  private nextId = 1;

  constructor(
    private readonly providers: CorrelationProviders,
    options: RunnerOptions = {},
  ) {
    super();
    this.mode = options.mode ?? 'queue';
    this.topK = options.topK ?? DEFAULT_TOP_K;
    this.maxQueued = options.maxQueued ?? DEFAULT_MAX_QUEUED;
  }

  /**
   * Start (or enqueue) a request. Blank input and a full queue are rejected
   * synchronously, before any work starts.
   */
  submit(query: string): TaskHandle {
    assertQuery(query);

    if (this.mode === 'queue' && this.isBusy() && this.queue.length >= this.maxQueued) {
      throw new QueueFullError(this.maxQueued);
    }

    let settle: (result: CorrelationResult | null) => void = () => undefined;
    const result = new Promise<CorrelationResult | null>((resolve) => {
      settle = resolve;
    });

    const task: Task = {
      id: this.nextId++,
      query,
      status: 'queued',
      controller: new AbortController(),
      settle,
    };

    if (this.mode === 'latest') {
      for (const active of this.running) {
        this.abort(active, 'superseded');
      }
      this.start(task);
    } else if (this.isBusy()) {
      this.queue.push(task);
      logger.debug(`Task ${task.id} queued (${this.queue.length} waiting)`);
    } else {
      this.start(task);
    }

    return {
      id: task.id,
      query,
      result,
      cancel: () => this.abort(task, 'cancelled'),
    };
  }

  /** Tasks whose pipeline is still executing, including aborted stragglers. */
  get activeCount(): number {
    return this.running.size;
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  /**
   * Resolves once nothing is running or waiting.
   */
  async idle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running].map((t) => t.done));
    }
  }

  subscribe<K extends RunnerEvent>(
    event: K,
    handler: (payload: RunnerEventMap[K]) => void,
  ): () => void {
    this.on(event, handler);
    return () => {
      this.off(event, handler);
    };
  }

  private publish<K extends RunnerEvent>(event: K, payload: RunnerEventMap[K]): void {
    this.emit(event, payload);
  }

  private isBusy(): boolean {
    for (const task of this.running) {
      if (task.status === 'running') return true;
    }
    return false;
  }

  private start(task: Task): void {
    task.status = 'running';
    this.running.add(task);
    task.done = this.execute(task);
  }

  private abort(task: Task, reason: CancelReason): void {
    if (task.status === 'done' || task.status === 'cancelled') return;

    const index = this.queue.indexOf(task);
    if (index !== -1) this.queue.splice(index, 1);

    task.status = 'cancelled';
    task.controller.abort(new TaskCancelledError(reason));
    logger.debug(`Task ${task.id} ${reason}`);

    this.publish('cancelled', { taskId: task.id, reason });
    task.settle(null);
    this.drain();
  }

  /** Never rejects; every outcome is reported through events. */
  private async execute(task: Task): Promise<void> {
    // Leave the submitter's stack before touching the providers.
    await Promise.resolve();

    let outcome: { ok: true; result: CorrelationResult } | { ok: false; error: unknown };
    try {
      const result = await correlate(task.query, this.providers, {
        topK: this.topK,
        signal: task.controller.signal,
        onProgress: (percent, stage) => {
          if (task.status === 'running') {
            this.publish('progress', { taskId: task.id, percent, stage });
          }
        },
      });
      outcome = { ok: true, result };
    } catch (error) {
      outcome = { ok: false, error };
    }

    this.running.delete(task);

    if (task.status === 'running') {
      task.status = 'done';
      if (outcome.ok) {
        this.publish('result', { taskId: task.id, result: outcome.result });
        task.settle(outcome.result);
      } else {
        const error = outcome.error instanceof Error ? outcome.error : new Error(String(outcome.error));
        logger.warn(`Task ${task.id} failed: ${error.message}`);
        this.publish('failed', { taskId: task.id, query: task.query, error });
        task.settle(null);
      }
    }

    this.drain();
  }

  private drain(): void {
    if (this.mode !== 'queue' || this.isBusy()) return;
    const next = this.queue.shift();
    if (next) this.start(next);
  }
}
