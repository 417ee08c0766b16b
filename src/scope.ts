// scope.ts: Structured concurrency primitives for per-connection work
// A TaskScope owns the tasks spawned into it: cancel() aborts them all through one
// AbortSignal, join() waits for every one of them, close() does both in order.

import { ScopeClosedError } from "./errors.js";

export type ScopedTask = (signal: AbortSignal) => Promise<void>;

export interface TaskScopeOptions {
  /** Aborting the parent cancels this scope. */
  parent?: AbortSignal;
  /** Receives any rejection from a spawned task. */
  onError: (err: unknown) => void;
}

export class TaskScope {
  private readonly controller = new AbortController();
  private readonly tasks = new Set<Promise<void>>();
  private readonly onError: (err: unknown) => void;
  private readonly detachParent: () => void;

  constructor(opts: TaskScopeOptions) {
    this.onError = opts.onError;
    const parent = opts.parent;
    if (!parent) {
      this.detachParent = () => undefined;
      return;
    }
    if (parent.aborted) {
      this.controller.abort(parent.reason);
      this.detachParent = () => undefined;
      return;
    }
    const onAbort = () => this.cancel(parent.reason);
    parent.addEventListener("abort", onAbort, { once: true });
    this.detachParent = () => parent.removeEventListener("abort", onAbort);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /** Number of tasks that have not settled yet. */
  get size(): number {
    return this.tasks.size;
  }

  spawn(task: ScopedTask): void {
    if (this.cancelled) throw new ScopeClosedError();
    const running: Promise<void> = Promise.resolve()
      .then(() => task(this.signal))
      .catch((err: unknown) => this.onError(err))
      .finally(() => {
        this.tasks.delete(running);
      });
    this.tasks.add(running);
  }

  cancel(reason?: unknown): void {
    if (this.cancelled) return;
    this.controller.abort(reason);
  }

  /** Wait until every task, including ones spawned while waiting, has settled. */
  async join(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.allSettled([...this.tasks]);
    }
    this.detachParent();
  }

  async close(reason?: unknown): Promise<void> {
    this.cancel(reason);
    await this.join();
  }
}

/**
 * Counting semaphore for limiting concurrent operations.
 * Used as the per-connection admission limit for in-flight commands.
 */
export class Semaphore {
  private current = 0;
  private queue: Array<() => void> = [];

  constructor(private readonly max: number) {
    if (!Number.isInteger(max) || max < 1) {
      throw new RangeError(`Semaphore size must be a positive integer, got ${max}`);
    }
  }

  async acquire(): Promise<void> {
    if (this.current < this.max) {
      this.current++;
      return;
    }
    return new Promise<void>((resolve) => {
      this.queue.push(() => {
        this.current++;
        resolve();
      });
    });
  }

  /** Take a slot only if one is free right now. */
  tryAcquire(): boolean {
    if (this.current >= this.max) return false;
    this.current++;
    return true;
  }

  release(): void {
    this.current--;
    const next = this.queue.shift();
    if (next) next();
  }

  get active(): number {
    return this.current;
  }

  get waiting(): number {
    return this.queue.length;
  }
}
