/**
 * Task supervision.
 *
 * A TaskBucket tracks the concurrent units of work spawned for one
 * owner (the bus, the scheduler, an app). Each unit gets its own
 * AbortController; cancelling is cooperative. Work is expected to watch
 * its signal at suspension points and reject with CancelledError.
 *
 * Handles remove themselves from the bucket when they settle, so the
 * bucket only ever holds in-flight work.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { setTimeout as delay } from "node:timers/promises";
import type { Logger } from "pino";
import { CancelledError, isCancellation } from "../errors.js";
import type { TaskId } from "../types/index.js";
import { genTaskId } from "../utils/ids.js";
import { getLogger } from "../utils/logger.js";

export type TaskState = "running" | "done" | "failed" | "cancelled";

export type TaskWork<T> = (signal: AbortSignal) => Promise<T> | T;

const taskStorage = new AsyncLocalStorage<TaskHandle<unknown>>();

/** The task the caller is running inside, if it was spawned by a TaskBucket. */
export function currentTask(): TaskHandle<unknown> | undefined {
  return taskStorage.getStore();
}

/** Sleep that rejects with CancelledError as soon as `signal` aborts. */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) throw new CancelledError();
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (isCancellation(err)) throw new CancelledError();
    throw err;
  }
}

export class TaskHandle<T> {
  readonly id: TaskId = genTaskId();
  readonly promise: Promise<T>;
  private controller = new AbortController();
  private _state: TaskState = "running";
  private _error: unknown;

  constructor(
    readonly name: string,
    readonly owner: string,
    work: TaskWork<T>,
  ) {
    // Start on a microtask so spawn() returns before any work runs.
    this.promise = Promise.resolve().then(() =>
      taskStorage.run(this, () => work(this.controller.signal)),
    );
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get state(): TaskState {
    return this._state;
  }

  get done(): boolean {
    return this._state !== "running";
  }

  get cancelled(): boolean {
    return this._state === "cancelled";
  }

  get error(): unknown {
    return this._error;
  }

  /** Request cancellation. A no-op once the task has settled. */
  cancel(reason = "Task was cancelled"): void {
    if (this.done || this.controller.signal.aborted) return;
    this.controller.abort(new CancelledError(reason));
  }

  /** @internal */
  settle(state: Exclude<TaskState, "running">, error?: unknown): void {
    this._state = state;
    this._error = error;
  }
}

export interface TaskBucketOptions {
  cancellationTimeoutSeconds?: number;
  logger?: Logger;
}

export class TaskBucket {
  private tasks = new Set<TaskHandle<unknown>>();
  private log: Logger;
  readonly cancellationTimeoutSeconds: number;

  constructor(
    readonly name: string,
    opts: TaskBucketOptions = {},
  ) {
    this.cancellationTimeoutSeconds = opts.cancellationTimeoutSeconds ?? 5;
    this.log = opts.logger ?? getLogger("tasks");
  }

  /**
   * Start `work` as a tracked, independently cancellable unit. Errors other
   * than cancellation are logged at error level; the returned promise
   * still rejects for anyone awaiting it.
   */
  spawn<T>(name: string, work: TaskWork<T>, opts: { owner?: string } = {}): TaskHandle<T> {
    const handle = new TaskHandle<T>(name, opts.owner ?? this.name, work);
    this.tasks.add(handle);

    handle.promise.then(
      () => {
        handle.settle(handle.signal.aborted ? "cancelled" : "done");
        this.tasks.delete(handle);
      },
      (err: unknown) => {
        this.tasks.delete(handle);
        if (isCancellation(err)) {
          handle.settle("cancelled", err);
          return;
        }
        handle.settle("failed", err);
        this.log.error(
          { err, bucket: this.name, task: name, owner: handle.owner },
          `Task ${name} failed`,
        );
      },
    );
    return handle;
  }

  /**
   * Cancel every in-flight task except the caller's own, wait up to
   * `timeoutSeconds` for them to wind down, and log the stragglers.
   * Tasks that ignore their signal are left running.
   */
  async cancelAll(timeoutSeconds = this.cancellationTimeoutSeconds): Promise<void> {
    const self = currentTask();
    const targets = [...this.tasks].filter((t) => !t.done && t !== self);

    if (targets.length === 0) {
      this.log.debug({ bucket: this.name }, "No tasks to cancel");
      return;
    }

    this.log.debug({ bucket: this.name, count: targets.length }, "Cancelling tasks");
    for (const t of targets) t.cancel();

    const settled = Promise.allSettled(targets.map((t) => t.promise));
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, timeoutSeconds * 1000);
    });
    try {
      await Promise.race([settled, timeout]);
    } finally {
      clearTimeout(timer);
    }
    // Let settlement callbacks for tasks that just finished run first.
    await Promise.resolve();

    for (const t of targets) {
      if (t.state === "failed") {
        this.log.warn(
          { err: t.error, bucket: this.name, task: t.name, owner: t.owner },
          `Task ${t.name} errored during shutdown`,
        );
      } else if (!t.done) {
        this.log.warn(
          { bucket: this.name, task: t.name, owner: t.owner, timeoutSeconds },
          `Task ${t.name} refused to die within ${timeoutSeconds.toFixed(1)}s`,
        );
      }
    }
  }

  /** In-flight tasks, optionally for one owner. */
  list(owner?: string): TaskHandle<unknown>[] {
    const all = [...this.tasks];
    return owner === undefined ? all : all.filter((t) => t.owner === owner);
  }

  get size(): number {
    return this.tasks.size;
  }
}
