/**
 * Execution tracking.
 *
 * One wrapper shared by listener invocations and job fires: time the
 * call, classify the outcome, capture the error. Handler errors and DI
 * failures are captured and returned; cancellation is recorded and then
 * re-thrown so the supervising task still sees it.
 *
 * ExecutionTracker fans finished executions out to subscribers (a
 * history store, a dashboard feed). Persistence lives outside the core.
 */

import type { Logger } from "pino";
import { performance } from "node:perf_hooks";
import { DependencyError, describeError, isCancellation } from "../errors.js";
import type { ExecutionRecord, ExecutionStatus } from "../types/index.js";
import { getLogger } from "../utils/logger.js";

export type OutcomeStatus = Exclude<ExecutionStatus, "pending">;

export interface ExecutionResult extends ExecutionRecord {
  status: OutcomeStatus;
  /** The captured error, when status is not "success". */
  error?: unknown;
}

export interface TrackOptions {
  /** Called with the result before it is returned (or before cancellation is re-thrown). */
  onResult?: (result: ExecutionResult) => void;
}

export function classifyError(err: unknown): OutcomeStatus {
  if (isCancellation(err)) return "cancelled";
  if (err instanceof DependencyError) return "di_failure";
  return "error";
}

export async function trackExecution(
  fn: () => unknown,
  opts: TrackOptions = {},
): Promise<ExecutionResult> {
  const startedAt = Date.now();
  const t0 = performance.now();

  let result: ExecutionResult;
  let rethrow: unknown;
  try {
    await fn();
    result = { startedAt, durationMs: performance.now() - t0, status: "success" };
  } catch (err) {
    const status = classifyError(err);
    const { message, type } = describeError(err);
    result = {
      startedAt,
      durationMs: performance.now() - t0,
      status,
      errorMessage: message,
      errorType: type,
      error: err,
    };
    if (status === "cancelled") rethrow = err;
  }

  opts.onResult?.(result);
  if (rethrow !== undefined) throw rethrow;
  return result;
}

// ─── Observer hub ──────────────────────────────────────────────

export type ExecutionKind = "listener" | "job";

export interface ExecutionEvent {
  kind: ExecutionKind;
  subjectId: number;
  owner: string;
  name: string;
  result: ExecutionRecord;
}

export type ExecutionSubscriber = (event: ExecutionEvent) => void;

export class ExecutionTracker {
  private subscribers = new Set<ExecutionSubscriber>();
  private log: Logger;

  constructor(opts: { logger?: Logger } = {}) {
    this.log = opts.logger ?? getLogger("execution");
  }

  /** Returns an unsubscribe function. */
  subscribe(fn: ExecutionSubscriber): () => void {
    this.subscribers.add(fn);
    return () => {
      this.subscribers.delete(fn);
    };
  }

  record(
    kind: ExecutionKind,
    subjectId: number,
    owner: string,
    name: string,
    result: ExecutionResult,
  ): void {
    if (this.subscribers.size === 0) return;
    const { error: _error, ...snapshot } = result;
    const event: ExecutionEvent = { kind, subjectId, owner, name, result: snapshot };
    for (const fn of this.subscribers) {
      try {
        fn(event);
      } catch (err) {
        this.log.warn({ err, kind, subjectId }, "Execution subscriber threw");
      }
    }
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }
}
