/**
 * Scheduled jobs.
 *
 * A job is fixed at creation except for `nextRun`, the cancellation flag
 * and its execution history. Args and kwargs are copied and frozen, so the
 * caller mutating its own array or object afterwards has no effect.
 */

import type { ExecutionRecord, JobId } from "../types/index.js";
import { nextJobId } from "../utils/ids.js";
import { captureSourceLocation } from "../utils/source-location.js";
import type { ExecutionResult } from "../core/execution.js";
import type { Trigger, TriggerKind } from "./triggers.js";

export type JobArgs = readonly unknown[];
export type JobKwargs = Readonly<Record<string, unknown>>;

export interface JobContext<A extends JobArgs = JobArgs, K extends JobKwargs = JobKwargs> {
  readonly job: ScheduledJob;
  readonly args: A;
  readonly kwargs: K;
  /** Aborted on shutdown or when the job's timeout expires. */
  readonly signal: AbortSignal;
}

export type JobFn<A extends JobArgs = JobArgs, K extends JobKwargs = JobKwargs> = (
  ctx: JobContext<A, K>,
) => unknown;

export interface JobSpec {
  owner: string;
  fn: JobFn;
  nextRun: number;
  trigger?: Trigger;
  repeat?: boolean;
  name?: string;
  args?: JobArgs;
  kwargs?: JobKwargs;
  timeoutSeconds?: number;
  historySize?: number;
  sourceLocation?: string;
}

export interface JobExecution extends ExecutionRecord {
  /** Epoch ms the job was due. */
  scheduledFor: number;
}

export interface JobInfo {
  id: JobId;
  name: string;
  owner: string;
  nextRun: string;
  repeat: boolean;
  cancelled: boolean;
  trigger: { kind: TriggerKind; description: string } | null;
  timeoutSeconds: number | null;
  sourceLocation: string | null;
  history: JobExecution[];
}

export const DEFAULT_HISTORY_SIZE = 20;

export class ScheduledJob {
  readonly id: JobId;
  readonly owner: string;
  readonly name: string;
  readonly fn: JobFn;
  readonly trigger: Trigger | undefined;
  readonly repeat: boolean;
  readonly args: JobArgs;
  readonly kwargs: JobKwargs;
  readonly timeoutSeconds: number | undefined;
  readonly sourceLocation: string | undefined;
  private _nextRun: number;
  private _cancelled = false;
  private _history: JobExecution[] = [];
  private readonly historySize: number;

  constructor(spec: JobSpec) {
    this.id = nextJobId();
    this.owner = spec.owner;
    this.fn = spec.fn;
    this.name = spec.name || spec.fn.name || `job-${this.id}`;
    this.trigger = spec.trigger;
    this.repeat = spec.repeat ?? false;
    this.args = Object.freeze([...(spec.args ?? [])]);
    this.kwargs = Object.freeze({ ...(spec.kwargs ?? {}) });
    this.timeoutSeconds = spec.timeoutSeconds;
    this.historySize = spec.historySize ?? DEFAULT_HISTORY_SIZE;
    this.sourceLocation = spec.sourceLocation ?? captureSourceLocation();
    this._nextRun = spec.nextRun;
  }

  get nextRun(): number {
    return this._nextRun;
  }

  get cancelled(): boolean {
    return this._cancelled;
  }

  /** Most recent last. */
  get history(): readonly JobExecution[] {
    return this._history;
  }

  setNextRun(ms: number): void {
    this._nextRun = ms;
  }

  /** Prevents future fires; a fire already running completes. */
  cancel(): void {
    this._cancelled = true;
  }

  recordExecution(scheduledFor: number, result: ExecutionResult): void {
    const { error: _error, ...record } = result;
    this._history.push({ ...record, scheduledFor });
    if (this._history.length > this.historySize) {
      this._history.splice(0, this._history.length - this.historySize);
    }
  }

  info(): JobInfo {
    return {
      id: this.id,
      name: this.name,
      owner: this.owner,
      nextRun: new Date(this._nextRun).toISOString(),
      repeat: this.repeat,
      cancelled: this._cancelled,
      trigger: this.trigger
        ? { kind: this.trigger.kind, description: this.trigger.describe() }
        : null,
      timeoutSeconds: this.timeoutSeconds ?? null,
      sourceLocation: this.sourceLocation ?? null,
      history: [...this._history],
    };
  }

  toString(): string {
    return `ScheduledJob<${this.owner}:${this.name}#${this.id} at ${new Date(this._nextRun).toISOString()}>`;
  }
}
