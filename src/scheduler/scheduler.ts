/**
 * Scheduler
 *
 * Owner-scoped face of the scheduler service. Every helper builds a
 * ScheduledJob and hands it to the service:
 *
 *   runOnce(at)          one fire at a time
 *   runIn(seconds)       one fire after a delay
 *   runEvery(seconds)    interval grid, first fire at `start` or now + interval
 *   runCron(fields)      cron fields, or a 5/6-field expression, optionally from `start`
 *   runMinutely/Hourly/Daily   interval shorthands
 *
 * Times are `Date`s or epoch milliseconds.
 */

import { InvalidIntervalError } from "../errors.js";
import type { JobId } from "../types/index.js";
import { CronTrigger, IntervalTrigger, OnceTrigger } from "./triggers.js";
import type { CronFields, CronOptions, Trigger } from "./triggers.js";
import { ScheduledJob } from "./job.js";
import type { JobArgs, JobFn, JobInfo, JobKwargs } from "./job.js";
import type { SchedulerService } from "./scheduler-service.js";

export type TimeLike = Date | number;

/** A start time, or an `[hour, minute]` wall-clock time taken as its next occurrence. */
export type StartLike = TimeLike | readonly [hour: number, minute: number];

export interface JobOptions<A extends JobArgs = JobArgs, K extends JobKwargs = JobKwargs> {
  name?: string;
  args?: A;
  kwargs?: K;
  timeoutSeconds?: number;
}

export interface ScheduleOptions<A extends JobArgs = JobArgs, K extends JobKwargs = JobKwargs>
  extends JobOptions<A, K> {
  trigger?: Trigger;
  repeat?: boolean;
}

export interface RepeatOptions<A extends JobArgs = JobArgs, K extends JobKwargs = JobKwargs>
  extends JobOptions<A, K> {
  start?: StartLike;
}

export interface CronJobOptions<A extends JobArgs = JobArgs, K extends JobKwargs = JobKwargs>
  extends JobOptions<A, K>,
    CronOptions {
  /** First fire is the first match at or after this time; a past start counts from now. */
  start?: StartLike;
}

type AnyJobOptions = ScheduleOptions & RepeatOptions & CronJobOptions;

function toMs(time: TimeLike): number {
  return time instanceof Date ? time.getTime() : time;
}

function positiveSeconds(label: string, seconds: number): number {
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidIntervalError(`${label} must be a positive number of seconds, got ${seconds}`);
  }
  return seconds;
}

/** Resolve `start` against `nowMs`; a wall-clock time is today's, or tomorrow's if already past. */
export function resolveStart(start: StartLike, nowMs: number): number {
  if (typeof start === "number" || start instanceof Date) return toMs(start);
  const [hour, minute] = start;
  if (hour < 0 || hour > 23 || minute < 0 || minute > 59) {
    throw new InvalidIntervalError(`Invalid start time ${hour}:${minute}`);
  }
  const at = new Date(nowMs);
  at.setHours(hour, minute, 0, 0);
  if (at.getTime() <= nowMs) at.setDate(at.getDate() + 1);
  return at.getTime();
}

export class Scheduler {
  constructor(
    readonly owner: string,
    private readonly service: SchedulerService,
  ) {}

  /** Add a job firing at `runAt`, repeating via `trigger` when `repeat` is set. */
  schedule<A extends JobArgs = JobArgs, K extends JobKwargs = JobKwargs>(
    fn: JobFn<A, K>,
    runAt: TimeLike,
    opts?: ScheduleOptions<A, K>,
  ): ScheduledJob;
  schedule(fn: JobFn, runAt: TimeLike, opts: AnyJobOptions = {}): ScheduledJob {
    const nextRun = toMs(runAt);
    if (!Number.isFinite(nextRun)) {
      throw new InvalidIntervalError(`Run time must be a valid time, got ${String(runAt)}`);
    }
    if (opts.repeat && !opts.trigger) {
      throw new InvalidIntervalError("A repeating job needs a trigger");
    }
    if (opts.timeoutSeconds !== undefined) positiveSeconds("timeoutSeconds", opts.timeoutSeconds);

    const job = new ScheduledJob({
      owner: this.owner,
      fn,
      nextRun,
      trigger: opts.trigger,
      repeat: opts.repeat,
      name: opts.name,
      args: opts.args,
      kwargs: opts.kwargs,
      timeoutSeconds: opts.timeoutSeconds,
      historySize: this.service.config.historySize,
    });
    return this.service.addJob(job);
  }

  runOnce<A extends JobArgs = JobArgs, K extends JobKwargs = JobKwargs>(
    fn: JobFn<A, K>,
    at: TimeLike,
    opts?: JobOptions<A, K>,
  ): ScheduledJob;
  runOnce(fn: JobFn, at: TimeLike, opts: AnyJobOptions = {}): ScheduledJob {
    const atMs = toMs(at);
    return this.schedule(fn, atMs, { ...opts, trigger: new OnceTrigger(atMs), repeat: false });
  }

  runIn<A extends JobArgs = JobArgs, K extends JobKwargs = JobKwargs>(
    fn: JobFn<A, K>,
    delaySeconds: number,
    opts?: RepeatOptions<A, K>,
  ): ScheduledJob;
  runIn(fn: JobFn, delaySeconds: number, opts: AnyJobOptions = {}): ScheduledJob {
    if (!Number.isFinite(delaySeconds) || delaySeconds < 0) {
      throw new InvalidIntervalError(`Delay must be zero or more seconds, got ${delaySeconds}`);
    }
    const base = opts.start === undefined ? this.service.now() : resolveStart(opts.start, this.service.now());
    return this.runOnce(fn, base + delaySeconds * 1000, opts);
  }

  runEvery<A extends JobArgs = JobArgs, K extends JobKwargs = JobKwargs>(
    fn: JobFn<A, K>,
    intervalSeconds: number,
    opts?: RepeatOptions<A, K>,
  ): ScheduledJob;
  runEvery(fn: JobFn, intervalSeconds: number, opts: AnyJobOptions = {}): ScheduledJob {
    const intervalMs = positiveSeconds("Interval", intervalSeconds) * 1000;
    const now = this.service.now();
    const first = opts.start === undefined ? now + intervalMs : resolveStart(opts.start, now);
    const trigger = new IntervalTrigger(intervalMs, first);
    return this.schedule(fn, first, { ...opts, trigger, repeat: true });
  }

  /** Cron fields (unset: second/minute/hour 0, the rest `*`) or an expression string. */
  runCron<A extends JobArgs = JobArgs, K extends JobKwargs = JobKwargs>(
    fn: JobFn<A, K>,
    cron: CronFields | string,
    opts?: CronJobOptions<A, K>,
  ): ScheduledJob;
  runCron(fn: JobFn, cron: CronFields | string, opts: AnyJobOptions = {}): ScheduledJob {
    const cronOpts = { timezone: opts.timezone };
    const trigger =
      typeof cron === "string"
        ? CronTrigger.fromExpression(cron, cronOpts)
        : CronTrigger.fromFields(cron, cronOpts);
    const now = this.service.now();
    const seed = opts.start === undefined ? now : Math.max(resolveStart(opts.start, now) - 1, now);
    const first = trigger.nextRunTime(seed);
    if (first === undefined) {
      throw new InvalidIntervalError(`${trigger.describe()} never fires`);
    }
    return this.schedule(fn, first, { ...opts, trigger, repeat: true });
  }

  runMinutely<A extends JobArgs = JobArgs, K extends JobKwargs = JobKwargs>(
    fn: JobFn<A, K>,
    minutes?: number,
    opts?: RepeatOptions<A, K>,
  ): ScheduledJob;
  runMinutely(fn: JobFn, minutes = 1, opts: AnyJobOptions = {}): ScheduledJob {
    return this.runEvery(fn, positiveSeconds("minutes", minutes) * 60, opts);
  }

  runHourly<A extends JobArgs = JobArgs, K extends JobKwargs = JobKwargs>(
    fn: JobFn<A, K>,
    hours?: number,
    opts?: RepeatOptions<A, K>,
  ): ScheduledJob;
  runHourly(fn: JobFn, hours = 1, opts: AnyJobOptions = {}): ScheduledJob {
    return this.runEvery(fn, positiveSeconds("hours", hours) * 3600, opts);
  }

  runDaily<A extends JobArgs = JobArgs, K extends JobKwargs = JobKwargs>(
    fn: JobFn<A, K>,
    days?: number,
    opts?: RepeatOptions<A, K>,
  ): ScheduledJob;
  runDaily(fn: JobFn, days = 1, opts: AnyJobOptions = {}): ScheduledJob {
    return this.runEvery(fn, positiveSeconds("days", days) * 86_400, opts);
  }

  /** Cancel one of this owner's jobs. Future fires stop; a running fire completes. */
  cancel(job: ScheduledJob | JobId): boolean {
    const target = typeof job === "number" ? this.service.getJob(job) : job;
    if (!target || target.owner !== this.owner) return false;
    return this.service.removeJob(target);
  }

  jobs(): JobInfo[] {
    return this.service.listJobs(this.owner);
  }

  removeAllJobs(): number {
    return this.service.removeJobsByOwner(this.owner);
  }
}
