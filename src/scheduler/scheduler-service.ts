/**
 * Scheduler Service
 *
 * The run loop. Jobs sit in a (nextRun, id) min-heap; the loop fires
 * everything due, then sleeps until the earliest next run, clamped to
 * [minDelay, maxDelay], or `defaultDelay` when nothing is queued. Adding
 * or removing a job kicks the loop awake early.
 *
 * Each fire is a tracked task in the scheduler's bucket. A repeating job
 * is re-queued only after its fire finishes, so a slow job never overlaps
 * itself, and its next run comes from its trigger at that moment.
 */

import type { Logger } from "pino";
import { JobTimeoutError } from "../errors.js";
import type { JobId, SchedulerConfig } from "../types/index.js";
import { getLogger } from "../utils/logger.js";
import { TaskBucket } from "../core/tasks.js";
import type { TaskHandle } from "../core/tasks.js";
import { ExecutionTracker, trackExecution } from "../core/execution.js";
import type { ExecutionResult } from "../core/execution.js";
import { JobQueue } from "./job-queue.js";
import type { JobInfo, ScheduledJob } from "./job.js";

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  minDelaySeconds: 1,
  maxDelaySeconds: 30,
  defaultDelaySeconds: 15,
  historySize: 20,
  behindScheduleWarnSeconds: 1,
};

export interface SchedulerServiceOptions {
  config?: Partial<SchedulerConfig>;
  tasks?: TaskBucket;
  tracker?: ExecutionTracker;
  logger?: Logger;
  now?: () => number;
}

export class SchedulerService {
  readonly config: SchedulerConfig;
  readonly tasks: TaskBucket;
  readonly tracker: ExecutionTracker;
  readonly now: () => number;
  private queue = new JobQueue();
  private jobs = new Map<JobId, ScheduledJob>();
  private log: Logger;

  private running = false;
  private loop: Promise<void> | undefined;
  private wake: (() => void) | undefined;

  constructor(opts: SchedulerServiceOptions = {}) {
    this.config = { ...DEFAULT_SCHEDULER_CONFIG, ...opts.config };
    this.log = opts.logger ?? getLogger("scheduler");
    this.tasks = opts.tasks ?? new TaskBucket("scheduler", { logger: this.log });
    this.tracker = opts.tracker ?? new ExecutionTracker({ logger: this.log });
    this.now = opts.now ?? Date.now;
  }

  get isRunning(): boolean {
    return this.running;
  }

  // ─── Lifecycle ───────────────────────────────────────────────

  start(): void {
    if (this.running) return;
    this.running = true;
    this.loop = this.run();
    this.log.info({ jobCount: this.jobs.size }, "Scheduler started");
  }

  /** Stop the loop. Fires already in flight keep running. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.kick();
    await this.loop;
    this.loop = undefined;
    this.log.info("Scheduler stopped");
  }

  /** Stop the loop and cancel in-flight fires. */
  async shutdown(timeoutSeconds?: number): Promise<void> {
    await this.stop();
    await this.tasks.cancelAll(timeoutSeconds);
  }

  /** Wake the loop to re-check the queue. */
  kick(): void {
    this.wake?.();
  }

  private async run(): Promise<void> {
    try {
      while (this.running) {
        this.runPending();
        await this.sleep(this.delayMs());
      }
    } catch (err) {
      this.running = false;
      this.log.fatal({ err }, "Scheduler loop crashed");
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        this.wake = undefined;
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.wake = done;
    });
  }

  /** How long to sleep before the next pass. */
  delayMs(now = this.now()): number {
    const { minDelaySeconds, maxDelaySeconds, defaultDelaySeconds } = this.config;
    const next = this.queue.nextRunTime();
    const seconds =
      next === undefined ? defaultDelaySeconds : Math.max((next - now) / 1000, minDelaySeconds);
    return Math.min(seconds, maxDelaySeconds) * 1000;
  }

  // ─── Jobs ────────────────────────────────────────────────────

  addJob(job: ScheduledJob): ScheduledJob {
    this.jobs.set(job.id, job);
    this.queue.add(job);
    this.log.debug(
      { jobId: job.id, job: job.name, owner: job.owner, nextRun: new Date(job.nextRun).toISOString() },
      "Job scheduled",
    );
    this.kick();
    return job;
  }

  /** Cancel and drop a job. False if it was not scheduled. */
  removeJob(job: ScheduledJob): boolean {
    job.cancel();
    const known = this.jobs.delete(job.id);
    this.queue.remove(job);
    if (known) {
      this.log.debug({ jobId: job.id, job: job.name, owner: job.owner }, "Job removed");
      this.kick();
    }
    return known;
  }

  removeJobsByOwner(owner: string): number {
    let count = 0;
    for (const job of [...this.jobs.values()]) {
      if (job.owner !== owner) continue;
      job.cancel();
      this.jobs.delete(job.id);
      count++;
    }
    this.queue.removeOwner(owner);
    if (count > 0) {
      this.log.debug({ owner, count }, "Removed jobs for owner");
      this.kick();
    }
    return count;
  }

  getJob(id: JobId): ScheduledJob | undefined {
    return this.jobs.get(id);
  }

  listJobs(owner?: string): JobInfo[] {
    const all = [...this.jobs.values()].sort((a, b) => a.id - b.id);
    return (owner === undefined ? all : all.filter((j) => j.owner === owner)).map((j) =>
      j.info(),
    );
  }

  get jobCount(): number {
    return this.jobs.size;
  }

  // ─── Firing ──────────────────────────────────────────────────

  /**
   * Fire every job due at `now`. Returns the spawned fire tasks, in fire
   * order; repeating jobs are re-queued as each one settles.
   */
  runPending(now = this.now()): TaskHandle<void>[] {
    const fired: TaskHandle<void>[] = [];
    for (const job of this.queue.popDue(now)) {
      if (job.cancelled) {
        this.log.debug({ jobId: job.id, job: job.name }, "Job is cancelled, skipping");
        continue;
      }
      fired.push(this.fire(job, now));
    }
    return fired;
  }

  private fire(job: ScheduledJob, now: number): TaskHandle<void> {
    const scheduledFor = job.nextRun;
    const behindMs = now - scheduledFor;
    if (behindMs > this.config.behindScheduleWarnSeconds * 1000) {
      this.log.warn(
        { jobId: job.id, job: job.name, owner: job.owner, behindSeconds: behindMs / 1000 },
        `Job ${job.name} is behind schedule by ${(behindMs / 1000).toFixed(1)}s, running now`,
      );
    }

    return this.tasks.spawn(
      `scheduler:${job.name}`,
      async (signal) => {
        await trackExecution(() => this.execute(job, signal), {
          onResult: (result) => this.recordOutcome(job, scheduledFor, result),
        });
        this.reschedule(job);
      },
      { owner: job.owner },
    );
  }

  private async execute(job: ScheduledJob, signal: AbortSignal): Promise<void> {
    const timeoutSeconds = job.timeoutSeconds;
    if (timeoutSeconds === undefined) {
      await job.fn({ job, args: job.args, kwargs: job.kwargs, signal });
      return;
    }

    const controller = new AbortController();
    const relay = (): void => controller.abort(signal.reason);
    signal.addEventListener("abort", relay, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        const err = new JobTimeoutError(job.name, timeoutSeconds);
        reject(err);
        controller.abort(err);
      }, timeoutSeconds * 1000);
    });

    try {
      const run = Promise.resolve().then(() =>
        job.fn({ job, args: job.args, kwargs: job.kwargs, signal: controller.signal }),
      );
      await Promise.race([run, timedOut]);
    } finally {
      clearTimeout(timer);
      signal.removeEventListener("abort", relay);
    }
  }

  private recordOutcome(job: ScheduledJob, scheduledFor: number, result: ExecutionResult): void {
    job.recordExecution(scheduledFor, result);
    this.tracker.record("job", job.id, job.owner, job.name, result);

    const ctx = { jobId: job.id, job: job.name, owner: job.owner };
    switch (result.status) {
      case "error":
      case "di_failure":
        this.log.error({ ...ctx, err: result.error }, `Error running job ${job.name}`);
        break;
      case "cancelled":
        this.log.debug(ctx, `Execution cancelled for job ${job.name}`);
        break;
      case "success":
        break;
    }
  }

  private reschedule(job: ScheduledJob): void {
    if (job.cancelled || !this.jobs.has(job.id)) return;

    const next = job.repeat ? job.trigger?.nextRunTime(this.now()) : undefined;
    if (next === undefined) {
      this.jobs.delete(job.id);
      this.log.debug({ jobId: job.id, job: job.name }, "Job finished");
      return;
    }

    const previous = job.nextRun;
    job.setNextRun(next);
    this.queue.add(job);
    this.log.debug(
      { jobId: job.id, job: job.name, from: previous, to: next },
      "Rescheduled repeating job",
    );
    this.kick();
  }
}
