/**
 * Scheduler Tests
 *
 * The service is driven by hand through runPending() against an injected
 * clock; the run loop itself is only started in the lifecycle test.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { SchedulerService } from "../../src/scheduler/scheduler-service.js";
import { Scheduler, resolveStart } from "../../src/scheduler/scheduler.js";
import type { JobContext } from "../../src/scheduler/job.js";
import type { ExecutionEvent } from "../../src/core/execution.js";
import { sleep } from "../../src/core/tasks.js";
import { InvalidIntervalError } from "../../src/errors.js";
import { captureLogs } from "../support/log-capture.js";
import type { CapturedLogger } from "../support/log-capture.js";

const T0 = Date.UTC(2024, 0, 1, 12, 0, 0);

let clock: number;
let logs: CapturedLogger;
let service: SchedulerService;
let scheduler: Scheduler;

beforeEach(() => {
  clock = T0;
  logs = captureLogs();
  service = new SchedulerService({ logger: logs.logger, now: () => clock });
  scheduler = new Scheduler("app", service);
});

async function fireDue(at: number): Promise<void> {
  clock = at;
  await Promise.allSettled(service.runPending(at).map((h) => h.promise));
}

describe("Scheduler", () => {
  it("runs a one-shot job once and forgets it", async () => {
    const fn = vi.fn();
    scheduler.runIn(fn, 5);

    await fireDue(T0 + 4_000);
    expect(fn).not.toHaveBeenCalled();

    await fireDue(T0 + 5_000);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(service.jobCount).toBe(0);
    expect(scheduler.jobs()).toEqual([]);
  });

  it("passes frozen copies of args and kwargs", async () => {
    const args = [1, 2];
    const kwargs: Record<string, unknown> = { room: "kitchen" };
    const seen: JobContext[] = [];
    const job = scheduler.runOnce((ctx) => void seen.push(ctx), T0 + 1_000, { args, kwargs });

    args.push(3);
    kwargs.room = "hall";
    await fireDue(T0 + 1_000);

    expect(seen).toHaveLength(1);
    expect(seen[0].args).toEqual([1, 2]);
    expect(seen[0].kwargs).toEqual({ room: "kitchen" });
    expect(seen[0].job).toBe(job);
    expect(Object.isFrozen(job.args)).toBe(true);
  });

  it("repeats on its interval grid after each fire", async () => {
    const fn = vi.fn();
    const job = scheduler.runEvery(fn, 10);
    expect(job.nextRun).toBe(T0 + 10_000);

    await fireDue(T0 + 10_000);
    expect(job.nextRun).toBe(T0 + 20_000);

    // A stall skips the missed ticks.
    await fireDue(T0 + 45_000);
    expect(fn).toHaveBeenCalledTimes(2);
    expect(job.nextRun).toBe(T0 + 50_000);
    expect(job.history.map((h) => h.scheduledFor)).toEqual([T0 + 10_000, T0 + 20_000]);
  });

  it("warns when a fire runs behind schedule", async () => {
    scheduler.runOnce(() => {}, T0 + 1_000, { name: "tick" });
    await fireDue(T0 + 3_000);
    expect(logs.messages(40)).toEqual(["Job tick is behind schedule by 2.0s, running now"]);
  });

  it("records errors and keeps repeating", async () => {
    const job = scheduler.runEvery(
      () => {
        throw new Error("sensor offline");
      },
      60,
      { name: "poll" },
    );

    await fireDue(T0 + 60_000);
    expect(job.history[0]).toMatchObject({
      status: "error",
      errorMessage: "sensor offline",
      errorType: "Error",
    });
    expect(job.nextRun).toBe(T0 + 120_000);
    expect(logs.messages(50)).toEqual(["Error running job poll"]);
  });

  it("times out a slow job and aborts its signal", async () => {
    let aborted = false;
    const job = scheduler.runEvery(
      async ({ signal }) => {
        signal.addEventListener("abort", () => {
          aborted = true;
        });
        await sleep(5_000, signal);
      },
      60,
      { name: "slow", timeoutSeconds: 0.05 },
    );

    await fireDue(T0 + 60_000);
    expect(aborted).toBe(true);
    expect(job.history[0]).toMatchObject({
      status: "error",
      errorType: "JobTimeoutError",
      errorMessage: "Job slow timed out after 0.05s",
    });
    expect(service.jobCount).toBe(1);
  });

  it("publishes finished executions to tracker subscribers", async () => {
    const events: ExecutionEvent[] = [];
    service.tracker.subscribe((e) => events.push(e));
    const job = scheduler.runOnce(() => {}, T0, { name: "report" });

    await fireDue(T0);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      kind: "job",
      subjectId: job.id,
      owner: "app",
      name: "report",
      result: { status: "success" },
    });
  });

  it("fires cron jobs at the next matching time", () => {
    const job = scheduler.runCron(() => {}, { minute: 30, hour: "*" }, { timezone: "UTC" });
    expect(job.nextRun).toBe(Date.UTC(2024, 0, 1, 12, 30, 0));
    expect(job.info().trigger).toEqual({ kind: "cron", description: "cron(0 30 * * * *) UTC" });
  });

  it("seeds cron jobs from a start time", async () => {
    const hourly = { minute: 30, hour: "*" };
    const fn = vi.fn();
    const onMatch = scheduler.runCron(fn, hourly, {
      timezone: "UTC",
      start: Date.UTC(2024, 0, 1, 15, 30, 0),
    });
    const between = scheduler.runCron(() => {}, hourly, {
      timezone: "UTC",
      start: new Date(Date.UTC(2024, 0, 1, 15, 31, 0)),
    });
    const past = scheduler.runCron(() => {}, hourly, {
      timezone: "UTC",
      start: Date.UTC(2024, 0, 1, 9, 0, 0),
    });

    expect(onMatch.nextRun).toBe(Date.UTC(2024, 0, 1, 15, 30, 0));
    expect(between.nextRun).toBe(Date.UTC(2024, 0, 1, 16, 30, 0));
    expect(past.nextRun).toBe(Date.UTC(2024, 0, 1, 12, 30, 0));

    await fireDue(Date.UTC(2024, 0, 1, 15, 30, 0));
    expect(fn).toHaveBeenCalledTimes(1);
    expect(onMatch.nextRun).toBe(Date.UTC(2024, 0, 1, 16, 30, 0));
  });

  it("validates arguments", () => {
    expect(() => scheduler.runEvery(() => {}, 0)).toThrow(InvalidIntervalError);
    expect(() => scheduler.runIn(() => {}, -1)).toThrow("Delay must be zero or more seconds, got -1");
    expect(() => scheduler.schedule(() => {}, T0, { repeat: true })).toThrow(
      "A repeating job needs a trigger",
    );
    expect(() => scheduler.runOnce(() => {}, T0, { timeoutSeconds: 0 })).toThrow(
      "timeoutSeconds must be a positive number of seconds, got 0",
    );
    expect(service.jobCount).toBe(0);
  });

  it("cancels only its own jobs", async () => {
    const fn = vi.fn();
    const job = scheduler.runIn(fn, 1);
    const other = new Scheduler("other", service);

    expect(other.cancel(job)).toBe(false);
    expect(scheduler.cancel(job.id)).toBe(true);
    expect(scheduler.cancel(job)).toBe(false);

    await fireDue(T0 + 1_000);
    expect(fn).not.toHaveBeenCalled();
  });

  it("removes every job of an owner", () => {
    scheduler.runIn(() => {}, 1);
    scheduler.runEvery(() => {}, 5);
    new Scheduler("other", service).runIn(() => {}, 1);

    expect(scheduler.removeAllJobs()).toBe(2);
    expect(service.listJobs().map((j) => j.owner)).toEqual(["other"]);
  });
});

describe("SchedulerService", () => {
  it("clamps the loop delay", () => {
    expect(service.delayMs()).toBe(15_000);

    const near = scheduler.runIn(() => {}, 0.5);
    expect(service.delayMs()).toBe(1_000);
    scheduler.cancel(near);

    scheduler.runIn(() => {}, 100);
    expect(service.delayMs()).toBe(30_000);
  });

  it("starts and stops the loop", async () => {
    service.start();
    expect(service.isRunning).toBe(true);
    await service.shutdown(0.1);
    expect(service.isRunning).toBe(false);
    expect(logs.messages(30)).toEqual(["Scheduler started", "Scheduler stopped"]);
  });
});

describe("resolveStart", () => {
  const now = new Date(2024, 5, 1, 10, 0).getTime();

  it("takes a wall-clock time as its next occurrence", () => {
    expect(resolveStart([11, 15], now)).toBe(new Date(2024, 5, 1, 11, 15).getTime());
    expect(resolveStart([9, 30], now)).toBe(new Date(2024, 5, 2, 9, 30).getTime());
    expect(resolveStart([10, 0], now)).toBe(new Date(2024, 5, 2, 10, 0).getTime());
  });

  it("passes explicit times through", () => {
    expect(resolveStart(new Date(now + 5), now)).toBe(now + 5);
    expect(resolveStart(42, now)).toBe(42);
  });

  it("rejects impossible times", () => {
    expect(() => resolveStart([24, 0], now)).toThrow("Invalid start time 24:0");
  });
});
