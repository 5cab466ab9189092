/**
 * Triggers
 *
 * A trigger turns "now" into the next fire time. All of them skip missed
 * ticks: after a stall the next fire is the first boundary strictly after
 * now, never a burst replaying what was missed.
 */

import { Cron } from "croner";
import { InvalidCronExpressionError, InvalidIntervalError } from "../errors.js";

export type TriggerKind = "interval" | "cron" | "once";

export interface Trigger {
  readonly kind: TriggerKind;
  /** First fire time (epoch ms) strictly after `nowMs`, or undefined once exhausted. */
  nextRunTime(nowMs: number): number | undefined;
  describe(): string;
}

// ─── Interval ──────────────────────────────────────────────────

/** Next point on the grid `startMs + k * intervalMs` strictly after `nowMs`. */
export function nextGridPoint(startMs: number, intervalMs: number, nowMs: number): number {
  if (nowMs < startMs) return startMs;
  const steps = Math.floor((nowMs - startMs) / intervalMs) + 1;
  return startMs + steps * intervalMs;
}

export class IntervalTrigger implements Trigger {
  readonly kind = "interval";

  constructor(
    readonly intervalMs: number,
    readonly startMs: number,
  ) {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new InvalidIntervalError(`Interval must be a positive duration, got ${intervalMs}ms`);
    }
    if (!Number.isFinite(startMs)) {
      throw new InvalidIntervalError(`Interval start must be a valid time, got ${startMs}`);
    }
  }

  nextRunTime(nowMs: number): number {
    return nextGridPoint(this.startMs, this.intervalMs, nowMs);
  }

  describe(): string {
    return `every ${this.intervalMs / 1000}s from ${new Date(this.startMs).toISOString()}`;
  }
}

// ─── Cron ──────────────────────────────────────────────────────

export interface CronFields {
  second?: number | string;
  minute?: number | string;
  hour?: number | string;
  dayOfMonth?: number | string;
  month?: number | string;
  dayOfWeek?: number | string;
}

export interface CronOptions {
  /** IANA zone; defaults to the process zone. */
  timezone?: string;
}

const FIELD_ORDER = ["second", "minute", "hour", "dayOfMonth", "month", "dayOfWeek"] as const;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function compile(pattern: string, timezone?: string): Cron {
  try {
    return new Cron(pattern, { timezone, paused: true });
  } catch (err) {
    throw new InvalidCronExpressionError("expression", pattern, errorMessage(err));
  }
}

export class CronTrigger implements Trigger {
  readonly kind = "cron";
  private readonly cron: Cron;

  private constructor(
    readonly pattern: string,
    readonly timezone: string | undefined,
  ) {
    this.cron = compile(pattern, timezone);
  }

  /**
   * Build from individual fields. Each field is checked on its own first so
   * that a bad one is reported by name.
   */
  static fromFields(fields: CronFields = {}, opts: CronOptions = {}): CronTrigger {
    const values = {
      second: fields.second ?? 0,
      minute: fields.minute ?? 0,
      hour: fields.hour ?? 0,
      dayOfMonth: fields.dayOfMonth ?? "*",
      month: fields.month ?? "*",
      dayOfWeek: fields.dayOfWeek ?? "*",
    };

    FIELD_ORDER.forEach((field, index) => {
      const value = String(values[field]).trim();
      if (value === "" || /\s/.test(value)) {
        throw new InvalidCronExpressionError(field, value, "must be a single non-empty field");
      }
      const probe = FIELD_ORDER.map((_, i) => (i === index ? value : "*")).join(" ");
      try {
        new Cron(probe, { paused: true });
      } catch (err) {
        throw new InvalidCronExpressionError(field, value, errorMessage(err));
      }
    });

    const pattern = FIELD_ORDER.map((f) => String(values[f]).trim()).join(" ");
    return new CronTrigger(pattern, opts.timezone);
  }

  /** Standard 5-field (minute-first) or 6-field (second-first) expression. */
  static fromExpression(expression: string, opts: CronOptions = {}): CronTrigger {
    const parts = expression.trim().split(/\s+/);
    if (parts.length !== 5 && parts.length !== 6) {
      throw new InvalidCronExpressionError(
        "expression",
        expression,
        `expected 5 or 6 fields, got ${parts.length}`,
      );
    }
    const [second, minute, hour, dayOfMonth, month, dayOfWeek] =
      parts.length === 5 ? ["0", ...parts] : parts;
    return CronTrigger.fromFields({ second, minute, hour, dayOfMonth, month, dayOfWeek }, opts);
  }

  nextRunTime(nowMs: number): number | undefined {
    const next = this.cron.nextRun(new Date(nowMs));
    if (!next) return undefined;
    const ms = next.getTime();
    if (ms > nowMs) return ms;
    return this.cron.nextRun(new Date(nowMs + 1000))?.getTime();
  }

  describe(): string {
    return this.timezone ? `cron(${this.pattern}) ${this.timezone}` : `cron(${this.pattern})`;
  }
}

// ─── Once ──────────────────────────────────────────────────────

export class OnceTrigger implements Trigger {
  readonly kind = "once";

  constructor(readonly atMs: number) {
    if (!Number.isFinite(atMs)) {
      throw new InvalidIntervalError(`Run time must be a valid time, got ${atMs}`);
    }
  }

  nextRunTime(nowMs: number): number | undefined {
    return this.atMs > nowMs ? this.atMs : undefined;
  }

  describe(): string {
    return `once at ${new Date(this.atMs).toISOString()}`;
  }
}
