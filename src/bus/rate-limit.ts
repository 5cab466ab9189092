/**
 * Listener rate limiting.
 *
 * Both policies drop rather than queue: intermediate events inside the
 * window are discarded.
 *
 *   debounce  trailing edge. Every event restarts the timer; when the
 *             listener has been quiet for the window, the newest event fires.
 *   throttle  leading edge. The first event fires, then:
 *               "fixed"   events within the window after the last *fired*
 *                         event are dropped;
 *               "sliding" every event, fired or dropped, restarts the
 *                         window, so a continuous burst fires once.
 */

import { ConfigurationError } from "../errors.js";
import type { Event } from "../types/index.js";

export type RateLimitWindow = "fixed" | "sliding";

export interface RateLimitOptions {
  /** Seconds. */
  debounce?: number;
  /** Seconds. */
  throttle?: number;
  rateLimitWindow?: RateLimitWindow;
}

export interface RateLimiter {
  readonly kind: "debounce" | "throttle";
  /** Either calls `fire` now, later, or never. */
  submit(event: Event, fire: (event: Event) => void): void;
  /** Drop anything pending. */
  cancel(): void;
}

type Clock = () => number;

function checkWindow(name: string, seconds: number): number {
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigurationError(`${name} must be a positive number of seconds, got ${seconds}`);
  }
  return seconds * 1000;
}

export class Debouncer implements RateLimiter {
  readonly kind = "debounce";
  private timer: NodeJS.Timeout | undefined;
  private readonly windowMs: number;

  constructor(seconds: number) {
    this.windowMs = checkWindow("debounce", seconds);
  }

  submit(event: Event, fire: (event: Event) => void): void {
    clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = undefined;
      fire(event);
    }, this.windowMs);
  }

  get pending(): boolean {
    return this.timer !== undefined;
  }

  cancel(): void {
    clearTimeout(this.timer);
    this.timer = undefined;
  }
}

export class Throttler implements RateLimiter {
  readonly kind = "throttle";
  private last: number | undefined;
  private readonly windowMs: number;

  constructor(
    seconds: number,
    readonly window: RateLimitWindow = "fixed",
    private readonly now: Clock = Date.now,
  ) {
    this.windowMs = checkWindow("throttle", seconds);
  }

  submit(event: Event, fire: (event: Event) => void): void {
    const now = this.now();
    const open = this.last === undefined || now - this.last >= this.windowMs;
    if (open || this.window === "sliding") this.last = now;
    if (open) fire(event);
  }

  cancel(): void {
    this.last = undefined;
  }
}

/** Build the limiter for a listener's options, if it has one. */
export function createRateLimiter(opts: RateLimitOptions, now?: Clock): RateLimiter | undefined {
  if (opts.debounce !== undefined && opts.throttle !== undefined) {
    throw new ConfigurationError("debounce and throttle cannot be combined on one listener");
  }
  if (opts.debounce !== undefined) return new Debouncer(opts.debounce);
  if (opts.throttle !== undefined) return new Throttler(opts.throttle, opts.rateLimitWindow, now);
  return undefined;
}
