/**
 * Per-listener execution metrics.
 *
 * One mutable aggregate per listener, updated in place after every
 * invocation from the event loop. Counters only grow; the last-* fields
 * are overwritten. External readers get a plain snapshot via toJSON().
 */

import type { ListenerId } from "../types/index.js";
import type { ExecutionResult } from "../core/execution.js";

export interface ListenerMetricsSnapshot {
  listenerId: ListenerId;
  owner: string;
  topic: string;
  handlerName: string;
  totalInvocations: number;
  successful: number;
  failed: number;
  diFailures: number;
  cancelled: number;
  avgDurationMs: number;
  minDurationMs: number;
  maxDurationMs: number;
  totalDurationMs: number;
  lastInvokedAt: number | null;
  lastErrorMessage: string | null;
  lastErrorType: string | null;
}

export class ListenerMetrics {
  totalInvocations = 0;
  successful = 0;
  failed = 0;
  diFailures = 0;
  cancelled = 0;

  totalDurationMs = 0;
  minDurationMs = 0;
  maxDurationMs = 0;

  lastInvokedAt: number | null = null;
  lastErrorMessage: string | null = null;
  lastErrorType: string | null = null;

  constructor(
    readonly listenerId: ListenerId,
    readonly owner: string,
    readonly topic: string,
    readonly handlerName: string,
  ) {}

  get avgDurationMs(): number {
    return this.totalInvocations === 0 ? 0 : this.totalDurationMs / this.totalInvocations;
  }

  recordSuccess(durationMs: number): void {
    this.recordTiming(durationMs);
    this.successful += 1;
  }

  recordError(durationMs: number, message: string, errorType: string): void {
    this.recordTiming(durationMs);
    this.failed += 1;
    this.lastErrorMessage = message;
    this.lastErrorType = errorType;
  }

  recordDiFailure(durationMs: number, message: string, errorType: string): void {
    this.recordTiming(durationMs);
    this.diFailures += 1;
    this.lastErrorMessage = message;
    this.lastErrorType = errorType;
  }

  recordCancelled(durationMs: number): void {
    this.recordTiming(durationMs);
    this.cancelled += 1;
  }

  /** Route a tracked execution to the matching counter. */
  record(result: ExecutionResult): void {
    switch (result.status) {
      case "success":
        this.recordSuccess(result.durationMs);
        break;
      case "error":
        this.recordError(result.durationMs, result.errorMessage ?? "", result.errorType ?? "Error");
        break;
      case "di_failure":
        this.recordDiFailure(
          result.durationMs,
          result.errorMessage ?? "",
          result.errorType ?? "DependencyError",
        );
        break;
      case "cancelled":
        this.recordCancelled(result.durationMs);
        break;
    }
  }

  toJSON(): ListenerMetricsSnapshot {
    return {
      listenerId: this.listenerId,
      owner: this.owner,
      topic: this.topic,
      handlerName: this.handlerName,
      totalInvocations: this.totalInvocations,
      successful: this.successful,
      failed: this.failed,
      diFailures: this.diFailures,
      cancelled: this.cancelled,
      avgDurationMs: this.avgDurationMs,
      minDurationMs: this.minDurationMs,
      maxDurationMs: this.maxDurationMs,
      totalDurationMs: this.totalDurationMs,
      lastInvokedAt: this.lastInvokedAt,
      lastErrorMessage: this.lastErrorMessage,
      lastErrorType: this.lastErrorType,
    };
  }

  private recordTiming(durationMs: number): void {
    this.totalInvocations += 1;
    this.totalDurationMs += durationMs;
    this.lastInvokedAt = Date.now();

    if (this.totalInvocations === 1) {
      this.minDurationMs = durationMs;
      this.maxDurationMs = durationMs;
    } else {
      if (durationMs < this.minDurationMs) this.minDurationMs = durationMs;
      if (durationMs > this.maxDurationMs) this.maxDurationMs = durationMs;
    }
  }
}
