/**
 * Hearth Errors
 *
 * Two families matter at runtime:
 *   - ConfigurationError: raised synchronously by registration APIs.
 *     Registration is atomic, nothing is added when one is thrown.
 *   - DependencyError: raised while binding handler arguments at
 *     invocation time. Counted as a DI failure, never as a handler error.
 *
 * CancelledError is the cooperative-cancellation signal and must always
 * propagate out of tracking wrappers.
 */

export class HearthError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ─── Registration-time ─────────────────────────────────────────

export class ConfigurationError extends HearthError {}

export class InvalidTopicPatternError extends ConfigurationError {
  constructor(
    readonly pattern: string,
    reason: string,
  ) {
    super(`Invalid topic pattern "${pattern}": ${reason}`);
  }
}

export class InvalidCronExpressionError extends ConfigurationError {
  constructor(
    readonly field: string,
    readonly value: string,
    reason?: string,
  ) {
    super(`Invalid cron ${field} field "${value}"${reason ? `: ${reason}` : ""}`);
  }
}

export class InvalidIntervalError extends ConfigurationError {}

export class DependencyInjectionError extends ConfigurationError {
  constructor(
    readonly handlerName: string,
    readonly parameter: string,
    reason: string,
  ) {
    super(`Handler '${handlerName}' - cannot inject parameter '${parameter}': ${reason}`);
  }
}

export class ConfigValidationError extends ConfigurationError {
  constructor(readonly issues: string[]) {
    super(`Config validation failed:\n${issues.join("\n")}`);
  }
}

// ─── Ingest ────────────────────────────────────────────────────

export class InvalidEventError extends HearthError {
  constructor(readonly issues: string[]) {
    super(`Malformed hub event:\n${issues.join("\n")}`);
  }
}

// ─── Invocation-time DI ────────────────────────────────────────

export class DependencyError extends HearthError {}

export class DependencyResolutionError extends DependencyError {}

export class TypeConversionError extends DependencyError {
  constructor(
    readonly sourceType: string,
    readonly targetType: string,
    readonly value: unknown,
    reason?: string,
    options?: { cause?: unknown },
  ) {
    super(
      `Cannot convert ${formatValue(value)} (${sourceType}) to ${targetType}${reason ? `: ${reason}` : ""}`,
      options,
    );
  }
}

export class UnionResolutionError extends DependencyError {
  constructor(
    readonly domain: string,
    readonly members: string[],
  ) {
    super(`No member of union [${members.join(", ")}] accepts domain '${domain}'`);
  }
}

// ─── Cancellation ──────────────────────────────────────────────

export class CancelledError extends HearthError {
  constructor(message = "Task was cancelled") {
    super(message);
  }
}

export class WaitTimeoutError extends HearthError {
  constructor(
    readonly topic: string,
    readonly timeoutMs: number,
  ) {
    super(`No event on "${topic}" within ${timeoutMs}ms`);
  }
}

/** A job ran past its `timeoutSeconds`. Counted as a job error. */
export class JobTimeoutError extends HearthError {
  constructor(
    readonly jobName: string,
    readonly timeoutSeconds: number,
  ) {
    super(`Job ${jobName} timed out after ${timeoutSeconds}s`);
  }
}

/**
 * True for our own CancelledError and for the AbortError that
 * AbortSignal-aware APIs (timers/promises, fetch) reject with.
 */
export function isCancellation(err: unknown): boolean {
  if (err instanceof CancelledError) return true;
  return err instanceof Error && err.name === "AbortError";
}

export function describeError(err: unknown): { message: string; type: string } {
  if (err instanceof Error) {
    return { message: err.message, type: err.name || err.constructor.name };
  }
  return { message: String(err), type: typeof err };
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (value instanceof Date) return value.toISOString();
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
