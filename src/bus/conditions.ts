/**
 * Condition primitives.
 *
 * A condition is a callable value matcher. It receives whatever an
 * extractor pulled from the event (possibly MISSING) and answers yes/no.
 * Conditions never throw on type-mismatched input: string matchers say
 * no to non-strings, numeric comparisons say no to non-numbers.
 *
 * Each condition carries a readable description, used in listener
 * introspection and debug logs.
 */

import { isMissing } from "../types/index.js";
import { globMatch } from "../utils/glob.js";

export const CONDITION = Symbol("hearth.condition");

export interface Condition {
  (value: unknown): boolean;
  readonly [CONDITION]: true;
  readonly description: string;
}

export function condition(description: string, test: (value: unknown) => boolean): Condition {
  const fn = (value: unknown): boolean => test(value);
  return Object.assign(fn, {
    [CONDITION]: true as const,
    description,
    toString: () => description,
  });
}

export function isCondition(value: unknown): value is Condition {
  return typeof value === "function" && CONDITION in value;
}

// ─── Equality & membership ─────────────────────────────────────

/** Structural equality for plain data (primitives, arrays, records, dates). */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((v, i) => deepEqual(v, b[i]));
  }
  if (isPlainObject(a) && isPlainObject(b)) {
    const ka = Object.keys(a);
    const kb = Object.keys(b);
    return ka.length === kb.length && ka.every((k) => k in b && deepEqual(a[k], b[k]));
  }
  return false;
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v) && !(v instanceof Date);
}

const show = (v: unknown): string => (typeof v === "string" ? JSON.stringify(v) : String(v));

export const Equals = (expected: unknown): Condition =>
  condition(`Equals(${show(expected)})`, (v) => deepEqual(v, expected));

export const NotEquals = (expected: unknown): Condition =>
  condition(`NotEquals(${show(expected)})`, (v) => !deepEqual(v, expected));

export const IsIn = (collection: Iterable<unknown>): Condition => {
  const items = [...collection];
  return condition(`IsIn([${items.map(show).join(", ")}])`, (v) =>
    items.some((item) => deepEqual(item, v)),
  );
};

export const NotIn = (collection: Iterable<unknown>): Condition => {
  const items = [...collection];
  return condition(
    `NotIn([${items.map(show).join(", ")}])`,
    (v) => !items.some((item) => deepEqual(item, v)),
  );
};

/** The value is a collection sharing at least one element with `collection`. */
export const Intersects = (collection: Iterable<unknown>): Condition => {
  const items = [...collection];
  return condition(`Intersects([${items.map(show).join(", ")}])`, (v) => {
    if (!Array.isArray(v) && !(v instanceof Set)) return false;
    for (const el of v) {
      if (items.some((item) => deepEqual(item, el))) return true;
    }
    return false;
  });
};

// ─── Strings ───────────────────────────────────────────────────

export const StartsWith = (prefix: string): Condition =>
  condition(`StartsWith(${show(prefix)})`, (v) => typeof v === "string" && v.startsWith(prefix));

export const EndsWith = (suffix: string): Condition =>
  condition(`EndsWith(${show(suffix)})`, (v) => typeof v === "string" && v.endsWith(suffix));

export const Contains = (substring: string): Condition =>
  condition(`Contains(${show(substring)})`, (v) => typeof v === "string" && v.includes(substring));

/** Anchored at the start of the value, not at the end. */
export const Regex = (pattern: string | RegExp): Condition => {
  const source = typeof pattern === "string" ? pattern : pattern.source;
  const flags = typeof pattern === "string" ? "" : pattern.flags.replace(/[gy]/g, "");
  const re = new RegExp(`^(?:${source})`, flags);
  return condition(`Regex(${show(source)})`, (v) => typeof v === "string" && re.test(v));
};

export const Glob = (pattern: string): Condition =>
  condition(`Glob(${show(pattern)})`, (v) => typeof v === "string" && globMatch(v, pattern));

// ─── Numbers ───────────────────────────────────────────────────

/** Numbers and numeric strings compare; everything else is no match. */
export function toComparable(v: unknown): number | undefined {
  if (typeof v === "number") return Number.isNaN(v) ? undefined : v;
  if (typeof v === "string" && v.trim() !== "") {
    const n = Number(v);
    return Number.isNaN(n) ? undefined : n;
  }
  return undefined;
}

function numeric(name: string, bound: number, cmp: (n: number) => boolean): Condition {
  return condition(`${name}(${bound})`, (v) => {
    const n = toComparable(v);
    return n !== undefined && cmp(n);
  });
}

export const GreaterThan = (bound: number) => numeric("GreaterThan", bound, (n) => n > bound);
export const GreaterThanOrEqual = (bound: number) =>
  numeric("GreaterThanOrEqual", bound, (n) => n >= bound);
export const LessThan = (bound: number) => numeric("LessThan", bound, (n) => n < bound);
export const LessThanOrEqual = (bound: number) =>
  numeric("LessThanOrEqual", bound, (n) => n <= bound);

/** Inclusive on both ends. */
export const Between = (low: number, high: number): Condition =>
  condition(`Between(${low}, ${high})`, (v) => {
    const n = toComparable(v);
    return n !== undefined && n >= low && n <= high;
  });

// ─── Presence ──────────────────────────────────────────────────

/** True for any extracted value, `null` included. False only for MISSING. */
export const Present = (): Condition => condition("Present()", (v) => !isMissing(v));

export const Missing = (): Condition => condition("Missing()", (v) => isMissing(v));

export const IsNull = (): Condition => condition("IsNull()", (v) => v === null);

export const IsTruthy = (): Condition =>
  condition("IsTruthy()", (v) => !isMissing(v) && Boolean(v));
