/**
 * Type tokens.
 *
 * Runtime stand-ins for the types a handler parameter can ask for. A token
 * names the type (the conversion table is keyed by that name) and knows
 * how to recognise a value that already has it.
 */

export interface TypeToken<T> {
  readonly name: string;
  is(value: unknown): value is T;
  /** Values are passed through untouched, no conversion attempted. */
  readonly bypass?: boolean;
}

const TOKEN = Symbol("hearth.type_token");

interface BrandedToken<T> extends TypeToken<T> {
  readonly [TOKEN]: true;
}

function token<T>(name: string, is: (value: unknown) => value is T, bypass = false): TypeToken<T> {
  const t: BrandedToken<T> = { [TOKEN]: true, name, is, bypass };
  return Object.freeze(t);
}

export function isTypeToken(value: unknown): value is TypeToken<unknown> {
  return typeof value === "object" && value !== null && TOKEN in value;
}

const isString = (v: unknown): v is string => typeof v === "string";
const isNumber = (v: unknown): v is number => typeof v === "number" && !Number.isNaN(v);
const isBoolean = (v: unknown): v is boolean => typeof v === "boolean";
const isDate = (v: unknown): v is Date => v instanceof Date && !Number.isNaN(v.getTime());
const isUnknown = (_v: unknown): _v is unknown => true;
const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null && !Array.isArray(v) && !(v instanceof Date);
const isArray = (v: unknown): v is unknown[] => Array.isArray(v);

export const T = {
  string: token("string", isString),
  number: token("number", isNumber),
  boolean: token("boolean", isBoolean),
  date: token("Date", isDate),
  record: token("record", isRecord),
  array: token("array", isArray),
  /** Skip conversion entirely. */
  unknown: token("unknown", isUnknown, true),
  /** A user-defined type, recognised by `guard`. Register converters against its name. */
  custom<C>(name: string, guard: (value: unknown) => value is C): TypeToken<C> {
    return token(name, guard);
  },
} as const;

/** Coarse runtime kind of a value; the source side of a conversion key. */
export type SourceKind =
  | "string"
  | "number"
  | "boolean"
  | "null"
  | "undefined"
  | "Date"
  | "array"
  | "record"
  | "other";

export function kindOf(value: unknown): SourceKind {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") return "string";
  if (typeof value === "number") return "number";
  if (typeof value === "boolean") return "boolean";
  if (value instanceof Date) return "Date";
  if (Array.isArray(value)) return "array";
  if (typeof value === "object") return "record";
  return "other";
}
