/**
 * Type Registry
 *
 * The value-conversion service the DI resolver consumes:
 * "given a raw value and a target type, convert or fail".
 *
 * Conversions are keyed by (source kind, target token name). A value that
 * already satisfies the target is returned as-is, so converting twice is
 * the same as converting once.
 */

import type { Logger } from "pino";
import { ConfigurationError, TypeConversionError } from "../errors.js";
import { getLogger } from "../utils/logger.js";
import { kindOf, T } from "./type-tokens.js";
import type { SourceKind, TypeToken } from "./type-tokens.js";

export type Converter<R> = (value: unknown) => R;

export interface ConversionEntry {
  source: SourceKind;
  target: string;
  description: string;
}

interface Registration {
  entry: ConversionEntry;
  fn: Converter<unknown>;
}

const keyOf = (source: SourceKind, target: string): string => `${source}->${target}`;

const TRUE_STRINGS = new Set(["on", "true", "yes", "1", "home", "open"]);
const FALSE_STRINGS = new Set(["off", "false", "no", "0", "not_home", "closed"]);

export class TypeRegistry {
  private table = new Map<string, Registration>();
  private log: Logger;

  constructor(opts: { logger?: Logger; builtins?: boolean } = {}) {
    this.log = opts.logger ?? getLogger("type-registry");
    if (opts.builtins ?? true) registerBuiltins(this);
  }

  /**
   * Register a converter. Re-registering the same key throws unless
   * `replace` is set.
   */
  register<R>(
    source: SourceKind,
    target: TypeToken<R>,
    fn: Converter<R>,
    opts: { description?: string; replace?: boolean } = {},
  ): void {
    const key = keyOf(source, target.name);
    if (this.table.has(key) && !opts.replace) {
      throw new ConfigurationError(`Conversion ${source} -> ${target.name} is already registered`);
    }
    this.table.set(key, {
      entry: { source, target: target.name, description: opts.description ?? "" },
      fn,
    });
    this.log.debug({ source, target: target.name }, "Registered conversion");
  }

  lookup(source: SourceKind, target: TypeToken<unknown> | string): Converter<unknown> | undefined {
    const name = typeof target === "string" ? target : target.name;
    return this.table.get(keyOf(source, name))?.fn;
  }

  list(): ConversionEntry[] {
    return [...this.table.values()]
      .map((r) => ({ ...r.entry }))
      .sort((a, b) => a.source.localeCompare(b.source) || a.target.localeCompare(b.target));
  }

  convert<R>(value: unknown, target: TypeToken<R>): R {
    if (target.is(value)) return value;

    const source = kindOf(value);
    const fn = this.lookup(source, target);
    if (!fn) {
      throw new TypeConversionError(source, target.name, value, "no conversion registered");
    }

    let result: unknown;
    try {
      result = fn(value);
    } catch (err) {
      if (err instanceof TypeConversionError) throw err;
      throw new TypeConversionError(source, target.name, value, undefined, { cause: err });
    }
    if (!target.is(result)) {
      throw new TypeConversionError(source, target.name, value, "converter produced the wrong type");
    }
    return result;
  }
}

// ─── Built-in conversions ──────────────────────────────────────

function fail(source: SourceKind, target: string, value: unknown): never {
  throw new TypeConversionError(source, target, value);
}

function registerBuiltins(registry: TypeRegistry): void {
  registry.register(
    "string",
    T.number,
    (v) => {
      const s = String(v).trim();
      const n = s === "" ? Number.NaN : Number(s);
      return Number.isNaN(n) ? fail("string", "number", v) : n;
    },
    { description: "parse numeric string" },
  );

  registry.register(
    "string",
    T.boolean,
    (v) => {
      const s = String(v).trim().toLowerCase();
      if (TRUE_STRINGS.has(s)) return true;
      if (FALSE_STRINGS.has(s)) return false;
      return fail("string", "boolean", v);
    },
    { description: "on/off, true/false, yes/no, 1/0" },
  );

  registry.register(
    "string",
    T.date,
    (v) => {
      const d = new Date(String(v));
      return Number.isNaN(d.getTime()) ? fail("string", "Date", v) : d;
    },
    { description: "parse ISO-8601 timestamp" },
  );

  registry.register("number", T.string, (v) => String(v), { description: "decimal string" });
  registry.register("number", T.boolean, (v) => v !== 0, { description: "non-zero is true" });
  registry.register("number", T.date, (v) => new Date(Number(v) * 1000), {
    description: "epoch seconds",
  });

  registry.register("boolean", T.string, (v) => (v === true ? "on" : "off"), {
    description: "on/off",
  });
  registry.register("boolean", T.number, (v) => (v === true ? 1 : 0), { description: "1/0" });

  registry.register(
    "Date",
    T.string,
    (v) => (v instanceof Date ? v.toISOString() : fail("Date", "string", v)),
    { description: "ISO-8601" },
  );
}
