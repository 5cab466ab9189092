/**
 * Predicate combinators.
 *
 * A predicate is a pure boolean test over an event. Built-in predicates
 * are tree nodes (ValueIs, Not, AllOf, AnyOf, Guard) that remember their
 * shape so listener introspection can render them. Any plain
 * `(event) => boolean` function is also a valid predicate and is shown as
 * a Guard.
 *
 * Predicates are stateless and safe to share between listeners.
 */

import type { Logger } from "pino";
import type { Event, Extractor, Predicate } from "../types/index.js";
import { MISSING, isMissing } from "../types/index.js";
import { deepEqual, Glob, isCondition, Present } from "./conditions.js";
import type { Condition } from "./conditions.js";
import {
  extractorName,
  getAttrNew,
  getAttrOld,
  getAttrOldNew,
  getDomain,
  getEntityId,
  getService,
  getServiceDataKey,
  getStateValueNew,
  getStateValueOld,
  getStateValueOldNew,
} from "./accessors.js";
import type { OldNew } from "./accessors.js";
import { hasGlobChars } from "../utils/glob.js";

/** "Must be present, value ignored." */
export const ANY_VALUE: unique symbol = Symbol("hearth.any_value");

/**
 * What a ValueIs node compares against: a Condition, any `(value) => boolean`
 * matcher, ANY_VALUE, or a literal compared by deep equality.
 */
export type Matcher = Condition | ((value: unknown) => boolean);
export type ConditionLike = Matcher | typeof ANY_VALUE | string | number | boolean | null | object;

function isMatcher(cond: ConditionLike): cond is Matcher {
  return typeof cond === "function";
}

/** A predicate, or a (possibly nested) list of them meaning "all of". */
export type Where<E extends Event = Event> = Predicate<E> | readonly Where<E>[];

// ─── Tree nodes ────────────────────────────────────────────────

export type PredicateNode =
  | { kind: "value"; source: string; condition: string }
  | { kind: "changed"; source: string }
  | { kind: "not"; child: PredicateNode }
  | { kind: "all"; children: PredicateNode[] }
  | { kind: "any"; children: PredicateNode[] }
  | { kind: "guard"; name: string }
  | { kind: "named"; label: string; child: PredicateNode };

const NODE = Symbol("hearth.predicate_node");

interface TreePredicate<E extends Event> extends Predicate<E> {
  readonly [NODE]: PredicateNode;
}

function node<E extends Event>(shape: PredicateNode, fn: (event: E) => boolean): Predicate<E> {
  const pred: TreePredicate<E> = Object.assign((event: E) => fn(event), { [NODE]: shape });
  return pred;
}

export function nodeOf(pred: Predicate<never>): PredicateNode {
  if (NODE in pred) {
    const shape: unknown = pred[NODE];
    if (isNode(shape)) return shape;
  }
  return { kind: "guard", name: pred.name || "<anonymous>" };
}

function isNode(value: unknown): value is PredicateNode {
  return typeof value === "object" && value !== null && "kind" in value;
}

function describeCondition(cond: ConditionLike): string {
  if (cond === ANY_VALUE) return "ANY_VALUE";
  if (isCondition(cond)) return cond.description;
  if (isMatcher(cond)) return cond.name || "<matcher>";
  return typeof cond === "string" ? JSON.stringify(cond) : String(cond);
}

/** Evaluate a literal-or-matcher condition against an extracted value. */
export function compareValue(actual: unknown, cond: ConditionLike): boolean {
  if (cond === ANY_VALUE) return !isMissing(actual);
  if (isMatcher(cond)) return Boolean(cond(actual));
  return deepEqual(actual, cond);
}

// ─── Core combinators ──────────────────────────────────────────

export function ValueIs<E extends Event = Event>(
  source: Extractor<E>,
  cond: ConditionLike,
): Predicate<E> {
  return node<E>(
    { kind: "value", source: extractorName(source), condition: describeCondition(cond) },
    (event) => compareValue(source(event), cond),
  );
}

export function Not<E extends Event>(pred: Predicate<E>): Predicate<E> {
  return node<E>({ kind: "not", child: nodeOf(pred) }, (event) => !pred(event));
}

/** Logical AND, left to right, stops at the first false. */
export function AllOf<E extends Event>(...where: Where<E>[]): Predicate<E> {
  const preds = flatten(where);
  return node<E>({ kind: "all", children: preds.map(nodeOf) }, (event) => {
    for (const p of preds) {
      if (!p(event)) return false;
    }
    return true;
  });
}

/** Logical OR, left to right, stops at the first true. */
export function AnyOf<E extends Event>(...where: Where<E>[]): Predicate<E> {
  const preds = flatten(where);
  return node<E>({ kind: "any", children: preds.map(nodeOf) }, (event) => {
    for (const p of preds) {
      if (p(event)) return true;
    }
    return false;
  });
}

/** Adapt an arbitrary callable into a predicate node. */
export function Guard<E extends Event>(fn: (event: E) => unknown, name?: string): Predicate<E> {
  return node<E>({ kind: "guard", name: name ?? (fn.name || "<anonymous>") }, (event) =>
    Boolean(fn(event)),
  );
}

function labelled<E extends Event>(label: string, pred: Predicate<E>): Predicate<E> {
  return node<E>({ kind: "named", label, child: nodeOf(pred) }, pred);
}

export function flatten<E extends Event>(where: readonly Where<E>[]): Predicate<E>[] {
  const out: Predicate<E>[] = [];
  for (const w of where) {
    if (typeof w === "function") out.push(w);
    else out.push(...flatten(w));
  }
  return out;
}

/** A list becomes AllOf; a single predicate passes through; nothing stays nothing. */
export function normalizeWhere<E extends Event>(where: Where<E> | undefined): Predicate<E> | undefined {
  if (where === undefined) return undefined;
  if (typeof where === "function") return where;
  return AllOf<E>(...where);
}

// ─── Change detection ──────────────────────────────────────────

/** True when the (old, new) pair produced by `source` differs. */
export function DidChange<E extends Event = Event>(source: (event: E) => OldNew): Predicate<E> {
  return node<E>({ kind: "changed", source: source.name || "<extractor>" }, (event) => {
    const [oldValue, newValue] = source(event);
    return !deepEqual(oldValue, newValue);
  });
}

export const IsPresent = <E extends Event = Event>(source: Extractor<E>): Predicate<E> =>
  ValueIs(source, Present());

export const IsMissing = <E extends Event = Event>(source: Extractor<E>): Predicate<E> =>
  node<E>({ kind: "value", source: extractorName(source), condition: "Missing()" }, (event) =>
    isMissing(source(event)),
  );

// ─── State-change conveniences ─────────────────────────────────

export const From = (cond: ConditionLike): Predicate => ValueIs(getStateValueOld, cond);
export const To = (cond: ConditionLike): Predicate => ValueIs(getStateValueNew, cond);
export const AttrFrom = (name: string, cond: ConditionLike): Predicate =>
  ValueIs(getAttrOld(name), cond);
export const AttrTo = (name: string, cond: ConditionLike): Predicate =>
  ValueIs(getAttrNew(name), cond);

export const StateDidChange = (): Predicate => DidChange(getStateValueOldNew);
export const AttrDidChange = (name: string): Predicate => DidChange(getAttrOldNew(name));

// ─── Identity matchers (auto-glob) ─────────────────────────────

function globOrLiteral(value: string): ConditionLike {
  return hasGlobChars(value) ? Glob(value) : value;
}

export const DomainMatches = (domain: string): Predicate =>
  labelled(`DomainMatches(${JSON.stringify(domain)})`, ValueIs(getDomain, globOrLiteral(domain)));

export const EntityMatches = (entityId: string): Predicate =>
  labelled(
    `EntityMatches(${JSON.stringify(entityId)})`,
    ValueIs(getEntityId, globOrLiteral(entityId)),
  );

export const ServiceMatches = (service: string): Predicate =>
  labelled(
    `ServiceMatches(${JSON.stringify(service)})`,
    ValueIs(getService, globOrLiteral(service)),
  );

// ─── Service data ──────────────────────────────────────────────

export interface ServiceDataWhereOptions {
  /** Wrap string values containing glob characters in Glob. Default true. */
  autoGlob?: boolean;
}

/**
 * Match a call-service event's data against a spec of key → condition.
 *
 * The hub may deliver a field as a list even for a single target
 * (`entity_id: ["light.kitchen"]`), so a list-valued request field
 * matches when any element matches. ANY_VALUE only requires the key.
 */
export function ServiceDataWhere(
  spec: Record<string, ConditionLike>,
  opts: ServiceDataWhereOptions = {},
): Predicate {
  const autoGlob = opts.autoGlob ?? true;
  const preds = Object.entries(spec).map(([key, raw]) => {
    const cond: ConditionLike =
      raw === ANY_VALUE
        ? Present()
        : autoGlob && typeof raw === "string" && hasGlobChars(raw)
          ? Glob(raw)
          : raw;
    const source = getServiceDataKey(key);
    return node<Event>(
      { kind: "value", source: extractorName(source), condition: describeCondition(cond) },
      (event) => {
        const actual = source(event);
        if (actual === MISSING) return compareValue(actual, cond);
        if (compareValue(actual, cond)) return true;
        return Array.isArray(actual) && actual.some((el: unknown) => compareValue(el, cond));
      },
    );
  });
  return labelled("ServiceDataWhere", AllOf(...preds));
}

// ─── Evaluation & introspection ────────────────────────────────

/**
 * Evaluate a predicate against an event. A predicate that throws is a
 * non-match, logged at debug level only.
 */
export function evaluatePredicate<E extends Event>(
  pred: Predicate<E>,
  event: E,
  log?: Logger,
): boolean {
  try {
    return Boolean(pred(event));
  } catch (err) {
    log?.debug(
      { err, topic: event.topic, predicate: describePredicate(pred) },
      "Predicate raised; treating as no match",
    );
    return false;
  }
}

function render(shape: PredicateNode): string {
  switch (shape.kind) {
    case "value":
      return `ValueIs(${shape.source}, ${shape.condition})`;
    case "changed":
      return `DidChange(${shape.source})`;
    case "not":
      return `Not(${render(shape.child)})`;
    case "all":
      return `AllOf(${shape.children.map(render).join(", ")})`;
    case "any":
      return `AnyOf(${shape.children.map(render).join(", ")})`;
    case "guard":
      return `Guard(${shape.name})`;
    case "named":
      return shape.label;
  }
}

/** One-line rendering of a predicate tree, for listener introspection. */
export function describePredicate(pred: Predicate<never>): string {
  return render(nodeOf(pred));
}
