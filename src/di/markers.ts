/**
 * Dependency markers.
 *
 * A handler declares what it needs as a `params` record of
 * name → Dependency. `D.*` are the built-in dependencies; `Depends()`
 * builds a custom one from any extractor plus an optional converter or
 * target type. Each dependency knows how to pull its raw value from an
 * event and convert it, returning MISSING when the value is absent.
 */

import type {
  CallServiceEvent,
  Event,
  Extractor,
  HubContext,
  Missing,
  StateChangeEvent,
  StateRecord,
} from "../types/index.js";
import { MISSING } from "../types/index.js";
import { DependencyError, DependencyResolutionError, TypeConversionError } from "../errors.js";
import {
  getAttrNew,
  getAttrOld,
  getContext,
  getDomain,
  getEntityId,
  getService,
  getServiceData,
  getStateObjectNew,
  getStateObjectOld,
  getStateValueNew,
  getStateValueOld,
  isRecord,
  isStateRecord,
} from "../bus/accessors.js";
import { isTypeToken, kindOf, T } from "../conversion/type-tokens.js";
import type { TypeToken } from "../conversion/type-tokens.js";
import type { TypeRegistry } from "../conversion/type-registry.js";
import type { StateRegistry, StateTarget } from "../states/registry.js";
import { EVENT_CALL_SERVICE, EVENT_STATE_CHANGED } from "../events/topics.js";

/** Services and per-invocation state available while resolving. */
export interface ResolveContext {
  readonly signal: AbortSignal;
  readonly types: TypeRegistry;
  readonly states: StateRegistry;
}

export type DependencySource = "custom" | "builtin";

export const DEPENDENCY = Symbol("hearth.dependency");

export interface Dependency<T> {
  readonly [DEPENDENCY]: DependencySource;
  readonly label: string;
  /** MISSING resolves to `null` instead of failing. */
  readonly optional: boolean;
  resolve(event: Event, ctx: ResolveContext): T | Missing;
}

export function isDependency(value: unknown): value is Dependency<unknown> {
  return typeof value === "object" && value !== null && DEPENDENCY in value;
}

function dependency<T>(
  source: DependencySource,
  label: string,
  resolve: (event: Event, ctx: ResolveContext) => T | Missing,
  optional = false,
): Dependency<T> {
  return Object.freeze({ [DEPENDENCY]: source, label, optional, resolve });
}

const builtin = <T>(
  label: string,
  resolve: (event: Event, ctx: ResolveContext) => T | Missing,
  optional = false,
) => dependency<T>("builtin", label, resolve, optional);

// ─── Custom ────────────────────────────────────────────────────

/** Raw extractor output, no conversion. */
export function Depends<V>(extract: Extractor<Event, V>): Dependency<V>;
/** Extractor output passed through your own converter. */
export function Depends<V, R>(
  extract: Extractor<Event, V>,
  convert: (raw: V, ctx: ResolveContext) => R,
): Dependency<R>;
/** Extractor output converted to `target` by the type registry. */
export function Depends<R>(extract: Extractor<Event>, target: TypeToken<R>): Dependency<R>;
export function Depends<V, R>(
  extract: Extractor<Event, V>,
  how?: ((raw: V, ctx: ResolveContext) => R) | TypeToken<R>,
): Dependency<V | R> {
  const howName = how === undefined ? "" : `, ${how.name || "<converter>"}`;
  const label = `Depends(${extract.name || "<extractor>"}${howName})`;
  return dependency<V | R>("custom", label, (event, ctx) => {
    const raw = extract(event);
    if (raw === MISSING || how === undefined) return raw;
    if (isTypeToken(how)) return ctx.types.convert(raw, how);
    try {
      return how(raw, ctx);
    } catch (err) {
      if (err instanceof DependencyError) throw err;
      throw new TypeConversionError(kindOf(raw), label, raw, undefined, { cause: err });
    }
  });
}

// ─── Built-in helpers ──────────────────────────────────────────

function convertValue<V>(raw: unknown, token: TypeToken<V>, ctx: ResolveContext): V | Missing {
  return raw === MISSING ? MISSING : ctx.types.convert(raw, token);
}

function stateDependency(
  side: "new" | "old",
  optional: boolean,
  target?: StateTarget<unknown>,
): Dependency<unknown> {
  const extract = side === "new" ? getStateObjectNew : getStateObjectOld;
  const name = `${optional ? "Maybe" : ""}State${side === "new" ? "New" : "Old"}`;
  const label = target ? `${name}(${"name" in target ? target.name : "union"})` : name;
  return builtin<unknown>(
    label,
    (event, ctx) => {
      const record: StateRecord | Missing = extract(event);
      if (record === MISSING) return MISSING;
      return target ? ctx.states.convert(record, target) : ctx.states.convert(record);
    },
    optional,
  );
}

function valueDependency<V>(
  side: "new" | "old",
  optional: boolean,
  token: TypeToken<V>,
): Dependency<V> {
  const extract = side === "new" ? getStateValueNew : getStateValueOld;
  const name = `${optional ? "Maybe" : ""}StateValue${side === "new" ? "New" : "Old"}`;
  return builtin<V>(
    `${name}(${token.name})`,
    (event, ctx) => convertValue(extract(event), token, ctx),
    optional,
  );
}

function attrDependency<V>(
  side: "new" | "old",
  optional: boolean,
  attr: string,
  token: TypeToken<V>,
): Dependency<V> {
  const extract = side === "new" ? getAttrNew(attr) : getAttrOld(attr);
  const name = `${optional ? "Maybe" : ""}Attr${side === "new" ? "New" : "Old"}`;
  return builtin<V>(
    `${name}(${JSON.stringify(attr)}, ${token.name})`,
    (event, ctx) => convertValue(extract(event), token, ctx),
    optional,
  );
}

export function isStateChangeEvent(event: Event): event is StateChangeEvent {
  const data: unknown = event.payload.data;
  return (
    event.payload.source === "hub" &&
    event.payload.eventType === EVENT_STATE_CHANGED &&
    isRecord(data) &&
    typeof data.entityId === "string" &&
    (data.newState === null || isStateRecord(data.newState)) &&
    (data.oldState === null || isStateRecord(data.oldState))
  );
}

export function isCallServiceEvent(event: Event): event is CallServiceEvent {
  const data: unknown = event.payload.data;
  return (
    event.payload.source === "hub" &&
    event.payload.eventType === EVENT_CALL_SERVICE &&
    isRecord(data) &&
    typeof data.domain === "string" &&
    typeof data.service === "string" &&
    isRecord(data.serviceData)
  );
}

function narrowedEvent<E extends Event>(
  label: string,
  guard: (event: Event) => event is E,
): Dependency<E> {
  return builtin<E>(label, (event) => {
    if (guard(event)) return event;
    throw new DependencyResolutionError(`${label}: got a '${event.payload.eventType}' event`);
  });
}

// ─── Built-in markers ──────────────────────────────────────────

function StateNew(): Dependency<unknown>;
function StateNew<S>(target: StateTarget<S>): Dependency<S>;
function StateNew(target?: StateTarget<unknown>): Dependency<unknown> {
  return stateDependency("new", false, target);
}

function MaybeStateNew(): Dependency<unknown>;
function MaybeStateNew<S>(target: StateTarget<S>): Dependency<S | null>;
function MaybeStateNew(target?: StateTarget<unknown>): Dependency<unknown> {
  return stateDependency("new", true, target);
}

function StateOld(): Dependency<unknown>;
function StateOld<S>(target: StateTarget<S>): Dependency<S>;
function StateOld(target?: StateTarget<unknown>): Dependency<unknown> {
  return stateDependency("old", false, target);
}

function MaybeStateOld(): Dependency<unknown>;
function MaybeStateOld<S>(target: StateTarget<S>): Dependency<S | null>;
function MaybeStateOld(target?: StateTarget<unknown>): Dependency<unknown> {
  return stateDependency("old", true, target);
}

function StateValueNew(): Dependency<unknown>;
function StateValueNew<V>(token: TypeToken<V>): Dependency<V>;
function StateValueNew(token: TypeToken<unknown> = T.unknown): Dependency<unknown> {
  return valueDependency("new", false, token);
}

function MaybeStateValueNew(): Dependency<unknown>;
function MaybeStateValueNew<V>(token: TypeToken<V>): Dependency<V | null>;
function MaybeStateValueNew(token: TypeToken<unknown> = T.unknown): Dependency<unknown> {
  return valueDependency("new", true, token);
}

function StateValueOld(): Dependency<unknown>;
function StateValueOld<V>(token: TypeToken<V>): Dependency<V>;
function StateValueOld(token: TypeToken<unknown> = T.unknown): Dependency<unknown> {
  return valueDependency("old", false, token);
}

function MaybeStateValueOld(): Dependency<unknown>;
function MaybeStateValueOld<V>(token: TypeToken<V>): Dependency<V | null>;
function MaybeStateValueOld(token: TypeToken<unknown> = T.unknown): Dependency<unknown> {
  return valueDependency("old", true, token);
}

function AttrNew(name: string): Dependency<unknown>;
function AttrNew<V>(name: string, token: TypeToken<V>): Dependency<V>;
function AttrNew(name: string, token: TypeToken<unknown> = T.unknown): Dependency<unknown> {
  return attrDependency("new", false, name, token);
}

function MaybeAttrNew(name: string): Dependency<unknown>;
function MaybeAttrNew<V>(name: string, token: TypeToken<V>): Dependency<V | null>;
function MaybeAttrNew(name: string, token: TypeToken<unknown> = T.unknown): Dependency<unknown> {
  return attrDependency("new", true, name, token);
}

function AttrOld(name: string): Dependency<unknown>;
function AttrOld<V>(name: string, token: TypeToken<V>): Dependency<V>;
function AttrOld(name: string, token: TypeToken<unknown> = T.unknown): Dependency<unknown> {
  return attrDependency("old", false, name, token);
}

function MaybeAttrOld(name: string): Dependency<unknown>;
function MaybeAttrOld<V>(name: string, token: TypeToken<V>): Dependency<V | null>;
function MaybeAttrOld(name: string, token: TypeToken<unknown> = T.unknown): Dependency<unknown> {
  return attrDependency("old", true, name, token);
}

export const D = {
  Event: builtin<Event>("Event", (event) => event),
  StateChangeEvent: narrowedEvent("StateChangeEvent", isStateChangeEvent),
  CallServiceEvent: narrowedEvent("CallServiceEvent", isCallServiceEvent),

  StateNew,
  MaybeStateNew,
  StateOld,
  MaybeStateOld,

  StateValueNew,
  MaybeStateValueNew,
  StateValueOld,
  MaybeStateValueOld,

  EntityId: builtin<string>("EntityId", getEntityId),
  MaybeEntityId: builtin<string | null>("MaybeEntityId", getEntityId, true),
  Domain: builtin<string>("Domain", getDomain),
  Service: builtin<string>("Service", getService),
  ServiceData: builtin<Record<string, unknown>>("ServiceData", getServiceData),
  EventContext: builtin<HubContext>("EventContext", getContext),

  AttrNew,
  MaybeAttrNew,
  AttrOld,
  MaybeAttrOld,

  /** The invocation's AbortSignal; aborted when the invocation is cancelled. */
  Signal: builtin<AbortSignal>("Signal", (_event, ctx) => ctx.signal),
} as const;
