/**
 * Accessors (extractors).
 *
 * Pure functions that pull a raw value out of an event. They never throw
 * on absent or oddly-shaped data: anything that is not there comes back
 * as MISSING. Predicates and the DI resolver both build on these.
 */

import type { Event, Extractor, HubContext, StateRecord } from "../types/index.js";
import { MISSING } from "../types/index.js";
import type { Missing } from "../types/index.js";
import { splitEntityId } from "../events/topics.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isStateRecord(value: unknown): value is StateRecord {
  return (
    isRecord(value) &&
    typeof value.entityId === "string" &&
    typeof value.domain === "string" &&
    isRecord(value.attributes)
  );
}

/** Give an extractor a readable name for introspection. */
export function named<F extends (...args: never[]) => unknown>(name: string, fn: F): F {
  Object.defineProperty(fn, "name", { value: name });
  return fn;
}

export function extractorName(fn: (...args: never[]) => unknown): string {
  return fn.name || "<extractor>";
}

function dataOf(event: Event): Record<string, unknown> | undefined {
  const data: unknown = event.payload.data;
  return isRecord(data) ? data : undefined;
}

function stringField(event: Event, key: string): string | Missing {
  const value = dataOf(event)?.[key];
  return typeof value === "string" ? value : MISSING;
}

// ─── Identity ──────────────────────────────────────────────────

export const getEntityId: Extractor<Event, string> = named("entity_id", (event) =>
  stringField(event, "entityId"),
);

/** `data.domain` for service events, the entity's domain for state changes. */
export const getDomain: Extractor<Event, string> = named("domain", (event) => {
  const domain = stringField(event, "domain");
  if (domain !== MISSING) return domain;
  const entityId = stringField(event, "entityId");
  return entityId === MISSING ? MISSING : splitEntityId(entityId).domain;
});

export const getService: Extractor<Event, string> = named("service", (event) =>
  stringField(event, "service"),
);

export const getServiceData: Extractor<Event, Record<string, unknown>> = named(
  "service_data",
  (event) => {
    const serviceData = dataOf(event)?.serviceData;
    return isRecord(serviceData) ? serviceData : MISSING;
  },
);

export function getServiceDataKey(key: string): Extractor<Event> {
  return named(`service_data.${key}`, (event) => {
    const serviceData = getServiceData(event);
    if (serviceData === MISSING || !Object.hasOwn(serviceData, key)) return MISSING;
    return serviceData[key];
  });
}

export const getContext: Extractor<Event, HubContext> = named("context", (event) =>
  event.payload.source === "hub" ? event.payload.context : MISSING,
);

// ─── State objects ─────────────────────────────────────────────

function stateSide(event: Event, side: "oldState" | "newState"): StateRecord | Missing {
  const state = dataOf(event)?.[side];
  return isStateRecord(state) ? state : MISSING;
}

export const getStateObjectNew: Extractor<Event, StateRecord> = named("new_state", (event) =>
  stateSide(event, "newState"),
);

export const getStateObjectOld: Extractor<Event, StateRecord> = named("old_state", (event) =>
  stateSide(event, "oldState"),
);

export const getStateValueNew: Extractor<Event> = named("new_state.value", (event) => {
  const state = stateSide(event, "newState");
  return state === MISSING ? MISSING : state.value;
});

export const getStateValueOld: Extractor<Event> = named("old_state.value", (event) => {
  const state = stateSide(event, "oldState");
  return state === MISSING ? MISSING : state.value;
});

export type OldNew = readonly [unknown, unknown];

export const getStateValueOldNew = named(
  "state.value(old, new)",
  (event: Event): OldNew => [getStateValueOld(event), getStateValueNew(event)],
);

// ─── Attributes ────────────────────────────────────────────────

function attribute(event: Event, side: "oldState" | "newState", name: string): unknown {
  const state = stateSide(event, side);
  if (state === MISSING || !Object.hasOwn(state.attributes, name)) return MISSING;
  return state.attributes[name];
}

export function getAttrNew(name: string): Extractor<Event> {
  return named(`new_state.attributes.${name}`, (event) => attribute(event, "newState", name));
}

export function getAttrOld(name: string): Extractor<Event> {
  return named(`old_state.attributes.${name}`, (event) => attribute(event, "oldState", name));
}

export function getAttrOldNew(name: string): (event: Event) => OldNew {
  return named(`attributes.${name}(old, new)`, (event: Event): OldNew => [
    attribute(event, "oldState", name),
    attribute(event, "newState", name),
  ]);
}

// ─── Paths ─────────────────────────────────────────────────────

/** Split "a.b[0].c" into ["a", "b", 0, "c"]. */
export function parsePath(path: string): Array<string | number> {
  const parts: Array<string | number> = [];
  for (const segment of path.split(".")) {
    const re = /([^[\]]+)|\[(\d+)\]/g;
    let m: RegExpExecArray | null;
    while ((m = re.exec(segment)) !== null) {
      if (m[1] !== undefined) parts.push(m[1]);
      else if (m[2] !== undefined) parts.push(Number(m[2]));
    }
  }
  return parts;
}

/** Walk a dotted path from the event root, e.g. `payload.data.serviceData.entity_id`. */
export function getPath(path: string): Extractor<Event> {
  const parts = parsePath(path);
  return named(path, (event) => {
    let current: unknown = event;
    for (const part of parts) {
      if (typeof part === "number") {
        if (!Array.isArray(current) || part >= current.length) return MISSING;
        current = current[part];
      } else {
        if (!isRecord(current) || !Object.hasOwn(current, part)) return MISSING;
        current = current[part];
      }
    }
    return current;
  });
}
