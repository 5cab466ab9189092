/**
 * Event factories.
 *
 * Build frozen, fully-typed events without a hub connection. Used by the
 * runtime for internal events and by tests to synthesise hub traffic.
 */

import type {
  CallServiceEvent,
  EventOrigin,
  HubContext,
  HubEvent,
  HubPayload,
  InternalEvent,
  ServiceRegisteredEvent,
  StateChangeEvent,
  StateRecord,
  StateValue,
} from "../types/index.js";
import { genContextId, nextInternalEventId } from "../utils/ids.js";
import {
  EVENT_CALL_SERVICE,
  EVENT_SERVICE_REGISTERED,
  EVENT_STATE_CHANGED,
  TOPIC_CALL_SERVICE,
  TOPIC_SERVICE_REGISTERED,
  TOPIC_STATE_CHANGED,
  hubTopic,
  internalTopic,
  splitEntityId,
} from "./topics.js";

export interface StateInput {
  value: StateValue;
  attributes?: Record<string, unknown>;
  lastChanged?: Date | null;
  lastUpdated?: Date | null;
}

export interface HubEventOptions {
  origin?: EventOrigin;
  timeFired?: Date;
  context?: Partial<HubContext>;
}

/** Freezes `value` in place. Event factories freeze a structured clone so callers keep their objects. */
export function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !(value instanceof Date) && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export function createStateRecord(entityId: string, input: StateInput): StateRecord {
  const now = new Date();
  return {
    entityId,
    domain: splitEntityId(entityId).domain,
    value: input.value,
    attributes: { ...(input.attributes ?? {}) },
    lastChanged: input.lastChanged === undefined ? now : input.lastChanged,
    lastUpdated: input.lastUpdated === undefined ? now : input.lastUpdated,
  };
}

export function createHubEvent<D>(
  eventType: string,
  data: D,
  opts: HubEventOptions = {},
  topic: string = hubTopic(eventType),
): HubEvent<D> {
  const payload: HubPayload<D> = {
    source: "hub",
    eventType,
    data: structuredClone(data),
    origin: opts.origin ?? "LOCAL",
    timeFired: opts.timeFired ?? new Date(),
    context: {
      id: opts.context?.id ?? genContextId(),
      parentId: opts.context?.parentId ?? null,
      userId: opts.context?.userId ?? null,
    },
  };
  return deepFreeze({ topic, payload });
}

/** `oldState`/`newState` of `null` means the entity did not exist on that side. */
export function createStateChangeEvent(
  entityId: string,
  oldState: StateInput | null,
  newState: StateInput | null,
  opts?: HubEventOptions,
): StateChangeEvent {
  return createHubEvent(
    EVENT_STATE_CHANGED,
    {
      entityId,
      oldState: oldState ? createStateRecord(entityId, oldState) : null,
      newState: newState ? createStateRecord(entityId, newState) : null,
    },
    opts,
    TOPIC_STATE_CHANGED,
  );
}

export function createCallServiceEvent(
  domain: string,
  service: string,
  serviceData: Record<string, unknown> = {},
  opts?: HubEventOptions,
): CallServiceEvent {
  return createHubEvent(
    EVENT_CALL_SERVICE,
    { domain, service, serviceData: { ...serviceData } },
    opts,
    TOPIC_CALL_SERVICE,
  );
}

export function createServiceRegisteredEvent(
  domain: string,
  service: string,
  opts?: HubEventOptions,
): ServiceRegisteredEvent {
  return createHubEvent(EVENT_SERVICE_REGISTERED, { domain, service }, opts, TOPIC_SERVICE_REGISTERED);
}

export function createInternalEvent<D>(eventType: string, data: D): InternalEvent<D> {
  return deepFreeze({
    topic: internalTopic(eventType),
    payload: {
      source: "internal" as const,
      eventType,
      data: structuredClone(data),
      eventId: nextInternalEventId(),
    },
  });
}
