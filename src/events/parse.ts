/**
 * Hub event parsing.
 *
 * The transport hands over raw snake_case dictionaries exactly as the hub
 * sent them. These schemas validate and reshape them into typed events.
 */

import { z } from "zod";
import { InvalidEventError } from "../errors.js";
import type { HubEvent, StateRecord } from "../types/index.js";
import { createHubEvent } from "./factories.js";
import {
  EVENT_CALL_SERVICE,
  EVENT_SERVICE_REGISTERED,
  EVENT_STATE_CHANGED,
  TOPIC_CALL_SERVICE,
  TOPIC_SERVICE_REGISTERED,
  TOPIC_STATE_CHANGED,
  hubTopic,
  splitEntityId,
} from "./topics.js";

const Timestamp = z
  .string()
  .datetime({ offset: true })
  .transform((s) => new Date(s));

const RawStateSchema = z
  .object({
    entity_id: z.string().min(1),
    state: z.union([z.string(), z.number(), z.boolean(), z.null()]),
    attributes: z.record(z.unknown()).default({}),
    last_changed: Timestamp.nullable().optional(),
    last_updated: Timestamp.nullable().optional(),
  })
  .transform(
    (raw): StateRecord => ({
      entityId: raw.entity_id,
      domain: splitEntityId(raw.entity_id).domain,
      value: raw.state,
      attributes: raw.attributes,
      lastChanged: raw.last_changed ?? null,
      lastUpdated: raw.last_updated ?? null,
    }),
  );

const StateChangedDataSchema = z
  .object({
    entity_id: z.string().min(1),
    old_state: RawStateSchema.nullable().default(null),
    new_state: RawStateSchema.nullable().default(null),
  })
  .transform((d) => ({ entityId: d.entity_id, oldState: d.old_state, newState: d.new_state }));

const CallServiceDataSchema = z
  .object({
    domain: z.string().min(1),
    service: z.string().min(1),
    service_data: z.record(z.unknown()).default({}),
  })
  .transform((d) => ({ domain: d.domain, service: d.service, serviceData: d.service_data }));

const ServiceRegisteredDataSchema = z.object({
  domain: z.string().min(1),
  service: z.string().min(1),
});

const RawHubEventSchema = z.object({
  event_type: z.string().min(1),
  data: z.record(z.unknown()).default({}),
  origin: z.enum(["LOCAL", "REMOTE"]).default("LOCAL"),
  time_fired: Timestamp.optional(),
  context: z
    .object({
      id: z.string(),
      parent_id: z.string().nullable().default(null),
      user_id: z.string().nullable().default(null),
    })
    .optional(),
});

export type RawHubEvent = z.input<typeof RawHubEventSchema>;

function unwrap<I, T>(result: z.SafeParseReturnType<I, T>, prefix = ""): T {
  if (result.success) return result.data;
  throw new InvalidEventError(
    result.error.issues.map((i) => `  ${prefix}${i.path.join(".")}: ${i.message}`),
  );
}

/** Validate a raw hub event and turn it into a frozen, typed event. */
export function parseHubEvent(raw: unknown): HubEvent {
  const env = unwrap(RawHubEventSchema.safeParse(raw));
  const opts = {
    origin: env.origin,
    timeFired: env.time_fired,
    context: env.context
      ? { id: env.context.id, parentId: env.context.parent_id, userId: env.context.user_id }
      : undefined,
  };

  switch (env.event_type) {
    case EVENT_STATE_CHANGED:
      return createHubEvent(
        env.event_type,
        unwrap(StateChangedDataSchema.safeParse(env.data), "data."),
        opts,
        TOPIC_STATE_CHANGED,
      );
    case EVENT_CALL_SERVICE:
      return createHubEvent(
        env.event_type,
        unwrap(CallServiceDataSchema.safeParse(env.data), "data."),
        opts,
        TOPIC_CALL_SERVICE,
      );
    case EVENT_SERVICE_REGISTERED:
      return createHubEvent(
        env.event_type,
        unwrap(ServiceRegisteredDataSchema.safeParse(env.data), "data."),
        opts,
        TOPIC_SERVICE_REGISTERED,
      );
    default:
      return createHubEvent(env.event_type, env.data, opts, hubTopic(env.event_type));
  }
}
