/**
 * Topic constants.
 *
 * Hub events are routed under `hub.event.<event_type>`, internal events
 * under `hearth.<event_type>`. State-change and service-call topics are
 * further expanded by the bus service with the entity id or the
 * `<domain>.<service>` pair so that segment globs can target them.
 */

export const HUB_EVENT_PREFIX = "hub.event";
export const INTERNAL_EVENT_PREFIX = "hearth";

export const EVENT_STATE_CHANGED = "state_changed";
export const EVENT_CALL_SERVICE = "call_service";
export const EVENT_SERVICE_REGISTERED = "service_registered";

export const TOPIC_STATE_CHANGED = `${HUB_EVENT_PREFIX}.${EVENT_STATE_CHANGED}`;
export const TOPIC_CALL_SERVICE = `${HUB_EVENT_PREFIX}.${EVENT_CALL_SERVICE}`;
export const TOPIC_SERVICE_REGISTERED = `${HUB_EVENT_PREFIX}.${EVENT_SERVICE_REGISTERED}`;

export const hubTopic = (eventType: string): string => `${HUB_EVENT_PREFIX}.${eventType}`;
export const internalTopic = (eventType: string): string =>
  `${INTERNAL_EVENT_PREFIX}.${eventType}`;

/** `light.kitchen` or `light.*` → the routing topic for its state changes. */
export const stateChangedTopic = (entityPattern: string): string =>
  `${TOPIC_STATE_CHANGED}.${entityPattern}`;

/** Routing topic for service calls; omitted parts match any segment. */
export const callServiceTopic = (domain?: string, service?: string): string => {
  if (!domain && !service) return TOPIC_CALL_SERVICE;
  return `${TOPIC_CALL_SERVICE}.${domain ?? "*"}.${service ?? "*"}`;
};

export function splitEntityId(entityId: string): { domain: string; objectId: string } {
  const dot = entityId.indexOf(".");
  if (dot < 0) return { domain: entityId, objectId: "" };
  return { domain: entityId.slice(0, dot), objectId: entityId.slice(dot + 1) };
}
