/**
 * Hearth Core Types
 *
 * Single source of truth for all shared types across the system.
 * Every module imports from here -- no circular deps, no type drift.
 */

// ─── Identifiers ───────────────────────────────────────────────
export type ListenerId = number & { readonly __brand: "ListenerId" };
export type JobId = number & { readonly __brand: "JobId" };
export type TaskId = string & { readonly __brand: "TaskId" };

// Type-safe id constructors
export const ListenerId = (v: number) => v as ListenerId;
export const JobId = (v: number) => v as JobId;
export const TaskId = (v: string) => v as TaskId;

// ─── Sentinels ─────────────────────────────────────────────────

/**
 * Marks a value that does not exist in an event (an attribute the entity
 * never had, an absent old state). Distinct from `null`, which is a
 * present value.
 */
export const MISSING: unique symbol = Symbol("hearth.missing");
export type Missing = typeof MISSING;

export function isMissing(value: unknown): value is Missing {
  return value === MISSING;
}

// ─── Entity State ──────────────────────────────────────────────
export type StateValue = string | number | boolean | null;

export interface StateRecord {
  entityId: string;
  domain: string;
  value: StateValue;
  attributes: Record<string, unknown>;
  lastChanged: Date | null;
  lastUpdated: Date | null;
}

// ─── Events ────────────────────────────────────────────────────
export type EventOrigin = "LOCAL" | "REMOTE";

export interface HubContext {
  id: string;
  parentId: string | null;
  userId: string | null;
}

/** Payload of an event that originated on the automation hub. */
export interface HubPayload<D = unknown> {
  source: "hub";
  eventType: string;
  data: D;
  origin: EventOrigin;
  timeFired: Date;
  context: HubContext;
}

/** Payload of an event raised inside the runtime itself. */
export interface InternalPayload<D = unknown> {
  source: "internal";
  eventType: string;
  data: D;
  eventId: number;
}

export type EventPayload<D = unknown> = HubPayload<D> | InternalPayload<D>;

export interface Event<P extends EventPayload = EventPayload> {
  readonly topic: string;
  readonly payload: P;
}

export interface StateChangeData {
  entityId: string;
  oldState: StateRecord | null;
  newState: StateRecord | null;
}

export interface CallServiceData {
  domain: string;
  service: string;
  serviceData: Record<string, unknown>;
}

export interface ServiceRegisteredData {
  domain: string;
  service: string;
}

export type HubEvent<D = unknown> = Event<HubPayload<D>>;
export type InternalEvent<D = unknown> = Event<InternalPayload<D>>;
export type StateChangeEvent = HubEvent<StateChangeData>;
export type CallServiceEvent = HubEvent<CallServiceData>;
export type ServiceRegisteredEvent = HubEvent<ServiceRegisteredData>;

// ─── Predicates ────────────────────────────────────────────────

/** A boolean test over an event, used to pre-filter listener invocations. */
export type Predicate<E extends Event = Event> = (event: E) => boolean;

/** Pulls a raw value out of an event, or MISSING when it is not there. */
export type Extractor<E extends Event = Event, V = unknown> = (event: E) => V | Missing;

// ─── Execution ─────────────────────────────────────────────────
export type ExecutionStatus = "pending" | "success" | "error" | "di_failure" | "cancelled";

export interface ExecutionRecord {
  startedAt: number;
  durationMs: number;
  status: ExecutionStatus;
  errorMessage?: string;
  errorType?: string;
}

// ─── Config ────────────────────────────────────────────────────
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LogConfig {
  level: LogLevel;
  pretty: boolean;
  file?: string;
}

export interface BusConfig {
  excludedDomains: string[];
  excludedEntities: string[];
  logAllEvents: boolean;
  recentEventsSize: number;
}

export interface SchedulerConfig {
  minDelaySeconds: number;
  maxDelaySeconds: number;
  defaultDelaySeconds: number;
  historySize: number;
  behindScheduleWarnSeconds: number;
}

export interface TasksConfig {
  cancellationTimeoutSeconds: number;
}

export interface HearthConfig {
  version: number;
  timezone: string;
  logging: LogConfig;
  bus: BusConfig;
  scheduler: SchedulerConfig;
  tasks: TasksConfig;
}
