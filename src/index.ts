/**
 * Hearth public API.
 */

export type {
  ListenerId,
  JobId,
  TaskId,
  Missing as MissingValue,
  StateValue,
  StateRecord,
  EventOrigin,
  HubContext,
  HubPayload,
  InternalPayload,
  EventPayload,
  Event,
  StateChangeData,
  CallServiceData,
  ServiceRegisteredData,
  HubEvent,
  InternalEvent,
  StateChangeEvent,
  CallServiceEvent,
  ServiceRegisteredEvent,
  Predicate,
  Extractor,
  ExecutionStatus,
  ExecutionRecord,
  LogLevel,
  LogConfig,
  BusConfig,
  SchedulerConfig,
  TasksConfig,
  HearthConfig,
} from "./types/index.js";
export { MISSING, isMissing } from "./types/index.js";

export * from "./errors.js";
export * from "./events/topics.js";
export * from "./events/factories.js";
export { parseHubEvent } from "./events/parse.js";
export type { RawHubEvent } from "./events/parse.js";

export * from "./bus/conditions.js";
export * from "./bus/predicates.js";
export * from "./bus/accessors.js";
export { Bus } from "./bus/bus.js";
export type {
  Handler,
  HandlerArgsFor,
  ListenOptions,
  ChangeOptions,
  CallServiceOptions,
  WaitForOptions,
  Subscription,
} from "./bus/bus.js";
export { BusService, DEFAULT_BUS_CONFIG } from "./bus/bus-service.js";
export type { ListenerInfo } from "./bus/listener.js";
export type { ListenerMetricsSnapshot } from "./bus/metrics.js";
export type { RateLimitWindow } from "./bus/rate-limit.js";

export { Depends, D } from "./di/markers.js";
export type { Dependency } from "./di/markers.js";
export type { ParamSpec, ResolvedParams } from "./di/injector.js";
export { T } from "./conversion/type-tokens.js";
export type { TypeToken } from "./conversion/type-tokens.js";
export { TypeRegistry } from "./conversion/type-registry.js";
export * from "./states/models.js";
export { StateRegistry, stateUnion } from "./states/registry.js";
export type { StateUnion, StateOf } from "./states/registry.js";

export { Scheduler } from "./scheduler/scheduler.js";
export type {
  TimeLike,
  StartLike,
  JobOptions,
  ScheduleOptions,
  RepeatOptions,
  CronJobOptions,
} from "./scheduler/scheduler.js";
export { SchedulerService, DEFAULT_SCHEDULER_CONFIG } from "./scheduler/scheduler-service.js";
export { ScheduledJob } from "./scheduler/job.js";
export type { JobContext, JobFn, JobInfo, JobExecution } from "./scheduler/job.js";
export { CronTrigger, IntervalTrigger, OnceTrigger, nextGridPoint } from "./scheduler/triggers.js";
export type { Trigger, CronFields } from "./scheduler/triggers.js";

export { TaskBucket, TaskHandle, currentTask, sleep } from "./core/tasks.js";
export { ExecutionTracker, trackExecution } from "./core/execution.js";
export type { ExecutionResult, ExecutionEvent } from "./core/execution.js";
export { Hearth } from "./core/hearth.js";
export type { HearthOptions } from "./core/hearth.js";

export { loadConfig, getConfig, parseConfig, generateDefaultConfig } from "./config/loader.js";
export { initLogger, getLogger } from "./utils/logger.js";
export { HEARTH_HOME, CONFIG_FILE, LOG_FILE } from "./paths.js";
