/**
 * Hearth
 *
 * Root supervisor. Builds every shared registry and service once and
 * hands them out explicitly: apps get an owner-scoped Bus and Scheduler,
 * the transport feeds raw hub events into `ingest()`.
 *
 * Shutdown order: stop the scheduler loop, then cancel scheduler fires,
 * then bus invocations.
 */

import type { Logger } from "pino";
import type { Event, HearthConfig } from "../types/index.js";
import { getLogger } from "../utils/logger.js";
import { TaskBucket } from "./tasks.js";
import { ExecutionTracker } from "./execution.js";
import { TypeRegistry } from "../conversion/type-registry.js";
import { StateRegistry } from "../states/registry.js";
import { BusService } from "../bus/bus-service.js";
import { Bus } from "../bus/bus.js";
import type { ListenerInfo } from "../bus/listener.js";
import { SchedulerService } from "../scheduler/scheduler-service.js";
import { Scheduler } from "../scheduler/scheduler.js";
import type { JobInfo } from "../scheduler/job.js";
import { parseHubEvent } from "../events/parse.js";
import { HearthConfigSchema } from "../config/schema.js";

export interface HearthOptions {
  config?: HearthConfig;
  logger?: Logger;
  /** Clock for the scheduler, epoch ms. */
  now?: () => number;
}

export class Hearth {
  readonly config: HearthConfig;
  readonly types: TypeRegistry;
  readonly states: StateRegistry;
  readonly tracker: ExecutionTracker;
  readonly busService: BusService;
  readonly schedulerService: SchedulerService;
  private log: Logger;
  private started = false;

  constructor(opts: HearthOptions = {}) {
    this.config = opts.config ?? HearthConfigSchema.parse({});
    this.log = opts.logger ?? getLogger("hearth");

    const cancellationTimeoutSeconds = this.config.tasks.cancellationTimeoutSeconds;
    this.types = new TypeRegistry({ logger: this.log });
    this.states = new StateRegistry({ logger: this.log });
    this.tracker = new ExecutionTracker({ logger: this.log });

    this.busService = new BusService({
      types: this.types,
      states: this.states,
      tracker: this.tracker,
      config: this.config.bus,
      tasks: new TaskBucket("bus", { cancellationTimeoutSeconds, logger: this.log }),
      logger: opts.logger,
    });
    this.schedulerService = new SchedulerService({
      tracker: this.tracker,
      config: this.config.scheduler,
      tasks: new TaskBucket("scheduler", { cancellationTimeoutSeconds, logger: this.log }),
      logger: opts.logger,
      now: opts.now,
    });
  }

  bus(owner: string): Bus {
    return new Bus(owner, this.busService);
  }

  scheduler(owner: string): Scheduler {
    return new Scheduler(owner, this.schedulerService);
  }

  /** Entry point for the transport: validate a raw hub event and dispatch it. */
  ingest(raw: unknown): number {
    const event = parseHubEvent(raw);
    return this.busService.dispatch(event.topic, event);
  }

  publish(event: Event): number {
    return this.busService.dispatch(event.topic, event);
  }

  /** Drop every listener and job an owner registered. */
  teardownOwner(owner: string): { listeners: number; jobs: number } {
    const listeners = this.busService.removeListenersByOwner(owner);
    const jobs = this.schedulerService.removeJobsByOwner(owner);
    this.log.info({ owner, listeners, jobs }, `Tore down ${owner}`);
    return { listeners, jobs };
  }

  listListeners(owner?: string): ListenerInfo[] {
    return this.busService.listListeners(owner);
  }

  listJobs(owner?: string): JobInfo[] {
    return this.schedulerService.listJobs(owner);
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.schedulerService.start();
    this.log.info({ timezone: this.config.timezone }, "Hearth started");
  }

  async shutdown(): Promise<void> {
    const timeout = this.config.tasks.cancellationTimeoutSeconds;
    await this.schedulerService.shutdown(timeout);
    await this.busService.shutdown(timeout);
    this.started = false;
    this.log.info("Hearth stopped");
  }
}
