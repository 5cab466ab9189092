/**
 * Bus Service
 *
 * The dispatch engine. For each incoming event:
 *
 *   exclusions → topic expansion → router publish (predicate pre-filter,
 *   `once` consumption) → rate limiter → one tracked task per listener
 *
 * Everything up to spawning is synchronous, so "who gets notified" is
 * settled atomically per event. Handler bodies then run concurrently;
 * only their start order follows priority. A failing handler affects its
 * own metrics and log lines and nothing else.
 */

import type { Logger } from "pino";
import type { BusConfig, Event, ListenerId } from "../types/index.js";
import { getLogger } from "../utils/logger.js";
import { globMatch, hasGlobChars } from "../utils/glob.js";
import { TaskBucket } from "../core/tasks.js";
import { ExecutionTracker, trackExecution } from "../core/execution.js";
import type { ExecutionResult } from "../core/execution.js";
import type { TypeRegistry } from "../conversion/type-registry.js";
import type { StateRegistry } from "../states/registry.js";
import { EVENT_CALL_SERVICE, EVENT_STATE_CHANGED } from "../events/topics.js";
import { getDomain, getEntityId, getService, getServiceDataKey } from "./accessors.js";
import { MISSING } from "../types/index.js";
import { Router } from "./router.js";
import type { Listener, ListenerInfo } from "./listener.js";

export const DEFAULT_BUS_CONFIG: BusConfig = {
  excludedDomains: [],
  excludedEntities: [],
  logAllEvents: false,
  recentEventsSize: 100,
};

export interface BusServiceOptions {
  types: TypeRegistry;
  states: StateRegistry;
  tasks?: TaskBucket;
  tracker?: ExecutionTracker;
  config?: Partial<BusConfig>;
  logger?: Logger;
}

interface ExclusionSet {
  exact: Set<string>;
  globs: string[];
}

function splitExactAndGlob(values: readonly string[]): ExclusionSet {
  const exact = new Set<string>();
  const globs: string[] = [];
  for (const v of values) {
    if (hasGlobChars(v)) globs.push(v);
    else exact.add(v);
  }
  return { exact, globs };
}

function excluded(value: string, set: ExclusionSet): boolean {
  return set.exact.has(value) || set.globs.some((g) => globMatch(value, g));
}

export class BusService {
  readonly tasks: TaskBucket;
  readonly tracker: ExecutionTracker;
  private router = new Router<Listener>();
  private recent: Event[] = [];
  private readonly config: BusConfig;
  private readonly excludedDomains: ExclusionSet;
  private readonly excludedEntities: ExclusionSet;
  private readonly types: TypeRegistry;
  private readonly states: StateRegistry;
  private log: Logger;

  constructor(opts: BusServiceOptions) {
    this.config = { ...DEFAULT_BUS_CONFIG, ...opts.config };
    this.log = opts.logger ?? getLogger("bus");
    this.tasks = opts.tasks ?? new TaskBucket("bus", { logger: this.log });
    this.tracker = opts.tracker ?? new ExecutionTracker({ logger: this.log });
    this.types = opts.types;
    this.states = opts.states;
    this.excludedDomains = splitExactAndGlob(this.config.excludedDomains);
    this.excludedEntities = splitExactAndGlob(this.config.excludedEntities);

    if (this.config.excludedDomains.length > 0 || this.config.excludedEntities.length > 0) {
      this.log.info(
        { domains: this.config.excludedDomains, entities: this.config.excludedEntities },
        "Configured bus exclusions",
      );
    }
  }

  // ─── Registry ────────────────────────────────────────────────

  addListener(listener: Listener): void {
    this.router.add(listener);
    this.log.debug(
      { listenerId: listener.id, owner: listener.owner, topic: listener.topic },
      "Listener added",
    );
  }

  removeListener(id: ListenerId): boolean {
    const listener = this.router.remove(id);
    if (!listener) return false;
    listener.cancel();
    this.log.debug({ listenerId: id, owner: listener.owner }, "Listener removed");
    return true;
  }

  /** Bulk teardown for app reload/shutdown. Returns how many were removed. */
  removeListenersByOwner(owner: string): number {
    const removed = this.router.removeOwner(owner);
    for (const listener of removed) listener.cancel();
    if (removed.length > 0) {
      this.log.debug({ owner, count: removed.length }, "Removed listeners for owner");
    }
    return removed.length;
  }

  getListener(id: ListenerId): Listener | undefined {
    return this.router.get(id);
  }

  listListeners(owner?: string): ListenerInfo[] {
    return this.router.listeners(owner).map((l) => l.info());
  }

  getListenerCount(): number {
    return this.router.size;
  }

  getRecentEvents(limit = this.config.recentEventsSize): Event[] {
    return this.recent.slice(-limit);
  }

  // ─── Dispatch ────────────────────────────────────────────────

  /**
   * Deliver `event` to every matching listener. Returns how many
   * listeners passed routing and filtering (rate limiting may still hold
   * some of them back).
   */
  dispatch(topic: string, event: Event): number {
    if (this.shouldSkip(topic, event)) return 0;

    this.remember(event);
    if (this.config.logAllEvents) {
      this.log.debug({ topic, event }, "Event");
    }

    const routes = this.expandTopics(topic, event);
    const selected = this.router.publish(routes, (l) => l.matches(event, this.log));
    if (selected.length === 0) return 0;

    this.log.debug({ topic, routes, count: selected.length }, "Dispatch fanout");
    for (const listener of selected) {
      if (listener.rateLimiter) {
        listener.rateLimiter.submit(event, (e) => this.invoke(listener, topic, e));
      } else {
        this.invoke(listener, topic, event);
      }
    }
    return selected.length;
  }

  /** Most specific first: `<topic>.<entity_id>` or `<topic>.<domain>.<service>`, then `<topic>`. */
  expandTopics(topic: string, event: Event): string[] {
    if (event.payload.source !== "hub") return [topic];

    if (event.payload.eventType === EVENT_STATE_CHANGED) {
      const entityId = getEntityId(event);
      if (entityId === MISSING || !entityId.includes(".")) return [topic];
      return [`${topic}.${entityId}`, topic];
    }
    if (event.payload.eventType === EVENT_CALL_SERVICE) {
      const domain = getDomain(event);
      const service = getService(event);
      if (domain === MISSING || service === MISSING) return [topic];
      return [`${topic}.${domain}.${service}`, topic];
    }
    return [topic];
  }

  private shouldSkip(topic: string, event: Event): boolean {
    if (event.payload.source !== "hub") return false;

    if (
      event.payload.eventType === EVENT_CALL_SERVICE &&
      getDomain(event) === "system_log" &&
      getServiceDataKey("level")(event) === "debug"
    ) {
      return true;
    }

    const entityId = getEntityId(event);
    if (entityId !== MISSING && excluded(entityId, this.excludedEntities)) {
      this.log.debug({ topic, entityId }, "Skipping dispatch due to entity exclusion");
      return true;
    }
    const domain = getDomain(event);
    if (domain !== MISSING && excluded(domain, this.excludedDomains)) {
      this.log.debug({ topic, domain }, "Skipping dispatch due to domain exclusion");
      return true;
    }
    return false;
  }

  private remember(event: Event): void {
    if (this.config.recentEventsSize <= 0) return;
    this.recent.push(event);
    if (this.recent.length > this.config.recentEventsSize) {
      this.recent.shift();
    }
  }

  private invoke(listener: Listener, topic: string, event: Event): void {
    if (listener.cancelled) return;

    this.tasks.spawn(
      `bus:${listener.handlerName}`,
      (signal) =>
        trackExecution(
          async () => {
            const call = listener.prepare(event, { signal, types: this.types, states: this.states });
            await call();
          },
          { onResult: (result) => this.recordOutcome(listener, topic, result) },
        ),
      { owner: listener.owner },
    );
  }

  private recordOutcome(listener: Listener, topic: string, result: ExecutionResult): void {
    listener.metrics.record(result);
    this.tracker.record("listener", listener.id, listener.owner, listener.handlerName, result);

    const ctx = {
      owner: listener.owner,
      listenerId: listener.id,
      handler: listener.handlerName,
      topic,
    };
    switch (result.status) {
      case "error":
        this.log.error({ ...ctx, err: result.error }, "Listener error");
        break;
      case "di_failure":
        this.log.error({ ...ctx, err: result.error }, "Listener DI failure");
        break;
      case "cancelled":
        this.log.debug(ctx, "Listener dispatch cancelled");
        break;
      case "success":
        break;
    }
  }

  /** Drop pending debounced calls and cancel in-flight invocations. */
  async shutdown(timeoutSeconds?: number): Promise<void> {
    for (const listener of this.router.listeners()) listener.rateLimiter?.cancel();
    await this.tasks.cancelAll(timeoutSeconds);
  }
}
