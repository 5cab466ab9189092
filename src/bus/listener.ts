/**
 * Listeners.
 *
 * A listener is a registered (pattern, predicate, handler) subscription.
 * Everything about it is fixed at registration except the cancellation
 * flag and its metrics. Building one compiles the handler's DI binding
 * plan and rate limiter, so a bad listener throws before it is ever
 * routed.
 */

import type { Logger } from "pino";
import type { Event, ListenerId, Predicate } from "../types/index.js";
import { nextListenerId } from "../utils/ids.js";
import { captureSourceLocation } from "../utils/source-location.js";
import { buildBindingPlan, ParameterInjector } from "../di/injector.js";
import type { BindingSource, ParamSpec } from "../di/injector.js";
import type { ResolveContext } from "../di/markers.js";
import { ListenerMetrics } from "./metrics.js";
import type { ListenerMetricsSnapshot } from "./metrics.js";
import { createRateLimiter } from "./rate-limit.js";
import type { RateLimiter, RateLimitWindow } from "./rate-limit.js";
import { describePredicate, evaluatePredicate } from "./predicates.js";
import { validateTopicPattern } from "./router.js";
import type { Routable } from "./router.js";

/** Handler arguments after erasing the handler's own parameter types. */
export type HandlerArgs = Record<string, unknown>;
export type ErasedHandler = (args: HandlerArgs) => unknown;

export interface ListenerSpec {
  owner: string;
  topic: string;
  handler: ErasedHandler;
  handlerName?: string;
  where?: Predicate;
  priority?: number;
  once?: boolean;
  debounce?: number;
  throttle?: number;
  rateLimitWindow?: RateLimitWindow;
  params?: ParamSpec;
  kwargs?: Record<string, unknown>;
  sourceLocation?: string;
}

export interface ListenerInfo {
  id: ListenerId;
  owner: string;
  topic: string;
  handlerName: string;
  priority: number;
  once: boolean;
  debounce: number | null;
  throttle: number | null;
  predicate: string | null;
  params: Array<{ name: string; source: BindingSource; label: string }>;
  sourceLocation: string | null;
  cancelled: boolean;
  metrics: ListenerMetricsSnapshot;
}

export class Listener implements Routable {
  readonly id: ListenerId;
  readonly owner: string;
  readonly topic: string;
  readonly handlerName: string;
  readonly predicate: Predicate | undefined;
  readonly priority: number;
  readonly once: boolean;
  readonly debounce: number | undefined;
  readonly throttle: number | undefined;
  readonly kwargs: Readonly<HandlerArgs>;
  readonly sourceLocation: string | undefined;
  readonly injector: ParameterInjector | undefined;
  readonly rateLimiter: RateLimiter | undefined;
  readonly metrics: ListenerMetrics;
  private readonly handler: ErasedHandler;
  private _cancelled = false;
  private readonly cancelHooks: Array<() => void> = [];

  constructor(spec: ListenerSpec) {
    validateTopicPattern(spec.topic);
    const handlerName = spec.handlerName ?? (spec.handler.name || "<anonymous>");
    const kwargs = Object.freeze({ ...(spec.kwargs ?? {}) });

    // Everything that can throw runs before an id is taken.
    const plan = spec.params ? buildBindingPlan(handlerName, spec.params, kwargs) : undefined;
    this.rateLimiter = createRateLimiter(spec);

    this.id = nextListenerId();
    this.owner = spec.owner;
    this.topic = spec.topic;
    this.handlerName = handlerName;
    this.handler = spec.handler;
    this.predicate = spec.where;
    this.priority = spec.priority ?? 0;
    this.once = spec.once ?? false;
    this.debounce = spec.debounce;
    this.throttle = spec.throttle;
    this.kwargs = kwargs;
    this.sourceLocation = spec.sourceLocation ?? captureSourceLocation();
    this.injector = plan ? new ParameterInjector(handlerName, plan) : undefined;
    this.metrics = new ListenerMetrics(this.id, this.owner, this.topic, handlerName);
  }

  get cancelled(): boolean {
    return this._cancelled;
  }

  cancel(): void {
    if (this._cancelled) return;
    this._cancelled = true;
    this.rateLimiter?.cancel();
    for (const hook of this.cancelHooks.splice(0)) hook();
  }

  /** Run `hook` once when the listener is cancelled, or now if it already is. */
  onCancel(hook: () => void): void {
    if (this._cancelled) hook();
    else this.cancelHooks.push(hook);
  }

  /** Pre-filter. A throwing predicate is a non-match. */
  matches(event: Event, log?: Logger): boolean {
    if (this._cancelled) return false;
    return this.predicate ? evaluatePredicate(this.predicate, event, log) : true;
  }

  /**
   * Resolve handler arguments for `event` and return the call. Throws a
   * DependencyError when resolution fails; the handler is then never run.
   */
  prepare(event: Event, ctx: ResolveContext): () => unknown {
    const resolved = this.injector ? this.injector.resolve(event, ctx) : { event };
    const args: HandlerArgs = { ...this.kwargs, ...resolved };
    return () => this.handler(args);
  }

  info(): ListenerInfo {
    return {
      id: this.id,
      owner: this.owner,
      topic: this.topic,
      handlerName: this.handlerName,
      priority: this.priority,
      once: this.once,
      debounce: this.debounce ?? null,
      throttle: this.throttle ?? null,
      predicate: this.predicate ? describePredicate(this.predicate) : null,
      params: this.injector?.describe() ?? [],
      sourceLocation: this.sourceLocation ?? null,
      cancelled: this._cancelled,
      metrics: this.metrics.toJSON(),
    };
  }

  toString(): string {
    return `Listener<${this.owner}:${this.handlerName}#${this.id} on ${this.topic}>`;
  }
}
