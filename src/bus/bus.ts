/**
 * Bus
 *
 * The owner-scoped face of the bus service. Apps get one of these and
 * register listeners through it; every listener it creates carries the
 * owner, so an app's subscriptions can be torn down together.
 *
 * Handlers receive a single object. Without `params` it is
 * `{ event, ...kwargs }`; with `params` each declared name is bound by the
 * dependency injector and merged over the kwargs.
 */

import type { Event, ListenerId, Predicate } from "../types/index.js";
import { CancelledError, WaitTimeoutError } from "../errors.js";
import type { ParamSpec, ResolvedParams } from "../di/injector.js";
import {
  TOPIC_SERVICE_REGISTERED,
  callServiceTopic,
  internalTopic,
  stateChangedTopic,
} from "../events/topics.js";
import type { BusService } from "./bus-service.js";
import { Listener } from "./listener.js";
import type { ErasedHandler, HandlerArgs, ListenerInfo } from "./listener.js";
import {
  AllOf,
  AttrDidChange,
  AttrFrom,
  AttrTo,
  DomainMatches,
  From,
  ServiceDataWhere,
  StateDidChange,
  To,
  flatten,
} from "./predicates.js";
import type { ConditionLike, Where } from "./predicates.js";
import type { RateLimitWindow } from "./rate-limit.js";

type NoArgs = Record<never, never>;

/** What a handler is called with, given its declared params and kwargs. */
export type HandlerArgsFor<P extends ParamSpec, K extends HandlerArgs> = ([keyof P] extends [never]
  ? { event: Event }
  : ResolvedParams<P>) &
  Readonly<K>;

export type Handler<P extends ParamSpec = NoArgs, K extends HandlerArgs = NoArgs> = (
  args: HandlerArgsFor<P, K>,
) => unknown;

export interface ListenOptions<P extends ParamSpec = NoArgs, K extends HandlerArgs = NoArgs> {
  where?: Where;
  /** Higher runs first. Default 0. */
  priority?: number;
  once?: boolean;
  /** Seconds. */
  debounce?: number;
  /** Seconds. */
  throttle?: number;
  rateLimitWindow?: RateLimitWindow;
  params?: P;
  kwargs?: K;
  /** Display name; defaults to the handler's function name. */
  name?: string;
}

export interface ChangeOptions<P extends ParamSpec = NoArgs, K extends HandlerArgs = NoArgs>
  extends ListenOptions<P, K> {
  changedTo?: ConditionLike;
  changedFrom?: ConditionLike;
  /** Require old !== new. Default true. */
  changed?: boolean;
}

export interface CallServiceOptions<P extends ParamSpec = NoArgs, K extends HandlerArgs = NoArgs>
  extends ListenOptions<P, K> {
  serviceData?: Record<string, ConditionLike>;
}

export interface WaitForOptions {
  where?: Where;
  timeoutMs?: number;
}

export interface Subscription {
  readonly id: ListenerId;
  readonly listener: Listener;
  /** Remove the listener. False if it was already gone. */
  cancel(): boolean;
}

type AnyOptions = ChangeOptions<ParamSpec, HandlerArgs> & CallServiceOptions<ParamSpec, HandlerArgs>;

function combine(parts: Where[]): Predicate | undefined {
  const preds = flatten(parts);
  if (preds.length === 0) return undefined;
  return preds.length === 1 ? preds[0] : AllOf(...preds);
}

/** `light` means every light; `light.kitchen` and `light.*` route as given. */
function entityTopic(entityPattern: string): string {
  return stateChangedTopic(entityPattern.includes(".") ? entityPattern : `${entityPattern}.*`);
}

export class Bus {
  constructor(
    readonly owner: string,
    private readonly service: BusService,
  ) {}

  /** Listen on a raw topic pattern. */
  on<P extends ParamSpec = NoArgs, K extends HandlerArgs = NoArgs>(
    topic: string,
    handler: Handler<P, K>,
    opts?: ListenOptions<P, K>,
  ): Subscription;
  on(topic: string, handler: ErasedHandler, opts: AnyOptions = {}): Subscription {
    return this.register(topic, handler, opts, combine(opts.where ? [opts.where] : []));
  }

  /** Entity state changes. By default fires only when the state value changed. */
  onStateChange<P extends ParamSpec = NoArgs, K extends HandlerArgs = NoArgs>(
    entityPattern: string,
    handler: Handler<P, K>,
    opts?: ChangeOptions<P, K>,
  ): Subscription;
  onStateChange(entityPattern: string, handler: ErasedHandler, opts: AnyOptions = {}): Subscription {
    const parts: Where[] = [];
    if (opts.changed ?? true) parts.push(StateDidChange());
    if (opts.changedTo !== undefined) parts.push(To(opts.changedTo));
    if (opts.changedFrom !== undefined) parts.push(From(opts.changedFrom));
    if (opts.where) parts.push(opts.where);
    return this.register(entityTopic(entityPattern), handler, opts, combine(parts));
  }

  /** Changes to one attribute of an entity's state. */
  onAttribute<P extends ParamSpec = NoArgs, K extends HandlerArgs = NoArgs>(
    entityPattern: string,
    attribute: string,
    handler: Handler<P, K>,
    opts?: ChangeOptions<P, K>,
  ): Subscription;
  onAttribute(
    entityPattern: string,
    attribute: string,
    handler: ErasedHandler,
    opts: AnyOptions = {},
  ): Subscription {
    const parts: Where[] = [];
    if (opts.changed ?? true) parts.push(AttrDidChange(attribute));
    if (opts.changedTo !== undefined) parts.push(AttrTo(attribute, opts.changedTo));
    if (opts.changedFrom !== undefined) parts.push(AttrFrom(attribute, opts.changedFrom));
    if (opts.where) parts.push(opts.where);
    return this.register(entityTopic(entityPattern), handler, opts, combine(parts));
  }

  /** Service calls, narrowed by domain and/or service when given. */
  onCallService<P extends ParamSpec = NoArgs, K extends HandlerArgs = NoArgs>(
    domain: string | undefined,
    service: string | undefined,
    handler: Handler<P, K>,
    opts?: CallServiceOptions<P, K>,
  ): Subscription;
  onCallService(
    domain: string | undefined,
    service: string | undefined,
    handler: ErasedHandler,
    opts: AnyOptions = {},
  ): Subscription {
    const parts: Where[] = [];
    if (opts.serviceData) parts.push(ServiceDataWhere(opts.serviceData));
    if (opts.where) parts.push(opts.where);
    return this.register(callServiceTopic(domain, service), handler, opts, combine(parts));
  }

  onServiceRegistered<P extends ParamSpec = NoArgs, K extends HandlerArgs = NoArgs>(
    domain: string | undefined,
    handler: Handler<P, K>,
    opts?: ListenOptions<P, K>,
  ): Subscription;
  onServiceRegistered(
    domain: string | undefined,
    handler: ErasedHandler,
    opts: AnyOptions = {},
  ): Subscription {
    const parts: Where[] = [];
    if (domain !== undefined) parts.push(DomainMatches(domain));
    if (opts.where) parts.push(opts.where);
    return this.register(TOPIC_SERVICE_REGISTERED, handler, opts, combine(parts));
  }

  /** Events raised inside the runtime (`hearth.<eventType>`). */
  onInternal<P extends ParamSpec = NoArgs, K extends HandlerArgs = NoArgs>(
    eventType: string,
    handler: Handler<P, K>,
    opts?: ListenOptions<P, K>,
  ): Subscription;
  onInternal(eventType: string, handler: ErasedHandler, opts: AnyOptions = {}): Subscription {
    return this.register(
      internalTopic(eventType),
      handler,
      opts,
      combine(opts.where ? [opts.where] : []),
    );
  }

  /** Resolve with the next matching event on `topic`, or reject after `timeoutMs`. */
  waitFor(topic: string, opts: WaitForOptions = {}): Promise<Event> {
    const { timeoutMs } = opts;
    return new Promise<Event>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      const sub = this.on(
        topic,
        ({ event }) => {
          clearTimeout(timer);
          resolve(event);
        },
        { where: opts.where, once: true, name: `waitFor(${topic})` },
      );
      // Teardown by owner or removeAllListeners() before any match.
      sub.listener.onCancel(() => {
        clearTimeout(timer);
        reject(new CancelledError(`waitFor(${topic}) was cancelled`));
      });
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          reject(new WaitTimeoutError(topic, timeoutMs));
          sub.cancel();
        }, timeoutMs);
      }
    });
  }

  /** Dispatch an event through the bus. Returns how many listeners it reached. */
  emit(event: Event): number {
    return this.service.dispatch(event.topic, event);
  }

  listeners(): ListenerInfo[] {
    return this.service.listListeners(this.owner);
  }

  removeAllListeners(): number {
    return this.service.removeListenersByOwner(this.owner);
  }

  private register(
    topic: string,
    handler: ErasedHandler,
    opts: ListenOptions<ParamSpec, HandlerArgs>,
    where: Predicate | undefined,
  ): Subscription {
    const listener = new Listener({
      owner: this.owner,
      topic,
      handler,
      handlerName: opts.name,
      where,
      priority: opts.priority,
      once: opts.once,
      debounce: opts.debounce,
      throttle: opts.throttle,
      rateLimitWindow: opts.rateLimitWindow,
      params: opts.params,
      kwargs: opts.kwargs,
    });
    this.service.addListener(listener);

    const service = this.service;
    return {
      id: listener.id,
      listener,
      cancel(): boolean {
        const removed = service.removeListener(listener.id);
        listener.cancel();
        return removed;
      },
    };
  }
}
