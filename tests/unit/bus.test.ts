/**
 * Bus Tests
 *
 * Dispatch end to end: routing, filtering, DI binding, rate limiting,
 * per-listener metrics and failure isolation.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { Mock } from "vitest";
import { Bus } from "../../src/bus/bus.js";
import { BusService } from "../../src/bus/bus-service.js";
import { AllOf, AttrTo, ValueIs } from "../../src/bus/predicates.js";
import { getPath } from "../../src/bus/accessors.js";
import { GreaterThan } from "../../src/bus/conditions.js";
import { D } from "../../src/di/markers.js";
import { T } from "../../src/conversion/type-tokens.js";
import { TypeRegistry } from "../../src/conversion/type-registry.js";
import { StateRegistry } from "../../src/states/registry.js";
import { LightState } from "../../src/states/models.js";
import { TaskBucket } from "../../src/core/tasks.js";
import {
  createCallServiceEvent,
  createInternalEvent,
  createStateChangeEvent,
} from "../../src/events/factories.js";
import { CancelledError, DependencyInjectionError, WaitTimeoutError } from "../../src/errors.js";
import type { BusConfig } from "../../src/types/index.js";
import { captureLogs, drain } from "../support/log-capture.js";
import type { CapturedLogger } from "../support/log-capture.js";

function makeService(config: Partial<BusConfig> = {}, logs?: CapturedLogger): BusService {
  return new BusService({
    types: new TypeRegistry(),
    states: new StateRegistry(),
    tasks: new TaskBucket("bus", { logger: logs?.logger }),
    config,
    logger: logs?.logger,
  });
}

const change = (entityId: string, from: string, to: string, attrs: Record<string, unknown> = {}) =>
  createStateChangeEvent(entityId, { value: from, attributes: attrs }, { value: to, attributes: attrs });

describe("Bus", () => {
  let service: BusService;
  let bus: Bus;

  beforeEach(() => {
    service = makeService();
    bus = new Bus("app", service);
  });

  it("binds the typed new state for a changedTo subscription", async () => {
    const seen: LightState[] = [];
    bus.onStateChange(
      "light.kitchen",
      ({ state }) => {
        seen.push(state);
      },
      { changedTo: "on", params: { state: D.StateNew(LightState) } },
    );

    bus.emit(
      createStateChangeEvent(
        "light.kitchen",
        { value: "off" },
        { value: "on", attributes: { brightness: 180 } },
      ),
    );
    await drain(service.tasks);

    expect(seen).toHaveLength(1);
    expect(seen[0].value).toBe("on");
    expect(seen[0].attributes.brightness).toBe(180);
  });

  it("fires on attribute conditions when the value did not change", async () => {
    const handler = vi.fn();
    bus.onStateChange("light.kitchen", handler, {
      changed: false,
      where: AllOf(AttrTo("brightness", GreaterThan(200))),
    });

    bus.emit(change("light.kitchen", "on", "on", { brightness: 150 }));
    bus.emit(change("light.kitchen", "on", "on", { brightness: 250 }));
    await drain(service.tasks);

    expect(handler).toHaveBeenCalledOnce();
    const [{ event }] = handler.mock.calls[0];
    expect(event.payload.data.newState.attributes.brightness).toBe(250);
  });

  it("ignores unchanged values unless changed is false", async () => {
    const strict = vi.fn();
    const loose = vi.fn();
    bus.onStateChange("light.kitchen", strict, { changedTo: "on" });
    bus.onStateChange("light.kitchen", loose, { changedTo: "on", changed: false });

    bus.emit(change("light.kitchen", "on", "on"));
    await drain(service.tasks);

    expect(strict).not.toHaveBeenCalled();
    expect(loose).toHaveBeenCalledOnce();
  });

  it("rejects an unsatisfiable parameter at registration", () => {
    const isWidget = (v: unknown): v is { size: number } =>
      typeof v === "object" && v !== null && "size" in v;

    expect(() =>
      bus.on("hub.event.state_changed", () => undefined, {
        params: { widget: T.custom("Widget", isWidget) },
      }),
    ).toThrow(DependencyInjectionError);
    expect(service.getListenerCount()).toBe(0);
  });

  it("takes a type-token parameter from kwargs", async () => {
    const seen: number[] = [];
    bus.onInternal(
      "tick",
      ({ step }) => {
        seen.push(step);
      },
      { params: { step: T.number }, kwargs: { step: 5 } },
    );

    bus.emit(createInternalEvent("tick", {}));
    await drain(service.tasks);
    expect(seen).toEqual([5]);
  });

  it("routes wildcard entity patterns by domain", async () => {
    const lights = vi.fn();
    bus.onStateChange("light.*", lights);

    bus.emit(change("light.kitchen", "off", "on"));
    bus.emit(change("switch.kitchen", "off", "on"));
    await drain(service.tasks);

    expect(lights).toHaveBeenCalledOnce();
    expect(lights.mock.calls[0][0].event.payload.data.entityId).toBe("light.kitchen");
  });

  it("treats a bare domain as every entity in it", async () => {
    const handler = vi.fn();
    bus.onStateChange("switch", handler);
    bus.emit(change("switch.fan", "off", "on"));
    await drain(service.tasks);
    expect(handler).toHaveBeenCalledOnce();
  });

  it("routes service calls by domain and service", async () => {
    const turnOn = vi.fn();
    const anyLight = vi.fn();
    const kitchenOnly = vi.fn();
    bus.onCallService("light", "turn_on", turnOn);
    bus.onCallService("light", undefined, anyLight);
    bus.onCallService(undefined, undefined, kitchenOnly, {
      serviceData: { entity_id: "light.kitchen" },
    });

    bus.emit(createCallServiceEvent("light", "turn_off", { entity_id: ["light.kitchen"] }));
    await drain(service.tasks);

    expect(turnOn).not.toHaveBeenCalled();
    expect(anyLight).toHaveBeenCalledOnce();
    expect(kitchenOnly).toHaveBeenCalledOnce();
  });

  it("delivers a once-listener a single time", async () => {
    const handler = vi.fn();
    bus.onInternal("ping", handler, { once: true });

    expect(bus.emit(createInternalEvent("ping", {}))).toBe(1);
    expect(bus.emit(createInternalEvent("ping", {}))).toBe(0);
    await drain(service.tasks);

    expect(handler).toHaveBeenCalledOnce();
    expect(service.getListenerCount()).toBe(0);
  });

  it("starts handlers in priority order", async () => {
    const order: string[] = [];
    bus.onInternal("go", () => order.push("low"), { priority: -1 });
    bus.onInternal("go", () => order.push("mid"));
    bus.onInternal("go", () => order.push("high"), { priority: 5 });

    bus.emit(createInternalEvent("go", {}));
    await drain(service.tasks);
    expect(order).toEqual(["high", "mid", "low"]);
  });

  it("passes kwargs alongside the event", async () => {
    const handler = vi.fn();
    bus.onInternal("go", handler, { kwargs: { room: "kitchen" } });
    const event = createInternalEvent("go", {});
    bus.emit(event);
    await drain(service.tasks);
    expect(handler).toHaveBeenCalledWith({ room: "kitchen", event });
  });

  it("stops delivering after the subscription is cancelled", async () => {
    const handler = vi.fn();
    const sub = bus.onInternal("go", handler);

    expect(sub.cancel()).toBe(true);
    expect(sub.cancel()).toBe(false);
    bus.emit(createInternalEvent("go", {}));
    await drain(service.tasks);
    expect(handler).not.toHaveBeenCalled();
  });

  it("tears down every listener of an owner", () => {
    const other = new Bus("other", service);
    bus.onInternal("a", vi.fn());
    bus.onInternal("b", vi.fn());
    other.onInternal("a", vi.fn());

    expect(bus.removeAllListeners()).toBe(2);
    expect(service.listListeners().map((l) => l.owner)).toEqual(["other"]);
  });

  it("describes listeners for introspection", () => {
    bus.onStateChange("light.kitchen", function lightsOn() {}, {
      changedTo: "on",
      params: { value: D.StateValueNew(T.string) },
    });

    const [info] = bus.listeners();
    expect(info.handlerName).toBe("lightsOn");
    expect(info.topic).toBe("hub.event.state_changed.light.kitchen");
    expect(info.predicate).toBe(
      'AllOf(DidChange(state.value(old, new)), ValueIs(new_state.value, "on"))',
    );
    expect(info.params).toEqual([
      { name: "value", source: "builtin", label: "StateValueNew(string)" },
    ]);
  });
});

describe("BusService dispatch", () => {
  it("skips excluded domains and entities", async () => {
    const service = makeService({
      excludedDomains: ["sun"],
      excludedEntities: ["sensor.*_rssi"],
    });
    const bus = new Bus("app", service);
    const handler = vi.fn();
    bus.on("hub.event.state_changed", handler);

    expect(bus.emit(change("sun.sun", "above", "below"))).toBe(0);
    expect(bus.emit(change("sensor.door_rssi", "-60", "-61"))).toBe(0);
    expect(bus.emit(change("sensor.door", "closed", "open"))).toBe(1);
    await drain(service.tasks);

    expect(handler).toHaveBeenCalledOnce();
    expect(service.getRecentEvents()).toHaveLength(1);
  });

  it("drops system_log debug calls", () => {
    const service = makeService();
    const bus = new Bus("app", service);
    bus.onCallService("system_log", undefined, vi.fn());

    expect(bus.emit(createCallServiceEvent("system_log", "write", { level: "debug" }))).toBe(0);
    expect(bus.emit(createCallServiceEvent("system_log", "write", { level: "error" }))).toBe(1);
  });

  it("expands topics most specific first", () => {
    const service = makeService();
    expect(service.expandTopics("hub.event.state_changed", change("light.a", "off", "on"))).toEqual(
      ["hub.event.state_changed.light.a", "hub.event.state_changed"],
    );
    expect(
      service.expandTopics("hub.event.call_service", createCallServiceEvent("light", "turn_on")),
    ).toEqual(["hub.event.call_service.light.turn_on", "hub.event.call_service"]);
    const internal = createInternalEvent("x", {});
    expect(service.expandTopics(internal.topic, internal)).toEqual(["hearth.x"]);
  });

  it("bounds the recent-events buffer", () => {
    const service = makeService({ recentEventsSize: 2 });
    const events = ["a", "b", "c"].map((t) => createInternalEvent(t, {}));
    for (const e of events) service.dispatch(e.topic, e);
    expect(service.getRecentEvents()).toEqual([events[1], events[2]]);
    expect(service.getRecentEvents(1)).toEqual([events[2]]);
  });

  it("isolates failures and classifies them in metrics", async () => {
    const logs = captureLogs();
    const service = makeService({}, logs);
    const bus = new Bus("app", service);

    const ok = bus.onInternal("go", () => undefined);
    const broken = bus.onInternal("go", function broken() {
      throw new Error("boom");
    });
    const needsAttr = bus.onInternal("go", () => undefined, {
      params: { level: D.AttrNew("brightness") },
    });
    const stopped = bus.onInternal("go", () => {
      throw new CancelledError();
    });

    bus.emit(createInternalEvent("go", {}));
    await drain(service.tasks);

    const metrics = (id: number) => service.listListeners().find((l) => l.id === id)?.metrics;
    expect(metrics(ok.id)).toMatchObject({ totalInvocations: 1, successful: 1 });
    expect(metrics(broken.id)).toMatchObject({
      failed: 1,
      lastErrorMessage: "boom",
      lastErrorType: "Error",
    });
    expect(metrics(needsAttr.id)).toMatchObject({
      diFailures: 1,
      failed: 0,
      lastErrorType: "DependencyResolutionError",
    });
    expect(metrics(stopped.id)).toMatchObject({ cancelled: 1, failed: 0 });

    const errors = logs.lines.filter((l) => l.level === 50);
    expect(errors.map((l) => l.msg).sort()).toEqual(["Listener DI failure", "Listener error"]);
    expect(errors.find((l) => l.msg === "Listener error")).toMatchObject({
      owner: "app",
      handler: "broken",
      topic: "hearth.go",
      err: { message: "boom" },
    });
  });

  it("does not let a throwing predicate block other listeners", async () => {
    const service = makeService();
    const bus = new Bus("app", service);
    const handler = vi.fn();
    bus.onInternal("go", vi.fn(), {
      where: () => {
        throw new Error("bad predicate");
      },
    });
    bus.onInternal("go", handler);

    expect(bus.emit(createInternalEvent("go", {}))).toBe(1);
    await drain(service.tasks);
    expect(handler).toHaveBeenCalledOnce();
  });
});

describe("rate limiting", () => {
  let service: BusService;
  let bus: Bus;

  beforeEach(() => {
    vi.useFakeTimers();
    service = makeService();
    bus = new Bus("app", service);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  const emit = (n: number) => bus.emit(createInternalEvent("go", { n }));
  const seenN = (handler: Mock) => handler.mock.calls.map((call) => call[0].event.payload.data);

  it("debounces to the newest event after a quiet window", async () => {
    const handler = vi.fn();
    bus.onInternal("go", handler, { debounce: 1 });

    emit(1);
    vi.advanceTimersByTime(500);
    emit(2);
    vi.advanceTimersByTime(999);
    expect(handler).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    await drain(service.tasks);
    expect(seenN(handler)).toEqual([{ n: 2 }]);
  });

  it("throttles on a fixed window from the last fire", async () => {
    const handler = vi.fn();
    bus.onInternal("go", handler, { throttle: 1 });

    emit(1);
    vi.advanceTimersByTime(600);
    emit(2);
    vi.advanceTimersByTime(600);
    emit(3);
    vi.advanceTimersByTime(1100);
    emit(4);
    await drain(service.tasks);

    expect(seenN(handler)).toEqual([{ n: 1 }, { n: 3 }, { n: 4 }]);
  });

  it("throttles on a sliding window restarted by every event", async () => {
    const handler = vi.fn();
    bus.onInternal("go", handler, { throttle: 1, rateLimitWindow: "sliding" });

    emit(1);
    vi.advanceTimersByTime(600);
    emit(2);
    vi.advanceTimersByTime(600);
    emit(3);
    vi.advanceTimersByTime(1100);
    emit(4);
    await drain(service.tasks);

    expect(seenN(handler)).toEqual([{ n: 1 }, { n: 4 }]);
  });

  it("rejects combining debounce and throttle", () => {
    expect(() => bus.onInternal("go", vi.fn(), { debounce: 1, throttle: 1 })).toThrow(
      "debounce and throttle cannot be combined",
    );
  });

  it("drops a pending debounce on shutdown", async () => {
    const handler = vi.fn();
    bus.onInternal("go", handler, { debounce: 1 });
    emit(1);
    await service.shutdown(0.1);
    vi.advanceTimersByTime(2000);
    expect(handler).not.toHaveBeenCalled();
  });

  it("waitFor resolves with the next matching event", async () => {
    const waiting = bus.waitFor("hearth.go", { where: ValueIs(getPath("payload.data.n"), 2) });
    emit(1);
    emit(2);
    await drain(service.tasks);
    const event = await waiting;
    expect(event.payload.data).toEqual({ n: 2 });
    expect(service.getListenerCount()).toBe(0);
  });

  it("waitFor rejects after its timeout and unsubscribes", async () => {
    const waiting = bus.waitFor("hearth.go", { timeoutMs: 500 });
    const assertion = expect(waiting).rejects.toThrow(WaitTimeoutError);
    vi.advanceTimersByTime(500);
    await assertion;
    expect(service.getListenerCount()).toBe(0);
  });

  it("waitFor rejects when its owner's listeners are removed", async () => {
    const waiting = bus.waitFor("hearth.go");
    const assertion = expect(waiting).rejects.toThrow(CancelledError);
    expect(bus.removeAllListeners()).toBe(1);
    await assertion;
  });

  it("waitFor rejects on owner teardown even with a timeout pending", async () => {
    const waiting = bus.waitFor("hearth.go", { timeoutMs: 500 });
    const assertion = expect(waiting).rejects.toThrow("waitFor(hearth.go) was cancelled");
    service.removeListenersByOwner("app");
    await assertion;
    expect(vi.getTimerCount()).toBe(0);
  });
});
