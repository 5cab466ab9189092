/**
 * Hearth Runtime Tests
 *
 * Raw hub traffic in through ingest(), owner-scoped apps, teardown and
 * shutdown.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Hearth } from "../../src/core/hearth.js";
import { parseHubEvent } from "../../src/events/parse.js";
import { D } from "../../src/di/markers.js";
import { T } from "../../src/conversion/type-tokens.js";
import { InvalidEventError } from "../../src/errors.js";
import { drain } from "../support/log-capture.js";

const rawStateChanged = {
  event_type: "state_changed",
  time_fired: "2024-03-02T18:30:00.000+00:00",
  origin: "LOCAL",
  context: { id: "ctx-1", parent_id: null, user_id: null },
  data: {
    entity_id: "sensor.hallway_temperature",
    old_state: {
      entity_id: "sensor.hallway_temperature",
      state: "19.5",
      attributes: { unit_of_measurement: "°C" },
      last_changed: "2024-03-02T18:00:00.000+00:00",
      last_updated: "2024-03-02T18:00:00.000+00:00",
    },
    new_state: {
      entity_id: "sensor.hallway_temperature",
      state: "20.5",
      attributes: { unit_of_measurement: "°C" },
      last_changed: "2024-03-02T18:30:00.000+00:00",
      last_updated: "2024-03-02T18:30:00.000+00:00",
    },
  },
};

describe("parseHubEvent", () => {
  it("reshapes a raw state change", () => {
    const event = parseHubEvent(rawStateChanged);
    expect(event.topic).toBe("hub.event.state_changed");
    expect(event.payload.timeFired.toISOString()).toBe("2024-03-02T18:30:00.000Z");
    expect(event.payload.context).toEqual({ id: "ctx-1", parentId: null, userId: null });
    expect(event.payload.data).toMatchObject({
      entityId: "sensor.hallway_temperature",
      newState: { domain: "sensor", value: "20.5", attributes: { unit_of_measurement: "°C" } },
    });
    expect(Object.isFrozen(event.payload)).toBe(true);
  });

  it("maps call_service data", () => {
    const event = parseHubEvent({
      event_type: "call_service",
      data: { domain: "light", service: "turn_on", service_data: { entity_id: "light.porch" } },
    });
    expect(event.topic).toBe("hub.event.call_service");
    expect(event.payload.data).toEqual({
      domain: "light",
      service: "turn_on",
      serviceData: { entity_id: "light.porch" },
    });
  });

  it("passes unknown event types through under their own topic", () => {
    const event = parseHubEvent({ event_type: "zha_event", data: { command: "on" } });
    expect(event.topic).toBe("hub.event.zha_event");
    expect(event.payload.data).toEqual({ command: "on" });
  });

  it("lists what is wrong with a malformed event", () => {
    expect.assertions(2);
    try {
      parseHubEvent({ event_type: "state_changed", data: { old_state: null } });
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidEventError);
      if (err instanceof InvalidEventError) {
        expect(err.issues).toEqual(["  data.entity_id: Required"]);
      }
    }
  });

  it("rejects a missing event type", () => {
    expect(() => parseHubEvent({ data: {} })).toThrow("Malformed hub event:\n  event_type: Required");
  });
});

describe("Hearth", () => {
  let hearth: Hearth;

  beforeEach(() => {
    hearth = new Hearth();
  });

  afterEach(async () => {
    await hearth.shutdown();
  });

  it("dispatches ingested events to typed handlers", async () => {
    const readings: number[] = [];
    hearth.bus("climate").onStateChange(
      "sensor.*",
      ({ temp }) => {
        readings.push(temp);
      },
      { params: { temp: D.StateValueNew(T.number) } },
    );

    expect(hearth.ingest(rawStateChanged)).toBe(1);
    await drain(hearth.busService.tasks);
    expect(readings).toEqual([20.5]);
  });

  it("tears down everything an owner registered", () => {
    const lights = hearth.bus("lights");
    lights.onStateChange("light.*", () => {});
    lights.onCallService("light", undefined, () => {});
    hearth.scheduler("lights").runEvery(() => {}, 60);
    hearth.scheduler("climate").runEvery(() => {}, 60);

    expect(hearth.teardownOwner("lights")).toEqual({ listeners: 2, jobs: 1 });
    expect(hearth.listListeners("lights")).toEqual([]);
    expect(hearth.listJobs().map((j) => j.owner)).toEqual(["climate"]);
  });

  it("runs scheduled jobs once started", async () => {
    vi.useFakeTimers();
    // Built after the fake clock is installed, so its scheduler reads it.
    const runtime = new Hearth();
    try {
      const fn = vi.fn();
      runtime.scheduler("app").runIn(fn, 2);
      runtime.start();

      await vi.advanceTimersByTimeAsync(2_500);
      expect(fn).toHaveBeenCalledTimes(1);
    } finally {
      await runtime.shutdown();
      vi.useRealTimers();
    }
  });
});
