/**
 * Router Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Router, topicMatches, validateTopicPattern } from "../../src/bus/router.js";
import type { Routable } from "../../src/bus/router.js";
import { InvalidTopicPatternError } from "../../src/errors.js";
import { ListenerId } from "../../src/types/index.js";

let seq = 0;
function route(topic: string, opts: Partial<Omit<Routable, "id" | "topic">> = {}): Routable {
  return {
    id: ListenerId(++seq),
    owner: opts.owner ?? "app",
    topic,
    priority: opts.priority ?? 0,
    once: opts.once ?? false,
  };
}

describe("topic matching", () => {
  it("matches exactly one segment per wildcard", () => {
    expect(topicMatches("hub.event.*", "hub.event.state_changed")).toBe(true);
    expect(topicMatches("hub.event.*", "hub.event.state_changed.light.kitchen")).toBe(false);
    expect(topicMatches("hub.*.state_changed", "hub.event.state_changed")).toBe(true);
    expect(topicMatches("hub.event", "hub.event")).toBe(true);
    expect(topicMatches("Hub.event", "hub.event")).toBe(false);
  });

  it("rejects malformed patterns", () => {
    expect(() => validateTopicPattern("")).toThrow(InvalidTopicPatternError);
    expect(() => validateTopicPattern("hub..event")).toThrow("empty segment");
    expect(() => validateTopicPattern("hub.**")).toThrow("recursive wildcards");
    expect(() => validateTopicPattern("hub.ev*")).toThrow("must be a whole segment");
    expect(() => validateTopicPattern("hub.event.light kitchen")).toThrow("invalid characters");
    expect(() => validateTopicPattern("hub.event/light")).toThrow("invalid characters");
    expect(() => validateTopicPattern("hub.event.*")).not.toThrow();
  });
});

describe("Router", () => {
  let router: Router<Routable>;

  beforeEach(() => {
    router = new Router<Routable>();
  });

  it("orders by priority, then registration", () => {
    const low = route("a.b");
    const high = route("a.*", { priority: 10 });
    const second = route("a.b");
    router.add(low);
    router.add(high);
    router.add(second);

    expect(router.match("a.b").map((l) => l.id)).toEqual([high.id, low.id, second.id]);
  });

  it("de-duplicates across expanded topics", () => {
    const wild = route("t.*");
    router.add(wild);
    expect(router.match(["t.x", "t.y"])).toEqual([wild]);
  });

  it("consumes accepted once-listeners atomically", () => {
    const once = route("a.b", { once: true });
    router.add(once);

    expect(router.publish("a.b")).toEqual([once]);
    expect(router.publish("a.b")).toEqual([]);
    expect(router.size).toBe(0);
  });

  it("keeps a once-listener its filter rejected", () => {
    const once = route("a.b", { once: true });
    router.add(once);

    expect(router.publish("a.b", () => false)).toEqual([]);
    expect(router.get(once.id)).toBe(once);
  });

  it("removes by id and by owner", () => {
    const a = route("x.y", { owner: "one" });
    const b = route("x.*", { owner: "one" });
    const c = route("x.y", { owner: "two" });
    [a, b, c].forEach((l) => router.add(l));

    expect(router.remove(c.id)).toBe(c);
    expect(router.remove(c.id)).toBeUndefined();
    expect(router.removeOwner("one")).toEqual([a, b]);
    expect(router.match("x.y")).toEqual([]);
  });

  it("lists listeners by owner in id order", () => {
    const a = route("p.q", { owner: "one" });
    const b = route("p.r", { owner: "two" });
    router.add(b);
    router.add(a);
    expect(router.listeners("one")).toEqual([a]);
    expect(router.listeners()).toEqual([a, b]);
  });
});
