/**
 * Topic router.
 *
 * Maps a concrete topic to the listeners whose pattern matches it.
 * Patterns are dot-segmented; a segment of exactly `*` matches any one
 * segment of the topic. There is no recursive wildcard. Matching is
 * case-sensitive.
 *
 * Exact patterns live in a hash map; wildcard patterns are kept
 * pre-split and compared segment-wise. Results come back ordered by
 * priority (highest first), then registration order.
 */

import { InvalidTopicPatternError } from "../errors.js";
import type { ListenerId } from "../types/index.js";

export interface Routable {
  readonly id: ListenerId;
  readonly owner: string;
  readonly topic: string;
  readonly priority: number;
  readonly once: boolean;
}

const SEGMENT = /^[A-Za-z0-9_:-]+$/;

/** Throws InvalidTopicPatternError for anything the router cannot match. */
export function validateTopicPattern(pattern: string): void {
  if (pattern.length === 0) {
    throw new InvalidTopicPatternError(pattern, "pattern is empty");
  }
  for (const segment of pattern.split(".")) {
    if (segment === "") {
      throw new InvalidTopicPatternError(pattern, "empty segment");
    }
    if (segment === "*") continue;
    if (segment.includes("**")) {
      throw new InvalidTopicPatternError(pattern, "recursive wildcards are not supported");
    }
    if (segment.includes("*")) {
      throw new InvalidTopicPatternError(pattern, `'*' must be a whole segment, got "${segment}"`);
    }
    if (!SEGMENT.test(segment)) {
      throw new InvalidTopicPatternError(pattern, `invalid characters in segment "${segment}"`);
    }
  }
}

export function isWildcardPattern(pattern: string): boolean {
  return pattern.split(".").includes("*");
}

export function segmentsMatch(pattern: readonly string[], topic: readonly string[]): boolean {
  if (pattern.length !== topic.length) return false;
  for (let i = 0; i < pattern.length; i++) {
    if (pattern[i] !== "*" && pattern[i] !== topic[i]) return false;
  }
  return true;
}

export function topicMatches(pattern: string, topic: string): boolean {
  return segmentsMatch(pattern.split("."), topic.split("."));
}

export function byPriority(a: Routable, b: Routable): number {
  return b.priority - a.priority || a.id - b.id;
}

interface WildcardEntry<L> {
  segments: string[];
  listeners: Map<ListenerId, L>;
}

export class Router<L extends Routable> {
  private exact = new Map<string, Map<ListenerId, L>>();
  private wildcard = new Map<string, WildcardEntry<L>>();
  private byId = new Map<ListenerId, L>();

  /** Register a listener under its own topic pattern. */
  add(listener: L): void {
    validateTopicPattern(listener.topic);
    if (this.byId.has(listener.id)) return;

    if (isWildcardPattern(listener.topic)) {
      let entry = this.wildcard.get(listener.topic);
      if (!entry) {
        entry = { segments: listener.topic.split("."), listeners: new Map() };
        this.wildcard.set(listener.topic, entry);
      }
      entry.listeners.set(listener.id, listener);
    } else {
      let bucket = this.exact.get(listener.topic);
      if (!bucket) {
        bucket = new Map();
        this.exact.set(listener.topic, bucket);
      }
      bucket.set(listener.id, listener);
    }
    this.byId.set(listener.id, listener);
  }

  /** Returns the removed listener, or undefined if it was not registered. */
  remove(id: ListenerId): L | undefined {
    const listener = this.byId.get(id);
    if (!listener) return undefined;
    this.byId.delete(id);

    const exact = this.exact.get(listener.topic);
    if (exact) {
      exact.delete(id);
      if (exact.size === 0) this.exact.delete(listener.topic);
    }
    const wild = this.wildcard.get(listener.topic);
    if (wild) {
      wild.listeners.delete(id);
      if (wild.listeners.size === 0) this.wildcard.delete(listener.topic);
    }
    return listener;
  }

  removeOwner(owner: string): L[] {
    const removed: L[] = [];
    for (const listener of [...this.byId.values()]) {
      if (listener.owner === owner && this.remove(listener.id)) removed.push(listener);
    }
    return removed;
  }

  get(id: ListenerId): L | undefined {
    return this.byId.get(id);
  }

  /** Every listener matching any of the topics, de-duplicated and ordered. */
  match(topics: string | readonly string[]): L[] {
    const found = new Map<ListenerId, L>();
    for (const topic of typeof topics === "string" ? [topics] : topics) {
      const exact = this.exact.get(topic);
      if (exact) for (const l of exact.values()) found.set(l.id, l);

      if (this.wildcard.size === 0) continue;
      const segments = topic.split(".");
      for (const entry of this.wildcard.values()) {
        if (!segmentsMatch(entry.segments, segments)) continue;
        for (const l of entry.listeners.values()) found.set(l.id, l);
      }
    }
    return [...found.values()].sort(byPriority);
  }

  /**
   * Match, filter through `accept`, and atomically remove accepted `once`
   * listeners so no later publish can return them again. A `once` listener
   * rejected by `accept` stays registered.
   */
  publish(topics: string | readonly string[], accept?: (listener: L) => boolean): L[] {
    const selected: L[] = [];
    for (const listener of this.match(topics)) {
      if (accept && !accept(listener)) continue;
      if (listener.once) this.remove(listener.id);
      selected.push(listener);
    }
    return selected;
  }

  listeners(owner?: string): L[] {
    const all = [...this.byId.values()];
    return (owner === undefined ? all : all.filter((l) => l.owner === owner)).sort(
      (a, b) => a.id - b.id,
    );
  }

  get size(): number {
    return this.byId.size;
  }

  clear(): void {
    this.exact.clear();
    this.wildcard.clear();
    this.byId.clear();
  }
}
