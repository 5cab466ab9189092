/**
 * State Registry
 *
 * Domain → state model lookup. Open for extension: apps register their
 * own models for custom domains. Used by the DI resolver to turn a raw
 * StateRecord into a typed state, either by an explicit model, by a
 * union resolved on the entity's domain, or by inference from the domain.
 */

import type { Logger } from "pino";
import { ConfigurationError, TypeConversionError, UnionResolutionError } from "../errors.js";
import type { StateRecord } from "../types/index.js";
import { getLogger } from "../utils/logger.js";
import { BaseState, BUILTIN_STATE_MODELS, toModelInput } from "./models.js";
import type { StateModel } from "./models.js";

export interface StateUnion<S> {
  readonly kind: "union";
  readonly members: readonly StateModel<unknown>[];
  /** Type-level only: the union of the members' state types. */
  readonly __state?: S;
}

export type StateOf<M> = M extends StateModel<infer S> ? S : never;

/** A parameter typed "one of these models, chosen by the entity's domain". */
export function stateUnion<M extends StateModel<unknown>[]>(
  ...members: M
): StateUnion<StateOf<M[number]>> {
  return Object.freeze({ kind: "union", members: [...members] });
}

export function isStateUnion(value: unknown): value is StateUnion<unknown> {
  return typeof value === "object" && value !== null && "kind" in value && value.kind === "union";
}

export type StateTarget<S> = StateModel<S> | StateUnion<S>;

export class StateRegistry {
  private byDomain = new Map<string, StateModel<unknown>>();
  private log: Logger;

  constructor(opts: { logger?: Logger; builtins?: boolean } = {}) {
    this.log = opts.logger ?? getLogger("state-registry");
    if (opts.builtins ?? true) {
      for (const model of BUILTIN_STATE_MODELS) this.register(model);
    }
  }

  register(model: StateModel<unknown>, opts: { replace?: boolean } = {}): void {
    if (model.domain === null) {
      throw new ConfigurationError(`State model ${model.name} has no domain to register under`);
    }
    const existing = this.byDomain.get(model.domain);
    if (existing && existing !== model && !opts.replace) {
      throw new ConfigurationError(
        `Domain '${model.domain}' already has state model ${existing.name}`,
      );
    }
    this.byDomain.set(model.domain, model);
    this.log.debug({ domain: model.domain, model: model.name }, "Registered state model");
  }

  /** The model registered for a domain, or BaseState. */
  resolve(domain: string): StateModel<unknown> {
    return this.byDomain.get(domain) ?? BaseState;
  }

  list(): Array<{ domain: string; model: string }> {
    return [...this.byDomain.entries()]
      .map(([domain, model]) => ({ domain, model: model.name }))
      .sort((a, b) => a.domain.localeCompare(b.domain));
  }

  convert(record: StateRecord): unknown;
  convert<S>(record: StateRecord, target: StateTarget<S>): S;
  convert(record: StateRecord, target?: StateTarget<unknown>): unknown {
    if (target === undefined) return this.parse(record, this.resolve(record.domain));
    if (isStateUnion(target)) return this.parse(record, this.pickMember(record, target));

    if (target.domain !== null && target.domain !== record.domain) {
      throw new TypeConversionError(
        `StateRecord(${record.domain})`,
        target.name,
        record.entityId,
        `model is for domain '${target.domain}'`,
      );
    }
    return this.parse(record, target);
  }

  private pickMember(record: StateRecord, union: StateUnion<unknown>): StateModel<unknown> {
    const member =
      union.members.find((m) => m.domain === record.domain) ??
      union.members.find((m) => m.domain === null);
    if (!member) {
      throw new UnionResolutionError(record.domain, union.members.map((m) => m.name));
    }
    return member;
  }

  private parse<S>(record: StateRecord, model: StateModel<S>): S {
    const result = model.schema.safeParse(toModelInput(record));
    if (result.success) return result.data;
    throw new TypeConversionError(
      `StateRecord(${record.domain})`,
      model.name,
      record.entityId,
      result.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; "),
    );
  }
}
