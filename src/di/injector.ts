/**
 * Parameter injection.
 *
 * At registration, a handler's `params` record is compiled into an
 * immutable binding plan. Each parameter resolves by, in order:
 *
 *   1. a custom dependency (Depends)
 *   2. a built-in dependency (D.*)
 *   3. a bare type token whose name is supplied in the listener's kwargs
 *
 * Anything else is rejected right there with a DependencyInjectionError,
 * so a miswired handler never gets as far as its first event.
 *
 * At invocation the injector executes the plan. Failures surface as
 * DependencyError subclasses, which the bus counts as DI failures.
 */

import type { Event } from "../types/index.js";
import { isMissing } from "../types/index.js";
import {
  DependencyError,
  DependencyInjectionError,
  DependencyResolutionError,
} from "../errors.js";
import { isTypeToken } from "../conversion/type-tokens.js";
import type { TypeToken } from "../conversion/type-tokens.js";
import { DEPENDENCY, isDependency } from "./markers.js";
import type { Dependency, ResolveContext } from "./markers.js";

export type ParamSpec = Record<string, Dependency<unknown> | TypeToken<unknown>>;

export type Resolved<P> =
  P extends Dependency<infer V> ? V : P extends TypeToken<infer V> ? V : never;

export type ResolvedParams<P extends ParamSpec> = { [K in keyof P]: Resolved<P[K]> };

export type BindingSource = "custom" | "builtin" | "kwarg";

export interface Binding {
  readonly name: string;
  readonly source: BindingSource;
  readonly label: string;
  readonly optional: boolean;
  resolve(event: Event, ctx: ResolveContext): unknown;
}

export type BindingPlan = readonly Binding[];

/** Compile `params` into a plan. Throws DependencyInjectionError on the first bad parameter. */
export function buildBindingPlan(
  handlerName: string,
  params: Record<string, unknown>,
  kwargs: Readonly<Record<string, unknown>> = {},
): BindingPlan {
  const plan: Binding[] = [];

  for (const [name, spec] of Object.entries(params)) {
    if (isDependency(spec)) {
      plan.push(
        Object.freeze({
          name,
          source: spec[DEPENDENCY],
          label: spec.label,
          optional: spec.optional,
          resolve: (event: Event, ctx: ResolveContext): unknown => spec.resolve(event, ctx),
        }),
      );
      continue;
    }

    if (isTypeToken(spec)) {
      if (!(name in kwargs)) {
        throw new DependencyInjectionError(
          handlerName,
          name,
          `no extractor for type ${spec.name}; use Depends(...), a D.* marker, or pass it in kwargs`,
        );
      }
      const value = kwargs[name];
      if (!spec.is(value)) {
        throw new DependencyInjectionError(
          handlerName,
          name,
          `kwargs value does not satisfy type ${spec.name}`,
        );
      }
      plan.push(
        Object.freeze({
          name,
          source: "kwarg" as const,
          label: `kwargs.${name}: ${spec.name}`,
          optional: false,
          resolve: (): unknown => value,
        }),
      );
      continue;
    }

    throw new DependencyInjectionError(
      handlerName,
      name,
      "expected a Dependency (Depends/D.*) or a type token",
    );
  }

  return Object.freeze(plan);
}

export class ParameterInjector {
  constructor(
    readonly handlerName: string,
    readonly plan: BindingPlan,
  ) {}

  /** Resolve every binding. Never mutates the event. */
  resolve(event: Event, ctx: ResolveContext): Record<string, unknown> {
    const args: Record<string, unknown> = {};
    for (const binding of this.plan) {
      let raw: unknown;
      try {
        raw = binding.resolve(event, ctx);
      } catch (err) {
        if (err instanceof DependencyError) throw err;
        throw new DependencyResolutionError(
          `Handler '${this.handlerName}' parameter '${binding.name}': ${binding.label} failed`,
          { cause: err },
        );
      }
      args[binding.name] = this.present(binding, raw);
    }
    return args;
  }

  describe(): Array<{ name: string; source: BindingSource; label: string }> {
    return this.plan.map(({ name, source, label }) => ({ name, source, label }));
  }

  private present(binding: Binding, raw: unknown): unknown {
    if (!isMissing(raw)) return raw;
    if (binding.optional) return null;
    throw new DependencyResolutionError(
      `Handler '${this.handlerName}' parameter '${binding.name}': ${binding.label} has no value for this event`,
    );
  }
}
