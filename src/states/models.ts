/**
 * Typed state models.
 *
 * Each model is a zod schema over a StateRecord plus the domain it
 * belongs to. Parsing narrows `value` and the well-known attributes of
 * that domain; unknown attributes pass through untouched.
 */

import { z } from "zod";
import type { StateRecord } from "../types/index.js";

export interface StateModel<S> {
  readonly name: string;
  /** `null` accepts any domain. */
  readonly domain: string | null;
  readonly schema: z.ZodType<S, z.ZodTypeDef, unknown>;
}

export function defineStateModel<S>(
  name: string,
  domain: string | null,
  schema: z.ZodType<S, z.ZodTypeDef, unknown>,
): StateModel<S> {
  return Object.freeze({ name, domain, schema });
}

const recordFields = {
  entityId: z.string(),
  domain: z.string(),
  lastChanged: z.date().nullable(),
  lastUpdated: z.date().nullable(),
};

const Attributes = z.record(z.unknown());

/** "unavailable"/"unknown" are reported by the hub for every domain. */
const OnOff = z.enum(["on", "off", "unavailable", "unknown"]);

const commonAttributes = {
  friendly_name: z.string().optional(),
  icon: z.string().optional(),
};

// ─── Base ──────────────────────────────────────────────────────

const BaseStateSchema = z.object({
  ...recordFields,
  value: z.union([z.string(), z.number(), z.boolean(), z.null()]),
  attributes: Attributes,
});
export type BaseState = z.infer<typeof BaseStateSchema>;
export const BaseState = defineStateModel("BaseState", null, BaseStateSchema);

// ─── Light ─────────────────────────────────────────────────────

const LightStateSchema = z.object({
  ...recordFields,
  value: OnOff,
  attributes: z
    .object({
      ...commonAttributes,
      brightness: z.number().int().min(0).max(255).nullable().optional(),
      color_mode: z.string().nullable().optional(),
      color_temp_kelvin: z.number().nullable().optional(),
      rgb_color: z.tuple([z.number(), z.number(), z.number()]).nullable().optional(),
      supported_color_modes: z.array(z.string()).optional(),
    })
    .passthrough(),
});
export type LightState = z.infer<typeof LightStateSchema>;
export const LightState = defineStateModel("LightState", "light", LightStateSchema);

// ─── Switch ────────────────────────────────────────────────────

const SwitchStateSchema = z.object({
  ...recordFields,
  value: OnOff,
  attributes: z.object(commonAttributes).passthrough(),
});
export type SwitchState = z.infer<typeof SwitchStateSchema>;
export const SwitchState = defineStateModel("SwitchState", "switch", SwitchStateSchema);

// ─── Binary sensor ─────────────────────────────────────────────

const BinarySensorStateSchema = z.object({
  ...recordFields,
  value: OnOff,
  attributes: z
    .object({ ...commonAttributes, device_class: z.string().optional() })
    .passthrough(),
});
export type BinarySensorState = z.infer<typeof BinarySensorStateSchema>;
export const BinarySensorState = defineStateModel(
  "BinarySensorState",
  "binary_sensor",
  BinarySensorStateSchema,
);

// ─── Sensor ────────────────────────────────────────────────────

/** Numeric readings arrive as strings; they are parsed when they look like numbers. */
const SensorValue = z.union([z.string(), z.number(), z.null()]).transform((v) => {
  if (typeof v !== "string" || v.trim() === "") return v;
  const n = Number(v);
  return Number.isNaN(n) ? v : n;
});

const SensorStateSchema = z.object({
  ...recordFields,
  value: SensorValue,
  attributes: z
    .object({
      ...commonAttributes,
      unit_of_measurement: z.string().optional(),
      device_class: z.string().optional(),
      state_class: z.string().optional(),
    })
    .passthrough(),
});
export type SensorState = z.infer<typeof SensorStateSchema>;
export const SensorState = defineStateModel("SensorState", "sensor", SensorStateSchema);

// ─── Input boolean ─────────────────────────────────────────────

const InputBooleanStateSchema = z.object({
  ...recordFields,
  value: z
    .union([z.enum(["on", "off"]), z.boolean()])
    .transform((v) => (typeof v === "boolean" ? v : v === "on")),
  attributes: z.object({ ...commonAttributes, editable: z.boolean().optional() }).passthrough(),
});
export type InputBooleanState = z.infer<typeof InputBooleanStateSchema>;
export const InputBooleanState = defineStateModel(
  "InputBooleanState",
  "input_boolean",
  InputBooleanStateSchema,
);

export const BUILTIN_STATE_MODELS = [
  LightState,
  SwitchState,
  BinarySensorState,
  SensorState,
  InputBooleanState,
] as const;

/** Shallow copy of a record, so parsing never aliases the event's attributes. */
export function toModelInput(record: StateRecord): Record<string, unknown> {
  return { ...record, attributes: { ...record.attributes } };
}
