/**
 * Hearth Config Schema
 *
 * One Zod schema with a version number. On load, an older file goes
 * through a single linear migrate() pass before validation.
 */

import { z } from "zod";

export const CURRENT_CONFIG_VERSION = 1;

const LogConfigSchema = z.object({
  level: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  pretty: z.boolean().default(true),
  file: z.string().optional(),
});

const BusConfigSchema = z.object({
  /** Exact domain names or globs such as `sensor*`. */
  excludedDomains: z.array(z.string()).default([]),
  /** Exact entity ids or globs such as `sensor.*_rssi`. */
  excludedEntities: z.array(z.string()).default([]),
  logAllEvents: z.boolean().default(false),
  recentEventsSize: z.number().int().nonnegative().default(100),
});

const SchedulerConfigSchema = z
  .object({
    minDelaySeconds: z.number().positive().default(1),
    maxDelaySeconds: z.number().positive().default(30),
    defaultDelaySeconds: z.number().positive().default(15),
    historySize: z.number().int().nonnegative().default(20),
    behindScheduleWarnSeconds: z.number().nonnegative().default(1),
  })
  .refine((s) => s.minDelaySeconds <= s.maxDelaySeconds, {
    message: "minDelaySeconds must not exceed maxDelaySeconds",
    path: ["minDelaySeconds"],
  });

const TasksConfigSchema = z.object({
  cancellationTimeoutSeconds: z.number().positive().default(5),
});

/**
 * Detect the system's IANA timezone.
 * Falls back to "UTC" if detection fails (e.g. on some minimal containers).
 */
function detectSystemTimezone(): string {
  try {
    return Intl.DateTimeFormat().resolvedOptions().timeZone;
  } catch {
    return "UTC";
  }
}

export const HearthConfigSchema = z.object({
  version: z.number().int().default(CURRENT_CONFIG_VERSION),
  timezone: z.string().default(detectSystemTimezone()),
  logging: LogConfigSchema.default({}),
  bus: BusConfigSchema.default({}),
  scheduler: SchedulerConfigSchema.default({}),
  tasks: TasksConfigSchema.default({}),
});

export type ParsedConfig = z.infer<typeof HearthConfigSchema>;
