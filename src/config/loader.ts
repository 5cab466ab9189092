/**
 * Hearth Config Loader
 *
 * Loads TOML config, applies env var substitution and version migration,
 * then validates with Zod. A missing file yields the defaults.
 */

import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import { parse as parseTOML } from "smol-toml";
import { HearthConfigSchema, CURRENT_CONFIG_VERSION } from "./schema.js";
import type { HearthConfig } from "../types/index.js";
import { ConfigValidationError, ConfigurationError } from "../errors.js";
import { getLogger } from "../utils/logger.js";
import { CONFIG_FILE } from "../paths.js";

const log = getLogger("config");

let currentConfig: HearthConfig | null = null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Substitute ${ENV_VAR} and ${ENV_VAR:-default} in strings.
 */
export function substituteEnvVars(obj: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof obj === "string") {
    return obj.replace(
      /\$\{(\w+)(?::-(.*?))?\}/g,
      (_match, varName: string, defaultVal: string | undefined) => {
        const value = env[varName];
        if (value !== undefined) return value;
        if (defaultVal !== undefined) return defaultVal;
        log.warn(`Environment variable ${varName} not set and no default provided`);
        return "";
      },
    );
  }
  if (Array.isArray(obj)) {
    return obj.map((v) => substituteEnvVars(v, env));
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVars(value, env);
    }
    return result;
  }
  return obj;
}

/**
 * Migrate config from older versions to current.
 */
export function migrateConfig(raw: Record<string, unknown>): Record<string, unknown> {
  const version = typeof raw.version === "number" ? raw.version : 0;

  if (version >= CURRENT_CONFIG_VERSION) {
    return raw;
  }

  log.info(`Migrating config from version ${version} to ${CURRENT_CONFIG_VERSION}`);
  const migrated = { ...raw };

  // Version 0 -> 1: `excludedDomains` / `excludedEntities` lived at the top level
  if (version < 1) {
    const bus: Record<string, unknown> = isRecord(migrated.bus) ? { ...migrated.bus } : {};
    if (migrated.excludedDomains !== undefined) {
      bus.excludedDomains ??= migrated.excludedDomains;
      delete migrated.excludedDomains;
    }
    if (migrated.excludedEntities !== undefined) {
      bus.excludedEntities ??= migrated.excludedEntities;
      delete migrated.excludedEntities;
    }
    migrated.bus = bus;
    migrated.version = 1;
  }

  return migrated;
}

/** Validate an already-parsed config object. */
export function parseConfig(raw: unknown): HearthConfig {
  const input = isRecord(raw) ? migrateConfig(raw) : raw;
  const result = HearthConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((i) => `  ${i.path.join(".")}: ${i.message}`),
    );
  }
  return result.data;
}

/**
 * Load and validate config from a TOML file, by default ~/.hearth/hearth.toml.
 */
export function loadConfig(filePath: string = CONFIG_FILE): HearthConfig {
  const absPath = resolve(filePath);

  if (!existsSync(absPath)) {
    log.info(`Config file not found at ${absPath}, using defaults`);
    currentConfig = HearthConfigSchema.parse({});
    return currentConfig;
  }

  log.info(`Loading config from ${absPath}`);
  const raw = readFileSync(absPath, "utf-8");

  let parsed: unknown;
  try {
    parsed = parseTOML(raw);
  } catch (err) {
    throw new ConfigurationError(`Failed to parse TOML config at ${absPath}: ${String(err)}`);
  }

  currentConfig = parseConfig(substituteEnvVars(parsed));
  log.info("Config loaded and validated successfully");
  return currentConfig;
}

/**
 * Get the current config. Throws if not loaded.
 */
export function getConfig(): HearthConfig {
  if (!currentConfig) {
    throw new ConfigurationError("Config not loaded. Call loadConfig() first.");
  }
  return currentConfig;
}

/**
 * Generate a default config TOML string.
 */
export function generateDefaultConfig(): string {
  const detectedTz = Intl.DateTimeFormat().resolvedOptions().timeZone;
  return `# Hearth Configuration
# Location: ~/.hearth/hearth.toml

version = ${CURRENT_CONFIG_VERSION}
timezone = "${detectedTz}"  # Auto-detected from system

# ─── Logging ────────────────────────────────────────────
[logging]
level = "info"
pretty = true

# ─── Event bus ──────────────────────────────────────────
[bus]
excludedDomains = []   # e.g. ["sun", "sensor*"]
excludedEntities = []  # e.g. ["sensor.*_rssi"]
logAllEvents = false
recentEventsSize = 100

# ─── Scheduler ──────────────────────────────────────────
[scheduler]
minDelaySeconds = 1
maxDelaySeconds = 30
defaultDelaySeconds = 15
historySize = 20
behindScheduleWarnSeconds = 1

# ─── Tasks ──────────────────────────────────────────────
[tasks]
cancellationTimeoutSeconds = 5
`;
}
