/**
 * Config Tests
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { parse as parseTOML } from "smol-toml";
import {
  generateDefaultConfig,
  getConfig,
  loadConfig,
  migrateConfig,
  parseConfig,
  substituteEnvVars,
} from "../../src/config/loader.js";
import { ConfigValidationError, ConfigurationError } from "../../src/errors.js";

let dir: string;

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), "hearth-config-"));
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("parseConfig", () => {
  it("fills every section with defaults", () => {
    const config = parseConfig({ timezone: "Europe/Amsterdam" });
    expect(config.version).toBe(1);
    expect(config.timezone).toBe("Europe/Amsterdam");
    expect(config.bus).toEqual({
      excludedDomains: [],
      excludedEntities: [],
      logAllEvents: false,
      recentEventsSize: 100,
    });
    expect(config.scheduler).toEqual({
      minDelaySeconds: 1,
      maxDelaySeconds: 30,
      defaultDelaySeconds: 15,
      historySize: 20,
      behindScheduleWarnSeconds: 1,
    });
    expect(config.tasks.cancellationTimeoutSeconds).toBe(5);
    expect(config.logging).toEqual({ level: "info", pretty: true });
  });

  it("reports every invalid field by path", () => {
    expect.assertions(3);
    try {
      parseConfig({ scheduler: { minDelaySeconds: 40 }, bus: { recentEventsSize: -1 } });
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigValidationError);
      if (err instanceof ConfigValidationError) {
        expect(err.issues).toContain(
          "  scheduler.minDelaySeconds: minDelaySeconds must not exceed maxDelaySeconds",
        );
        expect(err.issues.some((i) => i.startsWith("  bus.recentEventsSize:"))).toBe(true);
      }
    }
  });

  it("rejects unknown log levels", () => {
    expect(() => parseConfig({ logging: { level: "loud" } })).toThrow(ConfigValidationError);
  });
});

describe("migrateConfig", () => {
  it("moves top-level exclusions under bus", () => {
    expect(migrateConfig({ excludedDomains: ["sun"], excludedEntities: ["sensor.*_rssi"] })).toEqual({
      version: 1,
      bus: { excludedDomains: ["sun"], excludedEntities: ["sensor.*_rssi"] },
    });
  });

  it("keeps explicit bus settings over legacy ones", () => {
    expect(migrateConfig({ excludedDomains: ["sun"], bus: { excludedDomains: ["zone"] } })).toEqual({
      version: 1,
      bus: { excludedDomains: ["zone"] },
    });
  });

  it("leaves current configs alone", () => {
    const raw = { version: 1, bus: {} };
    expect(migrateConfig(raw)).toBe(raw);
  });
});

describe("substituteEnvVars", () => {
  const env = { HUB_TOKEN: "test-token" };

  it("replaces variables in nested strings", () => {
    expect(
      substituteEnvVars({ hub: { token: "${HUB_TOKEN}", urls: ["ws://${HUB_HOST:-localhost}/api"] } }, env),
    ).toEqual({ hub: { token: "test-token", urls: ["ws://localhost/api"] } });
  });

  it("uses an empty string for unset variables without a default", () => {
    expect(substituteEnvVars("token=${NOT_SET_ANYWHERE}", env)).toBe("token=");
    expect(substituteEnvVars(42, env)).toBe(42);
  });
});

describe("loadConfig", () => {
  it("falls back to defaults when the file is absent", () => {
    const config = loadConfig(join(dir, "missing.toml"));
    expect(config.bus.recentEventsSize).toBe(100);
    expect(getConfig()).toBe(config);
  });

  it("reads, migrates and validates a TOML file", () => {
    const file = join(dir, "legacy.toml");
    writeFileSync(
      file,
      ['excludedDomains = ["sun"]', "", "[scheduler]", "maxDelaySeconds = 10", ""].join("\n"),
    );
    const config = loadConfig(file);
    expect(config.version).toBe(1);
    expect(config.bus.excludedDomains).toEqual(["sun"]);
    expect(config.scheduler.maxDelaySeconds).toBe(10);
  });

  it("wraps TOML syntax errors", () => {
    const file = join(dir, "broken.toml");
    writeFileSync(file, "[scheduler\nmaxDelaySeconds = 10\n");
    expect(() => loadConfig(file)).toThrow(ConfigurationError);
    expect(() => loadConfig(file)).toThrow(`Failed to parse TOML config at ${file}`);
  });
});

describe("generateDefaultConfig", () => {
  it("produces a file that parses to the defaults", () => {
    const config = parseConfig(parseTOML(generateDefaultConfig()));
    const defaults = parseConfig({});
    expect(config.bus).toEqual(defaults.bus);
    expect(config.scheduler).toEqual(defaults.scheduler);
    expect(config.tasks).toEqual(defaults.tasks);
    expect(config.logging).toEqual(defaults.logging);
  });
});
