/**
 * Hearth Logger
 *
 * Structured logging via pino. Every module gets a child logger
 * with its own name for easy filtering in production.
 *
 * Logs go to:
 *   - stdout (pretty-printed if configured)
 *   - ~/.hearth/logs/hearth.log (JSON, always)
 *
 * Log rotation: on startup, if log file exceeds 10MB, it's rotated
 * to hearth.log.1 (keeping only 1 backup).
 *
 * A "silent" level installs a bare logger with no transports, so
 * nothing touches the filesystem.
 */

import pino from "pino";
import { existsSync, mkdirSync, statSync, renameSync, unlinkSync } from "node:fs";
import { dirname } from "node:path";
import type { LogConfig } from "../types/index.js";
import { LOG_FILE } from "../paths.js";

let rootLogger: pino.Logger | null = null;

const MAX_LOG_SIZE = 10 * 1024 * 1024; // 10MB

const PRETTY_OPTIONS = {
  colorize: true,
  singleLine: true,
  translateTime: "SYS:HH:MM:ss",
  ignore: "pid,hostname,module",
  messageFormat: "[{module}] {msg}",
};

function ensureLogDir(file: string): void {
  const logDir = dirname(file);
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }
}

/**
 * Rotate log file if it exceeds MAX_LOG_SIZE.
 * Keeps only 1 backup (hearth.log.1).
 */
function rotateLogIfNeeded(file: string): void {
  const backup = `${file}.1`;
  try {
    if (!existsSync(file)) return;

    const stats = statSync(file);
    if (stats.size < MAX_LOG_SIZE) return;

    if (existsSync(backup)) {
      unlinkSync(backup);
    }
    renameSync(file, backup);
  } catch (err) {
    // Rotation is best effort, the file target still appends
    process.stderr.write(`hearth: log rotation failed: ${String(err)}\n`);
  }
}

export function initLogger(config: LogConfig): pino.Logger {
  if (config.level === "silent") {
    rootLogger = pino({ level: "silent" });
    return rootLogger;
  }

  const file = config.file || LOG_FILE;
  ensureLogDir(file);
  rotateLogIfNeeded(file);

  // Multi-transport: JSON file + pretty or raw stdout
  rootLogger = pino({
    level: config.level,
    transport: {
      targets: [
        {
          target: "pino/file",
          level: config.level,
          options: { destination: file, mkdir: true },
        },
        config.pretty
          ? { target: "pino-pretty", level: config.level, options: PRETTY_OPTIONS }
          : { target: "pino/file", level: config.level, options: { destination: 1 } }, // fd 1 = stdout
      ],
    },
  });

  return rootLogger;
}

export function getLogger(name: string): pino.Logger {
  if (!rootLogger) {
    // Fallback if called before init (e.g., during import-time)
    rootLogger = initLogger({ level: "info", pretty: true });
  }
  return rootLogger.child({ module: name });
}

export { LOG_FILE };
