/**
 * Hearth Directory Structure
 *
 * Central definition of all paths under ~/.hearth/.
 * Every module imports from here; nothing else calls homedir().
 *
 * Structure:
 *   ~/.hearth/
 *   ├── hearth.toml       # Main configuration file
 *   └── logs/
 *       └── hearth.log    # Log file
 *
 * Set HEARTH_HOME to relocate the whole tree (containers, tests).
 */

import { join } from "node:path";
import { homedir } from "node:os";

// ─── Root ────────────────────────────────────────────────────────

export const HEARTH_HOME = process.env.HEARTH_HOME || join(homedir(), ".hearth");

// ─── Top-level directories ───────────────────────────────────────

export const LOGS_DIR = join(HEARTH_HOME, "logs");

// ─── Files ───────────────────────────────────────────────────────

export const CONFIG_FILE = join(HEARTH_HOME, "hearth.toml");
export const LOG_FILE = join(LOGS_DIR, "hearth.log");
