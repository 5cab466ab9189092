/**
 * Find the first stack frame outside this library, so listeners and jobs
 * can say where they were registered.
 */

import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

const LIB_ROOT = resolve(dirname(fileURLToPath(import.meta.url)), "..");

const FRAME = /\(?((?:file:\/\/)?[^()\s]+?):(\d+):(\d+)\)?$/;

export function captureSourceLocation(): string | undefined {
  const frames = new Error().stack?.split("\n").slice(1) ?? [];
  for (const frame of frames) {
    const m = FRAME.exec(frame.trim());
    if (!m) continue;
    const file = m[1].startsWith("file://") ? fileURLToPath(m[1]) : m[1];
    if (file.startsWith("node:") || file.startsWith(LIB_ROOT) || file.includes("node_modules")) {
      continue;
    }
    return `${file}:${m[2]}`;
  }
  return undefined;
}
