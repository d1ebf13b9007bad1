/**
 * Debug logging. The UI owns stdout, so everything goes to a file.
 * Enable with KCASCADE_DEBUG=1 (or --debug).
 */
import { appendFileSync, mkdirSync } from "node:fs";
import { dirname, join } from "node:path";
import { homedir } from "node:os";

export const DEBUG_LOG_PATH = join(homedir(), ".kcascade", "debug.log");

let enabled = process.env.KCASCADE_DEBUG === "1";
let dirReady = false;

export function setDebugLogging(on: boolean): void {
  enabled = on;
}

export function debugLog(msg: string): void {
  if (!enabled) return;
  try {
    if (!dirReady) {
      mkdirSync(dirname(DEBUG_LOG_PATH), { recursive: true });
      dirReady = true;
    }
    appendFileSync(DEBUG_LOG_PATH, `[${new Date().toISOString()}] ${msg}\n`);
  } catch {
    // a broken log file must not take the UI down
  }
}
