/**
 * Debug logging utilities for the fallacy analyzer
 *
 * Console logging plus an optional append-only log file, configured via
 * environment variables:
 * - FL_DEBUG_LOG_FILE=true enables the file
 * - FL_DEBUG_LOG_PATH overrides its location (default: ./debug-analyzer.log)
 *
 * @module analyzer/debug
 */

import * as fs from "fs";
import * as path from "path";

// ============================================================================
// CONFIGURATION
// ============================================================================

const DEBUG_LOG_PATH =
  process.env.FL_DEBUG_LOG_PATH || path.join(process.cwd(), "debug-analyzer.log");

const DEBUG_LOG_FILE_ENABLED =
  (process.env.FL_DEBUG_LOG_FILE ?? "false").toLowerCase() === "true";

export const DEBUG_LOG_MAX_DATA_CHARS = 8000;

// ============================================================================
// DEBUG LOGGING FUNCTIONS
// ============================================================================

export function formatLogLine(message: string, data?: unknown, now: Date = new Date()): string {
  let logLine = `[${now.toISOString()}] ${message}`;

  if (data !== undefined) {
    let payload: string;
    try {
      payload = typeof data === "string" ? data : JSON.stringify(data, null, 2);
    } catch {
      payload = "[unserializable]";
    }
    if (payload.length > DEBUG_LOG_MAX_DATA_CHARS) {
      payload = payload.slice(0, DEBUG_LOG_MAX_DATA_CHARS) + "…[truncated]";
    }
    logLine += ` | ${payload}`;
  }
  return logLine;
}

/**
 * Log a message to the console and, when enabled, the debug file
 */
export function debugLog(message: string, data?: unknown): void {
  const logLine = formatLogLine(message, data);

  // Async append so long analyses never block on disk
  if (DEBUG_LOG_FILE_ENABLED) {
    fs.promises.appendFile(DEBUG_LOG_PATH, logLine + "\n").catch((err: unknown) => {
      console.warn(`[Debug] Could not write ${DEBUG_LOG_PATH}:`, err);
    });
  }

  console.log(logLine);
}
