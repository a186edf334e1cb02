/**
 * Debug logging for pipeline runs
 *
 * Appends timestamped lines to a debug log file (opt-in) and echoes them to
 * the console. Configured through environment variables:
 * - PA_DEBUG_LOG_FILE=true   enable the file sink
 * - PA_DEBUG_LOG_PATH        file location (default ./debug-pipeline.log)
 *
 * @module debug
 */

import * as fs from "node:fs";
import * as path from "node:path";

const DEBUG_LOG_MAX_DATA_CHARS = 8000;

function logPath(): string {
  return process.env.PA_DEBUG_LOG_PATH || path.join(process.cwd(), "debug-pipeline.log");
}

function fileSinkEnabled(): boolean {
  return (process.env.PA_DEBUG_LOG_FILE ?? "false").toLowerCase() === "true";
}

let fileSinkFailed = false;

/**
 * Format one debug line. Exposed for unit tests.
 */
export function formatDebugLine(message: string, data: unknown, timestamp: string): string {
  let logLine = `[${timestamp}] ${message}`;

  if (data !== undefined) {
    let payload: string;
    try {
      payload = typeof data === "string" ? data : JSON.stringify(data);
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
 * Log a message to the debug file (when enabled) and the console.
 */
export function debugLog(message: string, data?: unknown): void {
  const logLine = formatDebugLine(message, data, new Date().toISOString());

  if (fileSinkEnabled() && !fileSinkFailed) {
    fs.promises.appendFile(logPath(), logLine + "\n").catch((err: unknown) => {
      // Report once, then keep logging to the console only
      fileSinkFailed = true;
      console.warn(`[Debug] Disabling debug log file sink: ${err instanceof Error ? err.message : String(err)}`);
    });
  }

  console.log(logLine);
}
