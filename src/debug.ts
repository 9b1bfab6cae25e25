/**
 * Debug Logging
 *
 * The editor owns the terminal while it runs, so diagnostics go to a
 * debug.log file in the working directory instead of stdout/stderr.
 */

import * as fs from 'fs';
import * as path from 'path';

let debugEnabled = false;
let logPath = path.join(process.cwd(), 'debug.log');

/**
 * Turn debug logging on or off
 */
export function setDebugEnabled(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

/**
 * Redirect the log file (tests point this at a temp directory)
 */
export function setDebugLogPath(filePath: string): void {
  logPath = filePath;
}

/**
 * Append a timestamped line to the debug log
 */
export function debugLog(message: string): void {
  if (!debugEnabled) return;
  try {
    fs.appendFileSync(logPath, `[${new Date().toISOString()}] ${message}\n`);
  } catch {
    // Unwritable log file: stop trying
    debugEnabled = false;
  }
}
