/**
 * Logger Utility
 * Debug logging with global debug flag control.
 * Goes to stderr: stdout carries the generated HTML.
 */

let debugMode = false;

/**
 * Set the global debug mode
 */
export function setDebugMode(enabled: boolean): void {
  debugMode = enabled;
}

/**
 * Log a debug message (only shown when debug mode is enabled)
 */
export function debug(...args: unknown[]): void {
  if (debugMode) {
    console.error(...args);
  }
}

export interface Logger {
  debug: (...args: unknown[]) => void;
}

/**
 * Create a scoped logger with a prefix
 */
export function createLogger(prefix: string): Logger {
  return {
    debug: (...args: unknown[]) => debug(`[${prefix}]`, ...args),
  };
}
