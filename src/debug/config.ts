/**
 * Debug Module - Configuration and State Management
 *
 * Manages the log level, module filters and the in-memory log history.
 *
 * @module debug/config
 */

import type { DebugConfigSchema } from '../config/schema/debug.schema.js';

// ============================================================================
// Types and Constants
// ============================================================================

/**
 * Log level values (higher = less verbose)
 */
export const LOG_LEVELS = {
  DEBUG: 0,
  VERBOSE: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  SILENT: 5,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;
export type LogLevelValue = (typeof LOG_LEVELS)[LogLevel];

/**
 * Log entry for history
 */
export interface LogEntry {
  time: number;
  perfTime: number;
  level: string;
  module: string;
  message: string;
  data?: unknown;
}

// ============================================================================
// Global State
// ============================================================================

export let currentLogLevel: LogLevelValue = LOG_LEVELS.INFO;
export const enabledModules = new Set<string>();
export const disabledModules = new Set<string>();
export const logHistory: LogEntry[] = [];

// ============================================================================
// Configuration Functions
// ============================================================================

const LEVEL_BY_NAME: Record<string, LogLevelValue> = {
  debug: LOG_LEVELS.DEBUG,
  verbose: LOG_LEVELS.VERBOSE,
  info: LOG_LEVELS.INFO,
  warn: LOG_LEVELS.WARN,
  error: LOG_LEVELS.ERROR,
  silent: LOG_LEVELS.SILENT,
};

/**
 * Set the global log level. Unknown names fall back to 'info'.
 */
export function setLogLevel(level: string): void {
  currentLogLevel = LEVEL_BY_NAME[level.toLowerCase()] ?? LOG_LEVELS.INFO;
}

/**
 * Get current log level name.
 */
export function getLogLevel(): string {
  for (const [name, value] of Object.entries(LOG_LEVELS)) {
    if (value === currentLogLevel) return name.toLowerCase();
  }
  return 'info';
}

/**
 * Enable logging for specific modules only.
 */
export function enableModules(...modules: string[]): void {
  enabledModules.clear();
  for (const m of modules) {
    enabledModules.add(m.toLowerCase());
  }
}

/**
 * Disable logging for specific modules.
 */
export function disableModules(...modules: string[]): void {
  for (const m of modules) {
    disabledModules.add(m.toLowerCase());
  }
}

/**
 * Reset module filters.
 */
export function resetModuleFilters(): void {
  enabledModules.clear();
  disabledModules.clear();
}

/**
 * Apply the configured default log level.
 */
export function applyDebugConfig(config: DebugConfigSchema): void {
  const desired = config.logLevel.defaultLogLevel;
  if (desired && desired !== getLogLevel()) {
    setLogLevel(desired);
  }
}
