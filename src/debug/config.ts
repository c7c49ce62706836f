/**
 * Debug Module - Configuration
 *
 * Manages log levels, trace categories, and module filters.
 *
 * @module debug/config
 */

import type { DebugConfigSchema } from '../config/schema/debug.schema.js';
import { LOG_LEVELS, TRACE_CATEGORIES, type LogLevelValue, type TraceCategory } from './types.js';
import {
  currentLogLevel,
  enabledTraceCategories,
  setCurrentLogLevel,
  setEnabledModules,
  setDisabledModules,
  disabledModules,
} from './state.js';

const LEVEL_MAP: Record<string, LogLevelValue> = {
  debug: LOG_LEVELS.DEBUG,
  verbose: LOG_LEVELS.VERBOSE,
  info: LOG_LEVELS.INFO,
  warn: LOG_LEVELS.WARN,
  error: LOG_LEVELS.ERROR,
  silent: LOG_LEVELS.SILENT,
};

function isTraceCategory(value: string): value is TraceCategory {
  return TRACE_CATEGORIES.some((category) => category === value);
}

/**
 * Set the global log level. Unknown names fall back to info.
 */
export function setLogLevel(level: string): void {
  setCurrentLogLevel(LEVEL_MAP[level.toLowerCase()] ?? LOG_LEVELS.INFO);
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
 * Set trace categories.
 *
 * @param categories - Comma-separated categories, 'all', false to disable, or array
 *   Examples:
 *   - 'embed,cache' - enable embed and cache
 *   - 'all' - enable all categories
 *   - 'all,-assembly' - all except assembly
 *   - false - disable all tracing
 */
export function setTrace(categories: string | TraceCategory[] | false): void {
  enabledTraceCategories.clear();
  if (categories === false) {
    return;
  }

  const catArray: string[] = typeof categories === 'string'
    ? categories.split(',').map((s) => s.trim())
    : categories;

  if (catArray.includes('all')) {
    for (const cat of TRACE_CATEGORIES) {
      enabledTraceCategories.add(cat);
    }
  }

  // Add inclusions and handle exclusions (prefixed with -)
  for (const cat of catArray) {
    if (cat === 'all') continue;

    if (cat.startsWith('-')) {
      const exclude = cat.slice(1);
      if (isTraceCategory(exclude)) {
        enabledTraceCategories.delete(exclude);
      }
    } else if (isTraceCategory(cat)) {
      enabledTraceCategories.add(cat);
    }
  }
}

/**
 * Get enabled trace categories.
 */
export function getTrace(): TraceCategory[] {
  return [...enabledTraceCategories];
}

/**
 * Enable logging for specific modules only.
 */
export function enableModules(...modules: string[]): void {
  setEnabledModules(new Set(modules.map((m) => m.toLowerCase())));
}

/**
 * Disable logging for specific modules.
 */
export function disableModules(...modules: string[]): void {
  const next = new Set(disabledModules);
  for (const m of modules) {
    next.add(m.toLowerCase());
  }
  setDisabledModules(next);
}

/**
 * Reset module filters.
 */
export function resetModuleFilters(): void {
  setEnabledModules(new Set());
  setDisabledModules(new Set());
}

/**
 * Apply debug config defaults (log level and trace categories).
 */
export function applyDebugConfig(config: DebugConfigSchema): void {
  setLogLevel(config.logLevel.defaultLogLevel);

  if (config.trace.enabled) {
    const categories = config.trace.categories.length
      ? config.trace.categories.join(',')
      : 'all';
    setTrace(categories);
  } else if (getTrace().length > 0) {
    setTrace(false);
  }
}
