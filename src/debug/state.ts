/**
 * Debug Module Global State
 *
 * @module debug/state
 */

import { LOG_LEVELS, type LogLevelValue, type TraceCategory, type LogEntry } from './types.js';

export let currentLogLevel: LogLevelValue = LOG_LEVELS.INFO;
export let enabledModules = new Set<string>();
export let disabledModules = new Set<string>();
export let logHistory: LogEntry[] = [];
export const enabledTraceCategories = new Set<TraceCategory>();

// Helpers to update state (needed since we can't export setters for 'let' variables easily across modules)
export function setCurrentLogLevel(level: LogLevelValue): void {
  currentLogLevel = level;
}

export function setEnabledModules(modules: Set<string>): void {
  enabledModules = modules;
}

export function setDisabledModules(modules: Set<string>): void {
  disabledModules = modules;
}

export function clearHistory(): void {
  logHistory = [];
}

export function pushHistory(entry: LogEntry, maxEntries: number): void {
  logHistory.push(entry);
  while (logHistory.length > maxEntries) {
    logHistory.shift();
  }
}
