/**
 * Debug Module - Log History
 *
 * @module debug/history
 */

import type { LogEntry, LogHistoryFilter } from './types.js';
import { logHistory, clearHistory } from './state.js';

/**
 * Get log history for debugging.
 */
export function getLogHistory(filter: LogHistoryFilter = {}): LogEntry[] {
  let history = [...logHistory];

  if (filter.level) {
    const level = filter.level.toUpperCase();
    history = history.filter((h) => h.level === level);
  }

  if (filter.module) {
    const moduleLower = filter.module.toLowerCase();
    history = history.filter((h) => h.module.toLowerCase().includes(moduleLower));
  }

  if (filter.last) {
    history = history.slice(-filter.last);
  }

  return history;
}

/**
 * Clear log history.
 */
export function clearLogHistory(): void {
  clearHistory();
}
