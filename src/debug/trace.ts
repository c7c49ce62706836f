/**
 * Trace Logging Interface
 *
 * Category-based tracing for prompt assembly internals.
 *
 * @module debug/trace
 */

import type { TraceCategory } from './types.js';
import { enabledTraceCategories } from './state.js';
import { storeLog } from './logger.js';

/**
 * Check if a trace category is enabled.
 */
export function isTraceEnabled(category: TraceCategory): boolean {
  return enabledTraceCategories.has(category);
}

function formatTraceMessage(category: TraceCategory, message: string): string {
  const timestamp = performance.now().toFixed(1);
  return `[${timestamp}ms][TRACE:${category}] ${message}`;
}

function emitTrace(category: TraceCategory, module: string, message: string, data?: unknown): void {
  if (!isTraceEnabled(category)) return;
  const formatted = formatTraceMessage(category, message);
  storeLog(`TRACE:${category}`, module, message, data);
  if (data !== undefined) {
    console.log(formatted, data);
  } else {
    console.log(formatted);
  }
}

/**
 * Trace logging interface - only logs if category is enabled.
 */
export const trace = {
  /**
   * Trace template lookup and model-name detection.
   */
  template(message: string, data?: unknown): void {
    emitTrace('template', 'Template', message, data);
  },

  /**
   * Trace embedding function dispatch.
   */
  embed(message: string, data?: unknown): void {
    emitTrace('embed', 'Embed', message, data);
  },

  /**
   * Trace cache hits and position updates.
   */
  cache(message: string, data?: unknown): void {
    emitTrace('cache', 'Cache', message, data);
  },

  assembly(message: string, data?: unknown): void {
    emitTrace('assembly', 'Assembly', message, data);
  },
};
