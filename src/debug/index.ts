/**
 * Debug Module - Unified Logging and Tracing
 *
 * ## Log Levels (verbosity - how much to show)
 *   silent  - nothing
 *   error   - errors only
 *   warn    - errors + warnings
 *   info    - normal operation (default)
 *   verbose - detailed info
 *   debug   - everything
 *
 * ## Trace Categories (what to show when tracing)
 *   template - template resolution and detection
 *   embed    - embedding dispatch
 *   cache    - cache hits and position accounting
 *   assembly - per-segment assembly decisions
 *   all      - everything
 *
 * ## Usage
 *   import { log, trace, setLogLevel, setTrace } from '../debug/index.js';
 *
 *   log.info('ChatHistory', 'using chat template llama-2');
 *   trace.cache('entry 2 text cached, position=41');
 *
 *   setLogLevel('verbose');
 *   setTrace('embed,cache');
 *   setTrace('all,-assembly');
 *   setTrace(false);
 *
 * @module debug
 */

export {
  LOG_LEVELS,
  TRACE_CATEGORIES,
  type LogLevel,
  type LogLevelValue,
  type TraceCategory,
  type LogEntry,
  type LogHistoryFilter,
} from './types.js';
export { log, shouldLog, escapeNewlines } from './logger.js';
export { trace, isTraceEnabled } from './trace.js';
export {
  setLogLevel,
  getLogLevel,
  setTrace,
  getTrace,
  enableModules,
  disableModules,
  resetModuleFilters,
  applyDebugConfig,
} from './config.js';
export { getLogHistory, clearLogHistory } from './history.js';
