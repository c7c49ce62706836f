/**
 * Config Schema Index
 *
 * @module config/schema
 */

import { DEFAULT_DEBUG_CONFIG, type DebugConfigSchema } from './debug.schema.js';
import { DEFAULT_CHAT_CONFIG, type ChatConfigSchema } from './chat.schema.js';

export * from './debug.schema.js';
export * from './chat.schema.js';
export * from './template.schema.js';

/** Deep partial type for runtime overrides */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends unknown[] ? T[P] : T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export interface RuntimeConfigSchema {
  debug: DebugConfigSchema;
  chat: ChatConfigSchema;
}

export type RuntimeConfigOverrides = DeepPartial<RuntimeConfigSchema>;

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfigSchema = {
  debug: DEFAULT_DEBUG_CONFIG,
  chat: DEFAULT_CHAT_CONFIG,
};

/**
 * Create a runtime config with defaults filled in.
 *
 * @example
 * ```typescript
 * const config = createRuntimeConfig({
 *   debug: { logHistory: { maxLogHistoryEntries: 500 } },
 *   chat: { defaultTemplate: 'vicuna-v1' },
 * });
 * ```
 */
export function createRuntimeConfig(overrides?: RuntimeConfigOverrides): RuntimeConfigSchema {
  const base = DEFAULT_RUNTIME_CONFIG;
  if (!overrides) {
    return {
      debug: { ...base.debug },
      chat: { ...base.chat },
    };
  }

  return {
    debug: {
      logHistory: { ...base.debug.logHistory, ...overrides.debug?.logHistory },
      logLevel: { ...base.debug.logLevel, ...overrides.debug?.logLevel },
      trace: { ...base.debug.trace, ...overrides.debug?.trace },
    },
    chat: { ...base.chat, ...overrides.chat },
  };
}
