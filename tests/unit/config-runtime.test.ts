import { afterEach, describe, expect, it } from 'vitest';

import {
  createRuntimeConfig,
  DEFAULT_CHAT_CONFIG,
  DEFAULT_DEBUG_CONFIG,
} from '../../src/config/schema/index.js';
import { getRuntimeConfig, resetRuntimeConfig, setRuntimeConfig } from '../../src/config/runtime.js';

describe('config/runtime', () => {
  afterEach(() => {
    resetRuntimeConfig();
  });

  it('defaults to the schema defaults', () => {
    const config = getRuntimeConfig();
    expect(config.chat).toEqual(DEFAULT_CHAT_CONFIG);
    expect(config.debug).toEqual(DEFAULT_DEBUG_CONFIG);
  });

  it('merges partial overrides over defaults', () => {
    const config = createRuntimeConfig({
      chat: { imageSuffix: '</img>' },
      debug: { trace: { enabled: true } },
    });

    expect(config.chat.imageSuffix).toBe('</img>');
    expect(config.chat.imageExtensions).toEqual(DEFAULT_CHAT_CONFIG.imageExtensions);
    expect(config.debug.trace).toEqual({ enabled: true, categories: ['all'] });
    expect(config.debug.logHistory.maxLogHistoryEntries).toBe(1000);
  });

  it('replaces arrays instead of merging them', () => {
    const config = createRuntimeConfig({ chat: { imageExtensions: ['.webp'] } });
    expect(config.chat.imageExtensions).toEqual(['.webp']);
  });

  it('sets and resets the session config', () => {
    setRuntimeConfig({ chat: { defaultTemplate: 'llama-2' } });
    expect(getRuntimeConfig().chat.defaultTemplate).toBe('llama-2');

    resetRuntimeConfig();
    expect(getRuntimeConfig().chat.defaultTemplate).toBeNull();
  });
});
