/**
 * Chat History
 *
 * Multimodal chat history that can contain a mix of media (text, images, ...).
 * Each media type has its own embedding function: text is token-embedded by
 * the model, images go through the vision encoder and projection. From these
 * the history assembles the embedding of the whole chat as model input.
 *
 * Role templates add the special tokens a model family expects around each
 * turn. Arbitrary roles can be added, each with their own template.
 *
 * @module inference/chat/history
 */

import type { TemplateSet, ChatRole } from '../../config/schema/template.schema.js';
import { getRuntimeConfig } from '../../config/runtime.js';
import { detectTemplate, resolveTemplate } from '../../config/templates.js';
import { log } from '../../debug/index.js';
import type { EmbeddingModel } from '../model.js';
import type { EmbeddingTensor } from '../tensor.js';
import { assembleChat, type AssemblyResult } from './assembler.js';
import { EmbeddingRegistry, type EmbeddingFunction } from './embedding-registry.js';
import { createDictEmbedding, createImageEmbedding, createTextEmbedding } from './embeddings.js';
import type { ChatEntry, ChatSegment, ContentType, EntryContent } from './entry.js';

export interface ChatHistoryOptions {
  /**
   * Template name (e.g. 'llama-2', 'vicuna-v1') or a template set.
   * Defaults to chat.defaultTemplate, then to detection from model.name.
   */
  template?: string | TemplateSet;
  /** Overrides the template's default system prompt */
  systemPrompt?: string;
}

export interface ResetOptions {
  /** Re-add the system prompt as the first entry (default: true) */
  addSystemPrompt?: boolean;
}

export class ChatHistory implements Iterable<ChatEntry> {
  readonly model: EmbeddingModel;

  private templateSet: TemplateSet;
  private readonly registry: EmbeddingRegistry;
  private chatEntries: ChatEntry[] = [];
  private position = 0;

  constructor(model: EmbeddingModel, options: ChatHistoryOptions = {}) {
    const config = getRuntimeConfig().chat;
    this.model = model;

    const template = resolveTemplate(
      options.template ?? config.defaultTemplate ?? detectTemplate(model.name)
    );
    this.templateSet = options.systemPrompt
      ? { ...template, systemPrompt: options.systemPrompt }
      : template;

    this.registry = new EmbeddingRegistry({ imageExtensions: config.imageExtensions });
    this.registry.register('text', createTextEmbedding(model, { useCache: config.textEmbeddingCache }));
    this.registry.register('dict', createDictEmbedding(this.registry, model.hiddenSize));
    this.registry.register('image', createImageEmbedding(model, {
      suffix: () => this.templateSet.imageSuffix ?? getRuntimeConfig().chat.imageSuffix,
      fragmentCache: config.templateFragmentCache,
    }));

    this.reset();
  }

  /**
   * The active template (this history's own copy).
   */
  get template(): TemplateSet {
    return this.templateSet;
  }

  /**
   * Number of entries in the chat history.
   */
  get length(): number {
    return this.chatEntries.length;
  }

  get entries(): readonly ChatEntry[] {
    return this.chatEntries;
  }

  /**
   * Return the n-th entry; negative indices count from the end.
   */
  at(index: number): ChatEntry | undefined {
    return this.chatEntries.at(index);
  }

  [Symbol.iterator](): Iterator<ChatEntry> {
    return this.chatEntries[Symbol.iterator]();
  }

  /**
   * KV-cache position returned by the last incremental embedChat() call.
   * Only reset() moves it back to 0.
   */
  get cachePosition(): number {
    return this.position;
  }

  /**
   * Add an entry of text, image, etc. `input` is stored under its detected
   * content type; `content` holds explicitly typed values, including types
   * registered with registerEmbedding().
   */
  addEntry(role: ChatRole = 'user', input?: unknown, content: EntryContent = {}): ChatEntry {
    const entry = this.createEntry(role, input, content);
    this.chatEntries.push(entry);
    return entry;
  }

  /**
   * Build an entry without adding it to the history.
   */
  createEntry(role: ChatRole = 'user', input?: unknown, content: EntryContent = {}): ChatEntry {
    const segments = new Map<ContentType, ChatSegment>();
    for (const [type, value] of Object.entries(content)) {
      segments.set(type, { type, value, cached: null });
    }
    if (input !== undefined && input !== null) {
      const type = this.registry.resolveType(input);
      segments.set(type, { type, value: input, cached: null });
    }
    return { role, content: segments };
  }

  /**
   * Clear the history and its KV-cache position, optionally starting the new
   * chat with the system prompt.
   */
  reset(options: ResetOptions = {}): void {
    this.chatEntries = [];
    this.position = 0;
    if (options.addSystemPrompt ?? true) {
      this.addEntry('system', undefined, { text: this.templateSet.systemPrompt });
    }
  }

  /**
   * The typically hidden instruction at the start of the chat, like
   * "You are a curious and helpful AI assistant, ...".
   */
  get systemPrompt(): string {
    return this.templateSet.systemPrompt;
  }

  /**
   * Replace the system prompt. Resets the history, since the cached
   * embedding of the old system turn no longer matches.
   */
  set systemPrompt(instruction: string) {
    this.templateSet = { ...this.templateSet, systemPrompt: instruction };
    this.reset();
  }

  /**
   * Register the embedding function for a custom content type.
   */
  registerEmbedding(type: ContentType, fn: EmbeddingFunction): void {
    this.registry.register(type, fn);
    log.verbose('ChatHistory', `registered ${fn.capability} embedding for '${type}'`);
  }

  /**
   * Embed a single input (text, image, ...). The type is detected when not given.
   */
  embed(input: unknown, type?: ContentType, template: string | null = null): EmbeddingTensor {
    return this.registry.embed(input, type, template);
  }

  /**
   * Assemble the embedding of the latest or the entire chat.
   * With useCache (the default) only the embeddings the model has not seen
   * are returned; without it, the entire chat at position 0 (cachePosition
   * is left as it was).
   */
  embedChat(useCache = true): AssemblyResult {
    const result = assembleChat(
      {
        entries: this.chatEntries,
        template: this.templateSet,
        registry: this.registry,
        hiddenSize: this.model.hiddenSize,
      },
      useCache
    );
    if (useCache) {
      this.position = result.position;
    }
    log.debug('ChatHistory', `assembled [${result.embedding.shape.join(', ')}] at position ${result.position}`);
    return result;
  }
}
