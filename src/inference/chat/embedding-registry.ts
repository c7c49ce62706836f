/**
 * Embedding Registry
 *
 * Maps content types to embedding functions. Each function declares at
 * registration whether it takes the role template.
 *
 * @module inference/chat/embedding-registry
 */

import { UnregisteredTypeError, UnresolvedTypeError } from '../../errors/prompt-error.js';
import { getRuntimeConfig } from '../../config/runtime.js';
import { trace } from '../../debug/index.js';
import { isImageHandle } from '../model.js';
import { sequenceLength, type EmbeddingTensor } from '../tensor.js';
import type { ContentType } from './entry.js';

export type PlainEmbeddingFn = (input: unknown) => EmbeddingTensor;
export type TemplateAwareEmbeddingFn = (input: unknown, template: string | null) => EmbeddingTensor;

export type EmbeddingFunction =
  | { readonly capability: 'plain'; readonly embed: PlainEmbeddingFn }
  | { readonly capability: 'template-aware'; readonly embed: TemplateAwareEmbeddingFn };

export type EmbeddingCapability = EmbeddingFunction['capability'];

/**
 * Wrap a function that ignores the role template.
 */
export function plain(embed: PlainEmbeddingFn): EmbeddingFunction {
  return { capability: 'plain', embed };
}

/**
 * Wrap a function that receives the role template.
 */
export function templateAware(embed: TemplateAwareEmbeddingFn): EmbeddingFunction {
  return { capability: 'template-aware', embed };
}

export interface EmbeddingRegistryOptions {
  /** Extensions that make a string resolve to an image (default: chat.imageExtensions) */
  imageExtensions?: readonly string[];
}

export class EmbeddingRegistry {
  private readonly functions = new Map<ContentType, EmbeddingFunction>();
  private readonly imageExtensions: readonly string[];

  constructor(options: EmbeddingRegistryOptions = {}) {
    const extensions = options.imageExtensions ?? getRuntimeConfig().chat.imageExtensions;
    this.imageExtensions = extensions.map((ext) => ext.toLowerCase());
  }

  /**
   * Register (or replace) the embedding function for a content type.
   */
  register(type: ContentType, fn: EmbeddingFunction): void {
    this.functions.set(type, fn);
  }

  has(type: ContentType): boolean {
    return this.functions.has(type);
  }

  types(): ContentType[] {
    return [...this.functions.keys()];
  }

  capability(type: ContentType): EmbeddingCapability | null {
    return this.functions.get(type)?.capability ?? null;
  }

  /**
   * Work out the content type of an input given without a tag.
   * Paths ending in an image extension are images, other strings are text.
   */
  resolveType(input: unknown): ContentType {
    if (typeof input === 'string') {
      const lower = input.toLowerCase();
      return this.imageExtensions.some((ext) => lower.endsWith(ext)) ? 'image' : 'text';
    }
    if (Array.isArray(input) && input.length > 0 && input.every((item) => typeof item === 'string')) {
      return 'text';
    }
    if (isImageHandle(input)) {
      return 'image';
    }
    throw new UnresolvedTypeError(describeInput(input));
  }

  /**
   * Embed an input with the function registered for its type.
   * The template is only passed to template-aware functions.
   */
  embed(input: unknown, type?: ContentType, template: string | null = null): EmbeddingTensor {
    const resolved = type ?? this.resolveType(input);
    const fn = this.functions.get(resolved);
    if (!fn) {
      throw new UnregisteredTypeError(resolved);
    }

    const embedding = fn.capability === 'template-aware'
      ? fn.embed(input, template)
      : fn.embed(input);

    trace.embed(`${resolved} -> ${sequenceLength(embedding)} positions`);
    return embedding;
  }
}

/**
 * Short description of a value for error messages.
 */
export function describeInput(input: unknown): string {
  if (input === null) return 'null';
  if (Array.isArray(input)) return input.length === 0 ? 'empty array' : 'array';
  if (typeof input === 'object') return input.constructor?.name ?? 'object';
  return typeof input;
}
