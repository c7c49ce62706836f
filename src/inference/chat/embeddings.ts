/**
 * Built-in Embedding Functions
 *
 * text  - message substituted into the role template, embedded by the model
 * image - template prefix as text, image features, then a closing suffix
 * dict  - every registered type in a sub-mapping, embedded with one template
 *
 * @module inference/chat/embeddings
 */

import { applyTemplate, templatePrefix } from '../../config/templates.js';
import {
  EmptyDictEmbeddingError,
  UnresolvedTypeError,
  VisionUnsupportedError,
} from '../../errors/prompt-error.js';
import { log, escapeNewlines } from '../../debug/index.js';
import { isImageHandle, type EmbeddingModel, type ImageSource } from '../model.js';
import { concatEmbeddings, type EmbeddingTensor } from '../tensor.js';
import {
  describeInput,
  templateAware,
  type EmbeddingFunction,
  type EmbeddingRegistry,
} from './embedding-registry.js';
import type { ContentDict } from './entry.js';

/**
 * Embed text after applying the role template, if any.
 */
export function embedText(
  model: EmbeddingModel,
  text: string,
  template: string | null,
  useCache: boolean
): EmbeddingTensor {
  const prompt = template ? applyTemplate(template, text) : text;
  const embedding = model.embedText(prompt, useCache);
  log.debug('Embed', `embedding text [${embedding.shape.join(', ')}] -> \`\`\`${escapeNewlines(prompt)}\`\`\``);
  return embedding;
}

function toText(input: unknown): string {
  if (typeof input === 'string') return input;
  if (Array.isArray(input) && input.every((item): item is string => typeof item === 'string')) {
    return input.join('\n');
  }
  throw new UnresolvedTypeError(`text content (${describeInput(input)})`);
}

function toImage(input: unknown): ImageSource {
  if (typeof input === 'string' || isImageHandle(input)) return input;
  throw new UnresolvedTypeError(`image content (${describeInput(input)})`);
}

function toDict(input: unknown): ContentDict {
  if (typeof input !== 'object' || input === null || Array.isArray(input) || isImageHandle(input)) {
    throw new UnresolvedTypeError(`dict content (${describeInput(input)})`);
  }
  return Object.fromEntries(Object.entries(input));
}

export interface TextEmbeddingOptions {
  /** Let the model reuse its token-embedding cache */
  useCache: boolean;
}

export function createTextEmbedding(
  model: EmbeddingModel,
  options: TextEmbeddingOptions
): EmbeddingFunction {
  return templateAware((input, template) => embedText(model, toText(input), template, options.useCache));
}

export interface ImageEmbeddingOptions {
  /** Text closing the image block, read at call time so template changes apply */
  suffix: () => string;
  /** Let the model reuse its token-embedding cache for the template fragments */
  fragmentCache: boolean;
}

/**
 * Image embedding for vision models (CLIP encoder + projection, behind
 * model.embedImage). With a template, the part before its placeholder is
 * embedded first so the image sits inside the open user turn.
 */
export function createImageEmbedding(
  model: EmbeddingModel,
  options: ImageEmbeddingOptions
): EmbeddingFunction {
  return templateAware((input, template) => {
    const image = toImage(input);
    if (!model.hasVision) {
      throw new VisionUnsupportedError(model.name);
    }

    const parts: EmbeddingTensor[] = [];

    if (template) {
      const prefix = templatePrefix(template);
      if (prefix.length > 0) {
        parts.push(embedText(model, prefix, null, options.fragmentCache));
      }
      log.debug('Embed', `image template: \`\`\`${escapeNewlines(prefix)}\`\`\``);
    }

    parts.push(model.embedImage(image, 'array'));

    const suffix = options.suffix();
    if (suffix.length > 0) {
      parts.push(embedText(model, suffix, null, options.fragmentCache));
    }

    const embedding = concatEmbeddings(parts, model.hiddenSize);
    log.debug('Embed', `embedding image [${embedding.shape.join(', ')}]`);
    return embedding;
  });
}

/**
 * Dict embedding: each non-null value whose key has a registered function,
 * in stored order, concatenated along the sequence axis.
 */
export function createDictEmbedding(
  registry: EmbeddingRegistry,
  hiddenSize: number
): EmbeddingFunction {
  return templateAware((input, template) => {
    const embeddings: EmbeddingTensor[] = [];

    for (const [key, value] of Object.entries(toDict(input))) {
      if (value === null || value === undefined) continue;
      if (!registry.has(key)) continue;
      embeddings.push(registry.embed(value, key, template));
    }

    const [first] = embeddings;
    if (!first) {
      throw new EmptyDictEmbeddingError();
    }
    if (embeddings.length === 1) {
      return first;
    }
    return concatEmbeddings(embeddings, hiddenSize);
  });
}
