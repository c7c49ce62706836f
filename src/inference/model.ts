/**
 * Embedding Model Contract
 *
 * The model-side functions prompt assembly depends on. Token embedding and
 * vision feature extraction live behind this interface.
 *
 * @module inference/model
 */

import type { EmbeddingTensor } from './tensor.js';

/**
 * In-memory image, e.g. decoded pixels handed over by the caller.
 */
export interface ImageHandle {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array | Uint8ClampedArray | Float32Array;
}

/** Image path/URL or decoded image */
export type ImageSource = string | ImageHandle;

export interface EmbeddingModel {
  /** Model identity, used to detect the chat template */
  readonly name: string;
  readonly hiddenSize: number;
  readonly hasVision: boolean;

  /**
   * Tokenize and embed text.
   * @param useCache - allow the model to reuse its token-embedding cache
   */
  embedText(text: string, useCache: boolean): EmbeddingTensor;

  /**
   * Extract and project image features into the text embedding space.
   */
  embedImage(image: ImageSource, returnTensors: 'array'): EmbeddingTensor;
}

export function isImageHandle(value: unknown): value is ImageHandle {
  if (typeof value !== 'object' || value === null) return false;
  if (!('width' in value) || !('height' in value) || !('data' in value)) return false;
  return (
    typeof value.width === 'number' &&
    typeof value.height === 'number' &&
    (value.data instanceof Uint8Array ||
      value.data instanceof Uint8ClampedArray ||
      value.data instanceof Float32Array)
  );
}
