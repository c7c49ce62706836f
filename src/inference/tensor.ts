/**
 * Embedding Tensor
 *
 * A [1, sequenceLength, hiddenSize] block of embeddings in one contiguous
 * Float32Array. Prompt assembly only concatenates these along the sequence
 * axis and measures their length.
 */

import { ShapeMismatchError } from '../errors/prompt-error.js';

export type EmbeddingShape = readonly [1, number, number];

export interface EmbeddingTensor {
  readonly data: Float32Array;
  readonly shape: EmbeddingShape;
  readonly label?: string;
}

/**
 * Create an embedding tensor, checking the data matches the shape.
 */
export function createEmbeddingTensor(
  data: Float32Array,
  sequenceLength: number,
  hiddenSize: number,
  label?: string
): EmbeddingTensor {
  if (data.length !== sequenceLength * hiddenSize) {
    throw new ShapeMismatchError(
      `createEmbeddingTensor: ${data.length} values do not fill [1, ${sequenceLength}, ${hiddenSize}]` +
      (label ? ` (${label})` : '')
    );
  }
  return {
    data,
    shape: Object.freeze([1, sequenceLength, hiddenSize] as const),
    label,
  };
}

/**
 * Zero-length embedding, returned when nothing new needs to reach the model.
 */
export function emptyEmbedding(hiddenSize: number): EmbeddingTensor {
  return createEmbeddingTensor(new Float32Array(0), 0, hiddenSize, 'empty');
}

/**
 * Number of positions along the sequence axis.
 */
export function sequenceLength(tensor: EmbeddingTensor): number {
  return tensor.shape[1];
}

/**
 * Assert tensor has the expected hidden size, throw if mismatch.
 */
export function assertEmbeddingShape(
  tensor: EmbeddingTensor,
  hiddenSize: number,
  operation: string
): void {
  if (tensor.shape[0] !== 1 || tensor.shape[2] !== hiddenSize) {
    throw new ShapeMismatchError(
      `${operation}: expected [1, n, ${hiddenSize}], got [${tensor.shape.join(', ')}]` +
      (tensor.label ? ` (${tensor.label})` : '')
    );
  }
}

/**
 * Concatenate embeddings along the sequence axis.
 * A single input is returned as-is; no inputs give an empty tensor.
 */
export function concatEmbeddings(tensors: readonly EmbeddingTensor[], hiddenSize: number): EmbeddingTensor {
  if (tensors.length === 0) {
    return emptyEmbedding(hiddenSize);
  }
  const [first] = tensors;
  if (tensors.length === 1 && first) {
    assertEmbeddingShape(first, hiddenSize, 'concatEmbeddings');
    return first;
  }

  let total = 0;
  for (const tensor of tensors) {
    assertEmbeddingShape(tensor, hiddenSize, 'concatEmbeddings');
    total += sequenceLength(tensor);
  }

  // batch is always 1, so concatenating along axis 1 is a flat copy
  const data = new Float32Array(total * hiddenSize);
  let offset = 0;
  for (const tensor of tensors) {
    data.set(tensor.data, offset);
    offset += tensor.data.length;
  }
  return createEmbeddingTensor(data, total, hiddenSize);
}
