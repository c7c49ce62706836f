import { describe, expect, it } from 'vitest';

import {
  createEmbeddingTensor,
  concatEmbeddings,
  emptyEmbedding,
  sequenceLength,
} from '../../src/inference/tensor.js';
import { ShapeMismatchError } from '../../src/errors/prompt-error.js';

describe('inference/tensor', () => {
  it('creates a [1, n, h] tensor', () => {
    const tensor = createEmbeddingTensor(new Float32Array(6), 3, 2);
    expect(tensor.shape).toEqual([1, 3, 2]);
    expect(sequenceLength(tensor)).toBe(3);
  });

  it('rejects data that does not fill the shape', () => {
    expect(() => createEmbeddingTensor(new Float32Array(5), 3, 2)).toThrow(ShapeMismatchError);
  });

  it('concatenates along the sequence axis', () => {
    const a = createEmbeddingTensor(new Float32Array([1, 2, 3, 4]), 2, 2);
    const b = createEmbeddingTensor(new Float32Array([5, 6]), 1, 2);

    const result = concatEmbeddings([a, b], 2);

    expect(result.shape).toEqual([1, 3, 2]);
    expect(Array.from(result.data)).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('returns a single input as-is', () => {
    const a = createEmbeddingTensor(new Float32Array([1, 2]), 1, 2);
    expect(concatEmbeddings([a], 2)).toBe(a);
  });

  it('returns an empty tensor for no inputs', () => {
    const result = concatEmbeddings([], 4);
    expect(result.shape).toEqual([1, 0, 4]);
    expect(result.data.length).toBe(0);
    expect(emptyEmbedding(4).shape).toEqual([1, 0, 4]);
  });

  it('rejects mismatched hidden sizes', () => {
    const a = createEmbeddingTensor(new Float32Array(2), 1, 2);
    const b = createEmbeddingTensor(new Float32Array(3), 1, 3);
    expect(() => concatEmbeddings([a, b], 2)).toThrow(
      'concatEmbeddings: expected [1, n, 2], got [1, 1, 3]'
    );
  });
});
