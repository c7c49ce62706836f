import { describe, expect, it, vi } from 'vitest';

import {
  EmbeddingRegistry,
  plain,
  templateAware,
} from '../../src/inference/chat/embedding-registry.js';
import {
  createDictEmbedding,
  createImageEmbedding,
  createTextEmbedding,
} from '../../src/inference/chat/embeddings.js';
import { createEmbeddingTensor, sequenceLength } from '../../src/inference/tensor.js';
import {
  EmptyDictEmbeddingError,
  UnregisteredTypeError,
  UnresolvedTypeError,
  VisionUnsupportedError,
} from '../../src/errors/prompt-error.js';
import { FakeModel, HIDDEN_SIZE, IMAGE_POSITIONS } from './fake-model.js';

function createRegistry(model: FakeModel): EmbeddingRegistry {
  const registry = new EmbeddingRegistry();
  registry.register('text', createTextEmbedding(model, { useCache: false }));
  registry.register('image', createImageEmbedding(model, { suffix: () => '\n', fragmentCache: true }));
  registry.register('dict', createDictEmbedding(registry, HIDDEN_SIZE));
  return registry;
}

describe('inference/chat/embedding-registry', () => {
  describe('resolveType', () => {
    const registry = new EmbeddingRegistry();

    it.each([
      ['photo.jpg', 'image'],
      ['photo.JPEG', 'image'],
      ['/data/frames/frame-001.png', 'image'],
      ['hello there', 'text'],
      ['notes.txt', 'text'],
    ])('resolves %s as %s', (input, expected) => {
      expect(registry.resolveType(input)).toBe(expected);
    });

    it('resolves a non-empty list of strings as text', () => {
      expect(registry.resolveType(['a', 'b'])).toBe('text');
    });

    it('resolves an in-memory image as image', () => {
      expect(registry.resolveType({ width: 1, height: 1, data: new Uint8Array(3) })).toBe('image');
    });

    it('throws for inputs it cannot classify', () => {
      expect(() => registry.resolveType([])).toThrow(UnresolvedTypeError);
      expect(() => registry.resolveType(42)).toThrow(
        "Couldn't find embedding type for number, specify the content type explicitly"
      );
      expect(() => registry.resolveType({ text: 'hi' })).toThrow(UnresolvedTypeError);
    });

    it('uses configured image extensions', () => {
      const custom = new EmbeddingRegistry({ imageExtensions: ['.webp'] });
      expect(custom.resolveType('a.webp')).toBe('image');
      expect(custom.resolveType('a.png')).toBe('text');
    });
  });

  describe('embed', () => {
    it('passes the template only to template-aware functions', () => {
      const registry = new EmbeddingRegistry();
      const tensor = createEmbeddingTensor(new Float32Array(2), 1, 2);
      const plainFn = vi.fn((_input: unknown) => tensor);
      const awareFn = vi.fn((_input: unknown, _template: string | null) => tensor);
      registry.register('audio', plain(plainFn));
      registry.register('video', templateAware(awareFn));

      registry.embed('clip', 'audio', 'USER: ${MESSAGE}');
      registry.embed('movie', 'video', 'USER: ${MESSAGE}');

      expect(plainFn).toHaveBeenCalledWith('clip');
      expect(plainFn.mock.calls[0]).toHaveLength(1);
      expect(awareFn).toHaveBeenCalledWith('movie', 'USER: ${MESSAGE}');
      expect(registry.capability('audio')).toBe('plain');
      expect(registry.capability('video')).toBe('template-aware');
      expect(registry.capability('text')).toBeNull();
    });

    it('throws for a type without a registered function', () => {
      const registry = new EmbeddingRegistry();
      expect(() => registry.embed('hello')).toThrow(UnregisteredTypeError);
      expect(() => registry.embed('hello')).toThrow("Type 'text' has no embedding registered");
    });

    it('resolves the type when not given', () => {
      const model = new FakeModel();
      const registry = createRegistry(model);
      const embedding = registry.embed('hi', undefined, 'USER: ${MESSAGE}\n');
      expect(model.texts()).toEqual(['USER: hi\n']);
      expect(sequenceLength(embedding)).toBe(9);
    });
  });

  describe('text embedding', () => {
    it('embeds without a template as-is', () => {
      const model = new FakeModel();
      createRegistry(model).embed('plain text', 'text');
      expect(model.textCalls).toEqual([{ text: 'plain text', useCache: false }]);
    });

    it('joins a list of strings with newlines', () => {
      const model = new FakeModel();
      createRegistry(model).embed(['first', 'second'], 'text', '[${MESSAGE}]');
      expect(model.texts()).toEqual(['[first\nsecond]']);
    });

    it('passes the use-cache flag to the model', () => {
      const model = new FakeModel();
      const registry = new EmbeddingRegistry();
      registry.register('text', createTextEmbedding(model, { useCache: true }));
      registry.embed('x', 'text');
      expect(model.textCalls).toEqual([{ text: 'x', useCache: true }]);
    });
  });

  describe('image embedding', () => {
    it('wraps the image in the template prefix and a trailing newline', () => {
      const model = new FakeModel();
      const embedding = createRegistry(model).embed('cat.png', 'image', 'USER: ${MESSAGE}\n');

      expect(model.textCalls).toEqual([
        { text: 'USER: ', useCache: true },
        { text: '\n', useCache: true },
      ]);
      expect(model.imageCalls).toEqual(['cat.png']);
      expect(sequenceLength(embedding)).toBe(6 + IMAGE_POSITIONS + 1);
    });

    it('skips the prefix without a template', () => {
      const model = new FakeModel();
      const embedding = createRegistry(model).embed('cat.png', 'image');
      expect(model.texts()).toEqual(['\n']);
      expect(sequenceLength(embedding)).toBe(IMAGE_POSITIONS + 1);
    });

    it('throws when the model has no vision encoder', () => {
      const model = new FakeModel('vicuna-7b-v1.5', { hasVision: false });
      expect(() => createRegistry(model).embed('cat.png', 'image')).toThrow(VisionUnsupportedError);
      expect(model.textCalls).toEqual([]);
    });
  });

  describe('dict embedding', () => {
    it('embeds each registered type in order with the same template', () => {
      const model = new FakeModel();
      const embedding = createRegistry(model).embed(
        { image: 'cat.png', text: 'what is it?' },
        'dict',
        'USER: ${MESSAGE}\n'
      );

      expect(model.texts()).toEqual(['USER: ', '\n', 'USER: what is it?\n']);
      expect(sequenceLength(embedding)).toBe(10 + 18);
    });

    it('returns a single embedding un-concatenated', () => {
      const model = new FakeModel();
      const registry = createRegistry(model);
      const embedding = registry.embed({ text: 'a', image: null, unknown: 1 }, 'dict', '${MESSAGE}');
      expect(model.texts()).toEqual(['a']);
      expect(embedding.label).toBe('text');
    });

    it('throws when nothing can be embedded', () => {
      const registry = createRegistry(new FakeModel());
      expect(() => registry.embed({ text: null, other: 'x' }, 'dict')).toThrow(EmptyDictEmbeddingError);
      expect(() => registry.embed({}, 'dict')).toThrow(
        'Dict did not contain any entries with valid embedding types'
      );
    });

    it('rejects non-object input', () => {
      const registry = createRegistry(new FakeModel());
      expect(() => registry.embed('text', 'dict')).toThrow(UnresolvedTypeError);
    });
  });
});
