/**
 * Chat Assembler
 *
 * Folds the chat entries into the embedding the model still needs to see,
 * plus the position in its KV-cache where that embedding starts.
 *
 * With caching, the pass skips the leading run of segments the model already
 * holds (cached segments, and freshly computed bot replies, which the model
 * generated itself). The first segment that has to be emitted ends the run:
 * the KV-cache only grows contiguously, so every later segment is emitted too.
 *
 * @module inference/chat/assembler
 */

import type { TemplateSet } from '../../config/schema/template.schema.js';
import { templateFromPlaceholder } from '../../config/templates.js';
import { MissingRoleTemplateError } from '../../errors/prompt-error.js';
import { escapeNewlines, isTraceEnabled, trace } from '../../debug/index.js';
import { concatEmbeddings, sequenceLength, type EmbeddingTensor } from '../tensor.js';
import type { EmbeddingRegistry } from './embedding-registry.js';
import type { CachedEmbedding, ChatEntry, ChatSegment } from './entry.js';

export interface AssemblySource {
  readonly entries: readonly ChatEntry[];
  readonly template: TemplateSet;
  readonly registry: EmbeddingRegistry;
  readonly hiddenSize: number;
}

export interface AssemblyResult {
  /** Embedding to feed the model, [1, n, hiddenSize]; n may be 0 */
  embedding: EmbeddingTensor;
  /** KV-cache position the embedding should be appended at */
  position: number;
}

interface ComputedSegment {
  readonly segment: ChatSegment;
  readonly cached: CachedEmbedding;
}

/**
 * Accumulator threaded through the pass.
 */
export interface AssemblyState {
  /** User text segments seen so far (0 = the `first` template still applies) */
  readonly numUserTurns: number;
  /** An image was just emitted inside a user turn whose template is still open; only a following user segment closes it */
  readonly openUserTurn: boolean;
  /** Still inside the leading run of segments the model already holds */
  readonly cacheable: boolean;
  readonly position: number;
  readonly emitted: readonly EmbeddingTensor[];
  /** Fresh embeddings, written back to their segments once the pass succeeds */
  readonly computed: readonly ComputedSegment[];
}

export function initialAssemblyState(useCache: boolean): AssemblyState {
  return {
    numUserTurns: 0,
    openUserTurn: false,
    cacheable: useCache,
    position: 0,
    emitted: [],
    computed: [],
  };
}

function roleTemplate(template: TemplateSet, role: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(template.roles, role)
    ? template.roles[role]
    : undefined;
}

/**
 * Pick the role template for a segment. The first user turn uses `first`
 * when the template defines one; a user segment following an image in an
 * open user turn gets the part of the template from the placeholder on.
 */
export function selectRoleTemplate(
  state: AssemblyState,
  template: TemplateSet,
  role: string
): string {
  const first = role === 'user' && state.numUserTurns === 0
    ? roleTemplate(template, 'first')
    : undefined;
  const selected = first ?? roleTemplate(template, role);
  if (selected === undefined) {
    throw new MissingRoleTemplateError(role, template.id ?? template.name ?? 'custom');
  }

  return state.openUserTurn && role === 'user' ? templateFromPlaceholder(selected) : selected;
}

function computeSegment(
  source: AssemblySource,
  segment: ChatSegment,
  template: string
): CachedEmbedding {
  const embedding = source.registry.embed(segment.value, segment.type, template);
  return { embedding, template, length: sequenceLength(embedding) };
}

/**
 * Advance the fold by one segment.
 */
export function assembleSegment(
  state: AssemblyState,
  source: AssemblySource,
  entry: ChatEntry,
  segment: ChatSegment
): AssemblyState {
  const template = selectRoleTemplate(state, source.template, entry.role);
  let next: AssemblyState = { ...state, openUserTurn: false };

  if (isTraceEnabled('assembly')) {
    trace.assembly(
      `role='${entry.role}' template='${escapeNewlines(template)}' ` +
      `cached=${segment.cached !== null && state.cacheable} type=${segment.type}`
    );
  }

  if (state.cacheable) {
    if (segment.cached) {
      next = { ...next, position: next.position + segment.cached.length };
      trace.cache(`${entry.role} ${segment.type} cached, position=${next.position}`);
    } else {
      const cached = computeSegment(source, segment, template);
      next = { ...next, computed: [...next.computed, { segment, cached }] };

      if (entry.role === 'bot') {
        // bot replies were generated by the model and are already in its KV-cache
        next = { ...next, position: next.position + cached.length };
        trace.cache(`bot ${segment.type} already in KV-cache, position=${next.position}`);
      } else {
        next = {
          ...next,
          emitted: [...next.emitted, cached.embedding],
          cacheable: false,
          openUserTurn: segment.type === 'image',
        };
      }
    }
  } else if (segment.cached) {
    next = { ...next, emitted: [...next.emitted, segment.cached.embedding] };
  } else {
    const cached = computeSegment(source, segment, template);
    next = {
      ...next,
      computed: [...next.computed, { segment, cached }],
      emitted: [...next.emitted, cached.embedding],
      openUserTurn: segment.type === 'image',
    };
  }

  if (entry.role === 'user' && segment.type === 'text') {
    next = { ...next, numUserTurns: next.numUserTurns + 1 };
  }
  return next;
}

function isAssemblable(source: AssemblySource, segment: ChatSegment): boolean {
  return segment.value !== null && segment.value !== undefined && source.registry.has(segment.type);
}

/**
 * Assemble the chat embedding.
 *
 * With `useCache`, only segments after the model's KV-cache position are
 * returned. Without it, the whole chat is returned at position 0 (cached
 * segment embeddings are reused, not recomputed).
 */
export function assembleChat(source: AssemblySource, useCache: boolean): AssemblyResult {
  let state = initialAssemblyState(useCache);

  for (const entry of source.entries) {
    for (const segment of entry.content.values()) {
      if (!isAssemblable(source, segment)) continue;
      state = assembleSegment(state, source, entry, segment);
    }
  }

  for (const { segment, cached } of state.computed) {
    segment.cached = cached;
  }

  return {
    embedding: concatEmbeddings(state.emitted, source.hiddenSize),
    position: useCache ? state.position : 0,
  };
}
