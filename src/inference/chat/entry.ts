/**
 * Chat Entry Types
 *
 * @module inference/chat/entry
 */

import type { ChatRole } from '../../config/schema/template.schema.js';
import type { ImageSource } from '../model.js';
import type { EmbeddingTensor } from '../tensor.js';

/** Payloads of the built-in content types */
export interface ContentTypeMap {
  text: string | readonly string[];
  image: ImageSource;
  dict: ContentDict;
}

export type BuiltinContentType = keyof ContentTypeMap;

/** Built-in tag or the tag of a custom registered embedding */
export type ContentType = BuiltinContentType | (string & {});

/** Sub-mapping of content type -> value, embedded with one template */
export type ContentDict = Readonly<Record<string, unknown>>;

/**
 * Keyword content for an entry. Built-in keys are checked against their
 * payload type; custom keys take whatever their embedding function accepts.
 */
export type EntryContent = { readonly [K in BuiltinContentType]?: ContentTypeMap[K] | null } & {
  readonly [type: string]: unknown;
};

/**
 * Embedding computed for a segment, with the role template it was computed under.
 */
export interface CachedEmbedding {
  readonly embedding: EmbeddingTensor;
  readonly template: string;
  readonly length: number;
}

/**
 * One piece of typed content in an entry. `cached` is filled the first time an
 * assembly pass computes the segment and is never recomputed afterwards.
 */
export interface ChatSegment {
  readonly type: ContentType;
  readonly value: unknown;
  cached: CachedEmbedding | null;
}

export interface ChatEntry {
  readonly role: ChatRole;
  /** Segments in declaration order */
  readonly content: ReadonlyMap<ContentType, ChatSegment>;
}

/**
 * Raw value of a content type in an entry, if present.
 */
export function entryValue(entry: ChatEntry, type: ContentType): unknown {
  return entry.content.get(type)?.value;
}
