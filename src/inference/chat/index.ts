/**
 * Chat Module Index
 *
 * @module inference/chat
 */

export { ChatHistory, type ChatHistoryOptions, type ResetOptions } from './history.js';
export {
  assembleChat,
  assembleSegment,
  initialAssemblyState,
  selectRoleTemplate,
  type AssemblyResult,
  type AssemblySource,
  type AssemblyState,
} from './assembler.js';
export {
  EmbeddingRegistry,
  plain,
  templateAware,
  describeInput,
  type EmbeddingFunction,
  type EmbeddingCapability,
  type EmbeddingRegistryOptions,
  type PlainEmbeddingFn,
  type TemplateAwareEmbeddingFn,
} from './embedding-registry.js';
export {
  embedText,
  createTextEmbedding,
  createImageEmbedding,
  createDictEmbedding,
  type TextEmbeddingOptions,
  type ImageEmbeddingOptions,
} from './embeddings.js';
export {
  entryValue,
  type BuiltinContentType,
  type CachedEmbedding,
  type ChatEntry,
  type ChatSegment,
  type ContentDict,
  type ContentType,
  type ContentTypeMap,
  type EntryContent,
} from './entry.js';
