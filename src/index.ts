/**
 * Multimodal prompt assembly for incremental LLM inference.
 *
 * @module chatweave
 */

export const CHATWEAVE_VERSION = '0.1.0';

// Chat history and assembly
export * from './inference/chat/index.js';

// Model contract and tensors
export { isImageHandle, type EmbeddingModel, type ImageHandle, type ImageSource } from './inference/model.js';
export {
  createEmbeddingTensor,
  emptyEmbedding,
  sequenceLength,
  concatEmbeddings,
  assertEmbeddingShape,
  type EmbeddingTensor,
  type EmbeddingShape,
} from './inference/tensor.js';

// Config and templates
export * from './config/index.js';

// Errors
export * from './errors/prompt-error.js';

// Debug
export {
  log,
  trace,
  setLogLevel,
  getLogLevel,
  setTrace,
  getTrace,
  enableModules,
  disableModules,
  resetModuleFilters,
  applyDebugConfig,
  getLogHistory,
  clearLogHistory,
} from './debug/index.js';
