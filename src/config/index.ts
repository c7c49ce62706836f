/**
 * Config Module Index
 *
 * @module config
 */

// Schema types
export * from './schema/index.js';

// Session config
export { getRuntimeConfig, setRuntimeConfig, resetRuntimeConfig } from './runtime.js';

// Template registry
export {
  getTemplate,
  listTemplates,
  resolveTemplateSet,
  resolveTemplate,
  validateTemplateSet,
  detectTemplate,
  applyTemplate,
  templatePrefix,
  templateFromPlaceholder,
  TEMPLATE_REGISTRY,
} from './templates.js';
