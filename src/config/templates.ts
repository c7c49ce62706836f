/**
 * Chat Template Registry
 *
 * Loads the built-in template presets, resolves their inheritance chain and
 * detects which template a model needs from its name.
 * Templates are data: JSON presets, not if-statements.
 *
 * @module config/templates
 */

import {
  MESSAGE_PLACEHOLDER,
  type TemplatePresetSchema,
  type TemplateSet,
} from './schema/index.js';
import {
  AmbiguousTemplateError,
  InvalidTemplateError,
  UnknownTemplateError,
} from '../errors/prompt-error.js';
import { log, trace } from '../debug/index.js';

// =============================================================================
// Template Registry
// =============================================================================

import llama2Template from './templates/llama-2.json' with { type: 'json' };
import llavaLlama2Template from './templates/llava-llama-2.json' with { type: 'json' };
import vicunaV0Template from './templates/vicuna-v0.json' with { type: 'json' };
import vicunaV1Template from './templates/vicuna-v1.json' with { type: 'json' };
import llavaV0Template from './templates/llava-v0.json' with { type: 'json' };
import llavaV1Template from './templates/llava-v1.json' with { type: 'json' };

/** Registry of all built-in template presets */
const TEMPLATE_REGISTRY: Readonly<Record<string, TemplatePresetSchema>> = {
  'llama-2': llama2Template,
  'llava-llama-2': llavaLlama2Template,
  'vicuna-v0': vicunaV0Template,
  'vicuna-v1': vicunaV1Template,
  'llava-v0': llavaV0Template,
  'llava-v1': llavaV1Template,
};

/**
 * Detection order - combined variants before their base families, so that
 * "llava-llama-2" is checked before "llama-2" and "vicuna-v1" before "vicuna-v0".
 */
const TEMPLATE_DETECTION_ORDER = [
  'llava-llama-2',
  'llama-2',
  'vicuna-v1',
  'vicuna-v0',
  'llava-v1',
  'llava-v0',
];

/**
 * Get a template preset by ID, without inheritance resolution.
 */
export function getTemplate(id: string): TemplatePresetSchema | null {
  return TEMPLATE_REGISTRY[id] ?? null;
}

/**
 * List all built-in template IDs.
 */
export function listTemplates(): string[] {
  return Object.keys(TEMPLATE_REGISTRY);
}

/**
 * Resolve a preset with its parent chain merged into a fresh TemplateSet.
 * Child values override parent values; roles are merged per role.
 */
export function resolveTemplateSet(id: string): TemplateSet {
  const chain: TemplatePresetSchema[] = [];
  let current: string | undefined = id;

  while (current !== undefined) {
    const preset = getTemplate(current);
    if (!preset) {
      throw new UnknownTemplateError(current);
    }
    if (chain.includes(preset)) {
      throw new InvalidTemplateError(`Template '${id}' has a circular extends chain`);
    }
    chain.unshift(preset);
    current = preset.extends;
  }

  let systemPrompt = '';
  let imageSuffix: string | undefined;
  let roles: Record<string, string> = {};
  for (const preset of chain) {
    systemPrompt = preset.systemPrompt ?? systemPrompt;
    imageSuffix = preset.imageSuffix ?? imageSuffix;
    roles = { ...roles, ...preset.roles };
  }

  const template: TemplateSet = {
    id,
    name: chain[chain.length - 1]?.name,
    systemPrompt,
    roles,
    ...(imageSuffix !== undefined ? { imageSuffix } : {}),
  };
  validateTemplateSet(template);
  return template;
}

/**
 * Resolve a template name or a caller-provided template.
 * Names yield an independent copy; a TemplateSet is validated and used as given.
 */
export function resolveTemplate(template: string | TemplateSet): TemplateSet {
  if (typeof template === 'string') {
    trace.template(`resolving template '${template}'`);
    return resolveTemplateSet(template);
  }
  validateTemplateSet(template);
  return template;
}

/**
 * Check that every role string carries exactly one message placeholder.
 */
export function validateTemplateSet(template: TemplateSet): void {
  const label = template.id ?? template.name ?? 'custom';
  for (const [role, format] of Object.entries(template.roles)) {
    const count = format.split(MESSAGE_PLACEHOLDER).length - 1;
    if (count !== 1) {
      throw new InvalidTemplateError(
        `Template '${label}' role '${role}' must contain ${MESSAGE_PLACEHOLDER} exactly once (found ${count})`
      );
    }
  }
}

// =============================================================================
// Model Detection
// =============================================================================

/**
 * Detect the template for a model from its name.
 * Checks presets in order of specificity (most specific first).
 */
export function detectTemplate(modelName: string): string {
  const nameLower = modelName.toLowerCase();

  for (const id of TEMPLATE_DETECTION_ORDER) {
    const patterns = TEMPLATE_REGISTRY[id]?.detection?.modelNamePatterns;
    if (!patterns || patterns.length === 0) continue;

    if (patterns.every((pattern) => nameLower.includes(pattern.toLowerCase()))) {
      log.info('Template', `using chat template '${id}' for model ${modelName}`);
      return id;
    }
  }

  throw new AmbiguousTemplateError(modelName);
}

// =============================================================================
// Template Formatting
// =============================================================================

/**
 * Substitute a message body into a role template, verbatim.
 */
export function applyTemplate(template: string, message: string): string {
  return template.split(MESSAGE_PLACEHOLDER).join(message);
}

/**
 * Part of a role template before its placeholder (e.g. "USER: ").
 */
export function templatePrefix(template: string): string {
  const index = template.indexOf(MESSAGE_PLACEHOLDER);
  return index < 0 ? template : template.slice(0, index);
}

/**
 * Part of a role template from its placeholder on, used to close a turn
 * whose prefix was already emitted ahead of an image.
 */
export function templateFromPlaceholder(template: string): string {
  const index = template.indexOf(MESSAGE_PLACEHOLDER);
  return index < 0 ? template : template.slice(index);
}

export { TEMPLATE_REGISTRY };
