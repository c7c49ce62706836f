/**
 * Chat Template Schema
 *
 * A template set wraps each conversational turn in the special tokens a
 * model family expects. Role strings contain exactly one message placeholder.
 *
 * @module config/schema/template
 */

/** Roles the assembler knows about; templates may define others */
export type ChatRole = 'system' | 'user' | 'bot' | 'first' | (string & {});

export interface TemplateSet {
  readonly id?: string;
  readonly name?: string;
  /** Default system prompt placed in the first (system) entry */
  readonly systemPrompt: string;
  /** Role name -> format string with one message placeholder */
  readonly roles: Readonly<Record<string, string>>;
  /** Text embedded after image features (falls back to chat.imageSuffix) */
  readonly imageSuffix?: string;
}

/**
 * Detection rule for mapping a model name to a template.
 * Every pattern must appear (case-insensitive) in the model name.
 */
export interface TemplateDetectionSchema {
  modelNamePatterns: string[];
}

/**
 * Template preset as stored in config/templates/*.json.
 */
export interface TemplatePresetSchema {
  id: string;
  name?: string;
  /** Parent preset whose fields this one overrides */
  extends?: string;
  systemPrompt?: string;
  roles?: Record<string, string>;
  imageSuffix?: string;
  detection?: TemplateDetectionSchema;
}
