/**
 * Prompt Assembly Errors
 *
 * Every failure carries a stable `code` so callers can branch without
 * matching on message text.
 *
 * @module errors/prompt-error
 */

export const ERROR_CODES = {
  TEMPLATE_UNKNOWN: 'PROMPT_TEMPLATE_UNKNOWN',
  TEMPLATE_AMBIGUOUS: 'PROMPT_TEMPLATE_AMBIGUOUS',
  TEMPLATE_INVALID: 'PROMPT_TEMPLATE_INVALID',
  ROLE_TEMPLATE_MISSING: 'PROMPT_ROLE_TEMPLATE_MISSING',
  TYPE_UNRESOLVED: 'PROMPT_TYPE_UNRESOLVED',
  TYPE_UNREGISTERED: 'PROMPT_TYPE_UNREGISTERED',
  DICT_EMPTY: 'PROMPT_DICT_EMPTY',
  VISION_UNSUPPORTED: 'PROMPT_VISION_UNSUPPORTED',
  SHAPE_MISMATCH: 'PROMPT_SHAPE_MISMATCH',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export class PromptError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnknownTemplateError extends PromptError {
  readonly template: string;

  constructor(template: string) {
    super(ERROR_CODES.TEMPLATE_UNKNOWN, `Unknown chat template: ${template}`);
    this.template = template;
  }
}

export class AmbiguousTemplateError extends PromptError {
  readonly modelName: string;

  constructor(modelName: string) {
    super(
      ERROR_CODES.TEMPLATE_AMBIGUOUS,
      `Couldn't determine chat template from model name '${modelName}', pass a template explicitly`
    );
    this.modelName = modelName;
  }
}

export class InvalidTemplateError extends PromptError {
  constructor(message: string) {
    super(ERROR_CODES.TEMPLATE_INVALID, message);
  }
}

export class MissingRoleTemplateError extends PromptError {
  readonly role: string;

  constructor(role: string, template: string) {
    super(
      ERROR_CODES.ROLE_TEMPLATE_MISSING,
      `Chat template '${template}' has no entry for role=${role}`
    );
    this.role = role;
  }
}

export class UnresolvedTypeError extends PromptError {
  constructor(description: string) {
    super(
      ERROR_CODES.TYPE_UNRESOLVED,
      `Couldn't find embedding type for ${description}, specify the content type explicitly`
    );
  }
}

export class UnregisteredTypeError extends PromptError {
  readonly type: string;

  constructor(type: string) {
    super(ERROR_CODES.TYPE_UNREGISTERED, `Type '${type}' has no embedding registered`);
    this.type = type;
  }
}

export class EmptyDictEmbeddingError extends PromptError {
  constructor() {
    super(ERROR_CODES.DICT_EMPTY, 'Dict did not contain any entries with valid embedding types');
  }
}

export class VisionUnsupportedError extends PromptError {
  constructor(modelName: string) {
    super(ERROR_CODES.VISION_UNSUPPORTED, `Model '${modelName}' has no vision encoder`);
  }
}

export class ShapeMismatchError extends PromptError {
  constructor(message: string) {
    super(ERROR_CODES.SHAPE_MISMATCH, message);
  }
}

export function isPromptError(error: unknown): error is PromptError {
  return error instanceof PromptError;
}
