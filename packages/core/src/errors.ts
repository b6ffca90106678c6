// Thrown errors are reserved for startup/configuration and collaborator
// failures; validation defects travel as ValidationError values.

export type ErrorCode =
  | 'CONFIG'
  | 'CONFIG_DUPLICATE_KEY'
  | 'UPSTREAM_DRAFTING'
  | 'UPSTREAM_EMBEDDING';

export class LexiruleError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class ConfigurationError extends LexiruleError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    code: 'CONFIG' | 'CONFIG_DUPLICATE_KEY' = 'CONFIG'
  ) {
    super(code, message, details);
  }
}

export class DuplicateKeyError extends ConfigurationError {
  readonly identifier: string;

  constructor(identifier: string) {
    super(`Duplicate key identifier: ${identifier}`, { identifier }, 'CONFIG_DUPLICATE_KEY');
    this.identifier = identifier;
  }
}

export class DraftingError extends LexiruleError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('UPSTREAM_DRAFTING', message, details);
  }
}

export class EmbeddingError extends LexiruleError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('UPSTREAM_EMBEDDING', message, details);
  }
}

export function isLexiruleError(e: unknown): e is LexiruleError {
  return e instanceof LexiruleError;
}
