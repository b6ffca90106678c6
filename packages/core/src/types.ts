// --------------------
// Vocabulary
// --------------------
export type ValueType =
  | 'number'
  | 'string'
  | 'boolean'
  | 'list';

export interface CanonicalKey {
  identifier: string;              // dot-delimited path, e.g. "bureau.score"
  embedding: readonly number[];
  type?: ValueType;                // declared value type; untyped keys match anything
  description?: string;
}

export interface KeyEntry {
  identifier: string;
  embedding: readonly number[];
  type?: ValueType;
  description?: string;
}

// --------------------
// Phrases & mappings
// --------------------
export interface PhraseCandidate {
  text: string;
  span: readonly [start: number, end: number]; // [start, end) into the prompt
  literal: boolean;                            // verbatim registry identifier
}

export interface KeyMapping {
  user_phrase: string;
  mapped_to: string;
  similarity: number; // [-1, 1]
}

export interface KeySuggestion {
  identifier: string;
  similarity: number;
}

export interface RejectedPhrase {
  user_phrase: string;
  best_similarity: number;
  suggestions: KeySuggestion[];
}

export interface MappingOutcome {
  mappings: KeyMapping[];
  rejected: RejectedPhrase[];
}

// --------------------
// Expressions
// --------------------
export const COMPARISON_OPERATORS = ['>', '>=', '<', '<=', '==', '!='] as const;
export const LOGICAL_OPERATORS = ['and', 'or', 'not'] as const;
export const ARITHMETIC_OPERATORS = ['+', '-', '*', '/'] as const;
export const ALL_OPERATORS = [
  ...LOGICAL_OPERATORS,
  ...COMPARISON_OPERATORS,
  'in',
  'if',
  ...ARITHMETIC_OPERATORS,
] as const;

export type ComparisonOperator = typeof COMPARISON_OPERATORS[number];
export type OperatorKind = typeof ALL_OPERATORS[number];

export const DEFAULT_ALLOWED_OPERATORS: readonly OperatorKind[] = [
  'and', 'or', 'not',
  '>', '>=', '<', '<=', '==', '!=',
  'in',
];

export function isOperatorKind(op: string): op is OperatorKind {
  return ALL_OPERATORS.some((known) => known === op);
}

export type Scalar = boolean | number | string;
export type LiteralValue = Scalar | Scalar[];

// operator stays a plain string: drafts may carry operators we do not know
export type ExpressionNode =
  | { kind: 'var'; key: string }
  | { kind: 'literal'; value: LiteralValue }
  | { kind: 'op'; operator: string; operands: ExpressionNode[] };

// --------------------
// Validation
// --------------------
export type ValidationErrorKind =
  | 'UnknownKey'
  | 'UnknownOperator'
  | 'TypeMismatch'
  | 'DepthExceeded'
  | 'Arity'
  | 'UnmappedKey'
  | 'MalformedNode'
  | 'SizeExceeded';

export interface ValidationError {
  kind: ValidationErrorKind;
  message: string;
  path: string;        // "$/1/0": second operand of the root, then its first operand
  key?: string;
  operator?: string;
}

export interface ValidationResult {
  valid: boolean;
  usedKeys: readonly string[];           // sorted, unique
  errors: readonly ValidationError[];
}
