// packages/core/src/defects.ts
import type { ValidationError } from './types';

// Factories for the defect values collected by the validator and the JSON Logic decoder.
export const Defects = {
  UNKNOWN_KEY: (path: string, key: string): ValidationError =>
    ({ kind: 'UnknownKey', message: `Unknown key '${key}'`, path, key }),
  UNMAPPED_KEY: (path: string, key: string): ValidationError =>
    ({ kind: 'UnmappedKey', message: `Key '${key}' was not derived from the prompt`, path, key }),
  UNKNOWN_OPERATOR: (path: string, operator: string): ValidationError =>
    ({ kind: 'UnknownOperator', message: `Operator '${operator}' is not allowed`, path, operator }),
  ARITY: (path: string, operator: string, expected: string, actual: number): ValidationError =>
    ({ kind: 'Arity', message: `Operator '${operator}' expects ${expected} operand(s), got ${actual}`, path, operator }),
  TYPE_MISMATCH: (path: string, operator: string, detail: string): ValidationError =>
    ({ kind: 'TypeMismatch', message: `Operator '${operator}': ${detail}`, path, operator }),
  DEPTH_EXCEEDED: (path: string, maxDepth: number): ValidationError =>
    ({ kind: 'DepthExceeded', message: `Expression nesting exceeds maximum depth of ${maxDepth}`, path }),
  MALFORMED: (path: string, detail: string): ValidationError =>
    ({ kind: 'MalformedNode', message: `Malformed expression: ${detail}`, path }),
  SIZE_EXCEEDED: (size: number, maxSize: number): ValidationError =>
    ({ kind: 'SizeExceeded', message: `Rule size (${size} chars) exceeds maximum (${maxSize} chars)`, path: '$' }),
  SIZE_UNMEASURABLE: (maxSize: number): ValidationError =>
    ({ kind: 'SizeExceeded', message: `Rule size cannot be measured; it must serialise to at most ${maxSize} chars`, path: '$' })
} as const;

export function childPath(parent: string, index: number): string {
  return `${parent}/${index}`;
}
