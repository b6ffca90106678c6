// packages/validator/src/index.ts
// Static checks for a drafted expression tree: grammar, arity, operand types,
// key whitelist and nesting depth. Every defect is collected in one pass.

import type {
  ExpressionNode, OperatorKind, ValidationError, ValidationResult, ValueType
} from '@lexirule/core';
import {
  ConfigurationError, DEFAULT_ALLOWED_OPERATORS, Defects, childPath, isOperatorKind
} from '@lexirule/core';
import type { VocabularyRegistry } from '@lexirule/vocab';

export interface ValidatorOptions {
  allowedOperators: ReadonlySet<OperatorKind>;
  maxDepth: number;                      // root counts as depth 1
  mappedKeys?: ReadonlySet<string>;      // when set, keys must also come from the prompt mapping
}

export const DEFAULT_MAX_DEPTH = 10;

export function createValidatorOptions(partial: {
  allowedOperators?: Iterable<string>;
  maxDepth?: number;
  mappedKeys?: Iterable<string>;
} = {}): ValidatorOptions {
  const ops = new Set<OperatorKind>();
  for (const op of partial.allowedOperators ?? DEFAULT_ALLOWED_OPERATORS) {
    if (!isOperatorKind(op)) throw new ConfigurationError(`Unsupported operator in allowed set: ${op}`);
    ops.add(op);
  }
  const maxDepth = partial.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new ConfigurationError(`maxDepth must be a positive integer, got ${maxDepth}`);
  }
  return {
    allowedOperators: ops,
    maxDepth,
    ...(partial.mappedKeys ? { mappedKeys: new Set(partial.mappedKeys) } : {})
  };
}

// 'any' = unknown statically (untyped key, or a node that already failed)
type Inferred = ValueType | 'any';

function literalType(value: unknown): Inferred {
  if (Array.isArray(value)) return 'list';
  if (typeof value === 'number') return 'number';
  if (typeof value === 'string') return 'string';
  if (typeof value === 'boolean') return 'boolean';
  return 'any';
}

const accepts = (t: Inferred, want: ValueType) => t === 'any' || t === want;

interface Arity { min: number; max: number; label: string }
const exactly = (n: number): Arity => ({ min: n, max: n, label: `exactly ${n}` });
const atLeast = (n: number): Arity => ({ min: n, max: Infinity, label: `at least ${n}` });

function arityOf(op: OperatorKind): Arity {
  switch (op) {
    case '>': case '>=': case '<': case '<=': case '==': case '!=':
    case 'in':
    case '/':
      return exactly(2);
    case 'and': case 'or':
    case '+': case '*':
    case 'if':
      return atLeast(2);
    case 'not':
      return exactly(1);
    case '-':
      return { min: 1, max: 2, label: '1 or 2' };
  }
}

export function validateExpression(
  root: ExpressionNode,
  registry: VocabularyRegistry,
  options: ValidatorOptions = createValidatorOptions()
): ValidationResult {
  const errors: ValidationError[] = [];
  const used = new Set<string>();

  const requireAll = (op: string, types: Inferred[], want: ValueType, path: string) => {
    types.forEach((t, i) => {
      if (!accepts(t, want)) {
        errors.push(Defects.TYPE_MISMATCH(childPath(path, i), op, `operand ${i + 1} must be ${want}, got ${t}`));
      }
    });
  };

  // returns the result type of the operation
  const checkOperation = (
    op: OperatorKind,
    operands: ExpressionNode[],
    types: Inferred[],
    path: string
  ): Inferred => {
    switch (op) {
      case '>': case '>=': case '<': case '<=':
        requireAll(op, types, 'number', path);
        return 'boolean';

      case '==': case '!=': {
        const [a, b] = types;
        if (a !== 'any' && b !== 'any' && a !== b) {
          errors.push(Defects.TYPE_MISMATCH(path, op, `cannot compare ${a} with ${b}`));
        }
        return 'boolean';
      }

      case 'in': {
        const haystack = operands[1];
        if (types[0] === 'list') {
          errors.push(Defects.TYPE_MISMATCH(childPath(path, 0), op, 'left operand must be a scalar or key'));
        }
        if (haystack.kind !== 'literal' || !Array.isArray(haystack.value)) {
          errors.push(Defects.TYPE_MISMATCH(childPath(path, 1), op, 'right operand must be a list literal'));
        } else if (types[0] !== 'any' && types[0] !== 'list') {
          const want = types[0];
          const stray = haystack.value.find((v) => literalType(v) !== want);
          if (stray !== undefined) {
            errors.push(Defects.TYPE_MISMATCH(childPath(path, 1), op, `list holds ${literalType(stray)} values, expected ${want}`));
          }
        }
        return 'boolean';
      }

      case 'and': case 'or': case 'not':
        requireAll(op, types, 'boolean', path);
        return 'boolean';

      case '+': case '-': case '*': case '/':
        requireAll(op, types, 'number', path);
        return 'number';

      case 'if': {
        // [cond, then, cond, then, ..., else?]
        const branches: Inferred[] = [];
        for (let i = 0; i < types.length; i++) {
          const isCond = i % 2 === 0 && i < types.length - 1;
          if (isCond) {
            if (!accepts(types[i], 'boolean')) {
              errors.push(Defects.TYPE_MISMATCH(childPath(path, i), op, `condition must be boolean, got ${types[i]}`));
            }
          } else {
            branches.push(types[i]);
          }
        }
        const first = branches[0];
        return branches.every((t) => t === first) ? first : 'any';
      }
    }
  };

  const walk = (node: ExpressionNode, depth: number, path: string): Inferred => {
    if (depth > options.maxDepth) {
      errors.push(Defects.DEPTH_EXCEEDED(path, options.maxDepth));
      return 'any';
    }

    switch (node.kind) {
      case 'var': {
        const key = registry.lookup(node.key);
        if (!key) {
          errors.push(Defects.UNKNOWN_KEY(path, node.key));
          return 'any';
        }
        used.add(key.identifier);
        if (options.mappedKeys && !options.mappedKeys.has(key.identifier)) {
          errors.push(Defects.UNMAPPED_KEY(path, key.identifier));
        }
        return key.type ?? 'any';
      }

      case 'literal':
        return literalType(node.value);

      case 'op': {
        const raw = node.operator;
        const op = isOperatorKind(raw) && options.allowedOperators.has(raw) ? raw : undefined;
        if (!op) errors.push(Defects.UNKNOWN_OPERATOR(path, raw));

        // operands are walked even under a rejected operator so key defects surface
        const types = node.operands.map((child, i) => walk(child, depth + 1, childPath(path, i)));
        if (!op) return 'any';

        const arity = arityOf(op);
        const n = node.operands.length;
        if (n < arity.min || n > arity.max) {
          errors.push(Defects.ARITY(path, op, arity.label, n));
          return op === '+' || op === '-' || op === '*' || op === '/' ? 'number'
            : op === 'if' ? 'any' : 'boolean';
        }
        return checkOperation(op, node.operands, types, path);
      }
    }
  };

  walk(root, 1, '$');

  return Object.freeze({
    valid: errors.length === 0,
    usedKeys: Object.freeze([...used].sort()),
    errors: Object.freeze(errors)
  });
}

/** Nesting depth of a tree; the root alone is depth 1. */
export function expressionDepth(node: ExpressionNode): number {
  if (node.kind !== 'op' || node.operands.length === 0) return 1;
  return 1 + Math.max(...node.operands.map(expressionDepth));
}
