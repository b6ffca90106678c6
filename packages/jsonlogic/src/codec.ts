// packages/jsonlogic/src/codec.ts
// JSON Logic <-> ExpressionNode, plus the wire form of the tagged tree itself.
// Drafts arrive as JSON Logic; everything past this boundary works on the tree.

import type { ExpressionNode, Scalar, ValidationError } from '@lexirule/core';
import { Defects, ExpressionNodeShape, childPath } from '@lexirule/core';

export type JsonLogic =
  | Scalar
  | JsonLogic[]
  | { [operator: string]: JsonLogic };

export type DecodeResult =
  | { ok: true; node: ExpressionNode }
  | { ok: false; errors: ValidationError[] };

export interface DecodeOptions {
  maxDepth?: number; // root is depth 1; deeper nodes are reported, not walked
}

export const DEFAULT_DECODE_DEPTH = 256;

// JSON Logic spellings that differ from ours
const OPERATOR_ALIASES: Record<string, string> = { '!': 'not', '===': '==', '!==': '!=' };

function isScalar(v: unknown): v is Scalar {
  return typeof v === 'string' || typeof v === 'boolean' || (typeof v === 'number' && Number.isFinite(v));
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function describe(v: unknown): string {
  if (v === null) return 'null';
  if (Array.isArray(v)) return 'array';
  if (typeof v === 'number' && !Number.isFinite(v)) return 'non-finite number';
  return typeof v;
}

export function decodeJsonLogic(value: unknown, opts: DecodeOptions = {}): DecodeResult {
  const maxDepth = opts.maxDepth ?? DEFAULT_DECODE_DEPTH;
  const errors: ValidationError[] = [];

  const walk = (v: unknown, path: string, depth: number): ExpressionNode | undefined => {
    if (depth > maxDepth) {
      errors.push(Defects.DEPTH_EXCEEDED(path, maxDepth));
      return undefined;
    }

    if (isScalar(v)) return { kind: 'literal', value: v };

    if (Array.isArray(v)) {
      if (v.every(isScalar)) return { kind: 'literal', value: [...v] };
      errors.push(Defects.MALFORMED(path, 'list literals may only hold strings, numbers and booleans'));
      return undefined;
    }

    if (!isPlainObject(v)) {
      errors.push(Defects.MALFORMED(path, `unsupported value of type ${describe(v)}`));
      return undefined;
    }

    const keys = Object.keys(v);
    if (keys.length !== 1) {
      errors.push(Defects.MALFORMED(path, `expected exactly one operator key, got ${keys.length}`));
      return undefined;
    }

    const [key] = keys;
    const arg = v[key];

    if (key === 'var') {
      // {"var": "k"} or {"var": ["k", default]}
      const name = Array.isArray(arg) ? arg[0] : arg;
      if (typeof name !== 'string' || name === '') {
        errors.push(Defects.MALFORMED(path, "'var' needs a non-empty key name"));
        return undefined;
      }
      return { kind: 'var', key: name };
    }

    const operator = OPERATOR_ALIASES[key] ?? key;
    // a bare argument is shorthand for a one-element operand list
    const args: unknown[] = Array.isArray(arg) ? arg : [arg];
    const operands: ExpressionNode[] = [];
    let failed = false;
    for (let i = 0; i < args.length; i++) {
      const child = walk(args[i], childPath(path, i), depth + 1);
      if (child) operands.push(child);
      else failed = true;
    }
    return failed ? undefined : { kind: 'op', operator, operands };
  };

  const node = walk(value, '$', 1);
  if (!node || errors.length) return { ok: false, errors };
  return { ok: true, node };
}

/** Reads a tagged expression tree sent as plain JSON, one node at a time. */
export function decodeExpressionTree(value: unknown, opts: DecodeOptions = {}): DecodeResult {
  const maxDepth = opts.maxDepth ?? DEFAULT_DECODE_DEPTH;
  const errors: ValidationError[] = [];

  const walk = (v: unknown, path: string, depth: number): ExpressionNode | undefined => {
    if (depth > maxDepth) {
      errors.push(Defects.DEPTH_EXCEEDED(path, maxDepth));
      return undefined;
    }

    const parsed = ExpressionNodeShape.safeParse(v);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue.path.length ? `${issue.path.join('.')}: ` : '';
      errors.push(Defects.MALFORMED(path, `${where}${issue.message}`));
      return undefined;
    }

    const node = parsed.data;
    switch (node.kind) {
      case 'var':
        return { kind: 'var', key: node.key };
      case 'literal':
        return { kind: 'literal', value: Array.isArray(node.value) ? [...node.value] : node.value };
      case 'op': {
        const operands: ExpressionNode[] = [];
        let failed = false;
        for (let i = 0; i < node.operands.length; i++) {
          const child = walk(node.operands[i], childPath(path, i), depth + 1);
          if (child) operands.push(child);
          else failed = true;
        }
        return failed ? undefined : { kind: 'op', operator: node.operator, operands };
      }
    }
  };

  const node = walk(value, '$', 1);
  if (!node || errors.length) return { ok: false, errors };
  return { ok: true, node };
}

export function encodeJsonLogic(node: ExpressionNode): JsonLogic {
  switch (node.kind) {
    case 'var':
      return { var: node.key };
    case 'literal':
      return Array.isArray(node.value) ? [...node.value] : node.value;
    case 'op':
      return { [node.operator === 'not' ? '!' : node.operator]: node.operands.map(encodeJsonLogic) };
  }
}

/** Serialised length of a rule in characters; undefined when it cannot be serialised. */
export function ruleSize(value: unknown): number | undefined {
  try {
    return JSON.stringify(value)?.length ?? 0;
  } catch {
    // cyclic, BigInt-bearing or too deep for the serialiser
    return undefined;
  }
}
