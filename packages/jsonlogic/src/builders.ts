// packages/jsonlogic/src/builders.ts
import type { ComparisonOperator, ExpressionNode, LiteralValue, Scalar } from '@lexirule/core';

export const v = (key: string): ExpressionNode => ({ kind: 'var', key });
export const lit = (value: LiteralValue): ExpressionNode => ({ kind: 'literal', value });
export const op = (operator: string, ...operands: ExpressionNode[]): ExpressionNode =>
  ({ kind: 'op', operator, operands });

/** buildCondition('user.age', '>', 18) → {">": [{"var": "user.age"}, 18]} */
export function buildCondition(key: string, operator: ComparisonOperator, value: Scalar): ExpressionNode {
  return op(operator, v(key), lit(value));
}

export function buildIn(key: string, values: Scalar[]): ExpressionNode {
  return op('in', v(key), lit(values));
}

function combine(operator: 'and' | 'or', conditions: ExpressionNode[]): ExpressionNode {
  if (conditions.length === 0) throw new RangeError(`'${operator}' needs at least one condition`);
  if (conditions.length === 1) return conditions[0];
  return op(operator, ...conditions);
}

/** One condition collapses to itself. */
export const buildAnd = (conditions: ExpressionNode[]) => combine('and', conditions);
export const buildOr = (conditions: ExpressionNode[]) => combine('or', conditions);

export function buildNot(condition: ExpressionNode): ExpressionNode {
  return op('not', condition);
}

export function buildIf(cond: ExpressionNode, then: ExpressionNode, otherwise?: ExpressionNode): ExpressionNode {
  return otherwise ? op('if', cond, then, otherwise) : op('if', cond, then);
}
