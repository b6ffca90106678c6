import type { ComparisonOperator, ExpressionNode, KeyMapping } from '@lexirule/core';
import { buildAnd, buildCondition, encodeJsonLogic, lit } from '@lexirule/jsonlogic';
import { extractNumbers } from '@lexirule/mapper';
import type { DraftInput, DraftedRule, RuleDrafter } from './types';

const PHRASES: Record<ComparisonOperator, string> = {
  '>': 'greater than',
  '>=': 'at least',
  '<': 'less than',
  '<=': 'at most',
  '==': 'equal to',
  '!=': 'different from'
};

// weak mappings are hints for a model, not enough to build a condition on
const MIN_FIXTURE_SIMILARITY = 0.5;

interface KeyAnchor { key: string; pos: number }

function anchors(prompt: string, mappings: readonly KeyMapping[]): KeyAnchor[] {
  const first = new Map<string, number>();
  for (const m of mappings) {
    if (m.similarity < MIN_FIXTURE_SIMILARITY) continue;
    const pos = prompt.indexOf(m.user_phrase);
    if (pos < 0) continue;
    const prev = first.get(m.mapped_to);
    if (prev === undefined || pos < prev) first.set(m.mapped_to, pos);
  }
  return [...first].map(([key, pos]) => ({ key, pos })).sort((a, b) => a.pos - b.pos);
}

/**
 * Offline drafter: pairs each number in the prompt with the closest mapped key
 * before it, using the comparator phrase in front of the number. Keys left
 * without a number become boolean flags. Deterministic; no network.
 */
export class FixturesDrafter implements RuleDrafter {
  readonly name = 'fixtures';

  async draft(input: DraftInput): Promise<DraftedRule> {
    const allowed = new Set(input.allowedOperators);
    const pending = anchors(input.prompt, input.mappings);
    const conditions: ExpressionNode[] = [];
    const explanation: string[] = [];

    for (const num of extractNumbers(input.prompt)) {
      let pick = -1;
      for (let i = 0; i < pending.length; i++) {
        if (pending[i].pos < num.span[0]) pick = i;
      }
      if (pick < 0) continue;
      const [{ key }] = pending.splice(pick, 1);
      const cmp: ComparisonOperator = num.comparator && allowed.has(num.comparator) ? num.comparator : '==';
      conditions.push(buildCondition(key, cmp, num.value));
      explanation.push(`${key} must be ${PHRASES[cmp]} ${num.value}.`);
    }

    for (const { key } of pending) {
      conditions.push(buildCondition(key, '==', true));
      explanation.push(`${key} must be true.`);
    }

    if (conditions.length === 0) {
      return { rule: encodeJsonLogic(lit(true)), explanation: ['No conditions could be derived from the prompt.'] };
    }
    return { rule: encodeJsonLogic(buildAnd(conditions)), explanation };
  }
}
