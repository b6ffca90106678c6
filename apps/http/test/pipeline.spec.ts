import { describe, it, expect } from 'vitest';
import { validateRule, validateTree } from '../src/pipeline';
import { buildTestContext } from '../../../tests/helpers';

describe('validateRule', () => {
  it('words an unmeasurable rule apart from an oversized one', async () => {
    const ctx = await buildTestContext();
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;
    const result = validateRule(ctx, cyclic);
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      { kind: 'SizeExceeded', message: 'Rule size cannot be measured; it must serialise to at most 5000 chars', path: '$' },
      { kind: 'DepthExceeded', message: 'Expression nesting exceeds maximum depth of 10', path: `$${'/0'.repeat(10)}` }
    ]);
  });

  it('decodes no deeper than the validator allows', async () => {
    const ctx = await buildTestContext({ env: { MAX_EXPRESSION_DEPTH: '2' } });
    const result = validateRule(ctx, { and: [{ '!': [{ var: 'bureau.score' }] }, true] });
    expect(result.errors).toEqual([
      { kind: 'DepthExceeded', message: 'Expression nesting exceeds maximum depth of 2', path: '$/0/0' }
    ]);
  });
});

describe('validateTree', () => {
  it('validates a tree sent as JSON', async () => {
    const ctx = await buildTestContext();
    const result = validateTree(ctx, {
      kind: 'op', operator: 'not', operands: [{ kind: 'var', key: 'primary_applicant.is_existing_customer' }]
    });
    expect(result).toEqual({ valid: true, usedKeys: ['primary_applicant.is_existing_customer'], errors: [] });
  });
});
