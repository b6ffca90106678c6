import { describe, it, expect } from 'vitest';
import { DraftingError } from '@lexirule/core';
import { buildSystemPrompt, buildUserPrompt, parseDraftReply, splitExplanation } from '../src/drafting';

describe('parseDraftReply', () => {
  it('reads json_logic and splits a prose explanation', () => {
    expect(parseDraftReply('{"json_logic": {"==": [1, 1]}, "explanation": "First check. Second check."}')).toEqual({
      rule: { '==': [1, 1] },
      explanation: ['First check.', 'Second check.']
    });
  });

  it('keeps a list explanation as given, minus blanks', () => {
    expect(splitExplanation([' one ', '', 'two'])).toEqual(['one', 'two']);
    expect(splitExplanation(undefined)).toEqual([]);
  });

  it('fails on empty, non-JSON and incomplete replies', () => {
    expect(() => parseDraftReply(null)).toThrow('Drafting model returned an empty reply');
    expect(() => parseDraftReply('rule: yes')).toThrow('Drafting model reply is not valid JSON');
    expect(() => parseDraftReply('{"explanation": "none"}')).toThrow(DraftingError);
  });
});

describe('drafting prompts', () => {
  const base = {
    keys: [
      { identifier: 'bureau.score', embedding: [1], type: 'number' as const, description: 'bureau score' },
      { identifier: 'loan.purpose', embedding: [1] }
    ],
    allowedOperators: ['and', '>'],
    snippets: [],
    contextDocs: []
  };

  it('lists keys and operators in the system prompt', () => {
    const text = buildSystemPrompt(base);
    expect(text).toContain('Operators you may use: and, >.');
    expect(text.split('\n')).toContain('- "bureau.score" (number, bureau score)');
    expect(text.split('\n')).toContain('- "loan.purpose"');
    expect(text).not.toContain('Relevant policy excerpts:');
  });

  it('appends retrieved snippets and caller context', () => {
    const text = buildSystemPrompt({ ...base, snippets: ['Scores below 650 are declined.'], contextDocs: ['Pilot region only.'] });
    expect(text.endsWith(
      'Relevant policy excerpts:\n- Scores below 650 are declined.\n\nAdditional context supplied with the request:\nPilot region only.'
    )).toBe(true);
  });

  it('adds phrase hints to the user prompt', () => {
    expect(buildUserPrompt({ prompt: 'score over 700', mappings: [] })).toBe('score over 700');
    expect(buildUserPrompt({
      prompt: 'score over 700',
      mappings: [{ user_phrase: 'score', mapped_to: 'bureau.score', similarity: 0.9 }]
    })).toBe('score over 700\n\nPhrase hints:\n- "score" → bureau.score');
  });
});
