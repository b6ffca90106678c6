import { describe, it, expect } from 'vitest';
import type { ExtractOptions } from '../src';
import { extractNumbers, extractPhrases } from '../src';

const texts = (prompt: string, ids: string[] = [], opts: ExtractOptions = {}) =>
  extractPhrases(prompt, ids, opts).map((c) => c.text);

describe('extractPhrases', () => {
  it('finds a verbatim identifier with its span', () => {
    expect(extractPhrases('Approve if bureau.score > 700.', ['bureau.score', 'loan.amount'])).toEqual([
      { text: 'bureau.score', span: [11, 23], literal: true }
    ]);
  });

  it('accepts an identifier that ends a sentence', () => {
    const out = extractPhrases('Reject when bureau.score.', ['bureau.score']);
    expect(out).toEqual([{ text: 'bureau.score', span: [12, 24], literal: true }]);
  });

  it('does not match an identifier inside a longer name', () => {
    const ids = ['bureau.score'];
    expect(extractPhrases('bureau.score_v2 exceeds 5', ids).some((c) => c.literal)).toBe(false);
    expect(extractPhrases('old.bureau.score exceeds 5', ids).some((c) => c.literal)).toBe(false);
    expect(extractPhrases('bureau.scores exceeds 5', ids).some((c) => c.literal)).toBe(false);
  });

  it('breaks windows at punctuation', () => {
    expect(texts('bureau.score_v2 exceeds 5')).toEqual(['bureau', 'score_v2']);
  });

  it('builds windows between stopwords and numbers', () => {
    expect(texts('business vintage at least 3 years')).toEqual(['business', 'business vintage', 'vintage', 'years']);
  });

  it('orders windows by start, then end', () => {
    expect(texts('applicant monthly income')).toEqual([
      'applicant', 'applicant monthly', 'applicant monthly income', 'monthly', 'monthly income', 'income'
    ]);
  });

  it('bounds window length', () => {
    expect(texts('applicant monthly income', [], { maxPhraseWords: 1 })).toEqual(['applicant', 'monthly', 'income']);
  });

  it('skips words covered by an identifier', () => {
    expect(texts('bureau.score above 700 for existing customers', ['bureau.score'])).toEqual([
      'bureau.score', 'existing', 'existing customers', 'customers'
    ]);
  });

  it('keeps quoted phrases whole', () => {
    const out = extractPhrases('Decline if "wilful default" is true', []);
    expect(out.map((c) => c.text)).toEqual(['Decline', 'wilful', 'wilful default', 'wilful default', 'default', 'true']);
    expect(out[2]).toEqual({ text: 'wilful default', span: [12, 26], literal: false });
  });

  it('truncates to maxCandidates', () => {
    expect(texts('applicant monthly income', [], { maxCandidates: 2 })).toEqual(['applicant', 'applicant monthly']);
  });

  it('keeps identifiers that come after the candidate bound', () => {
    const filler = Array.from({ length: 30 }, (_, i) => `word${String.fromCharCode(97 + (i % 26))}`).join(' ');
    const prompt = `${filler}, require bureau.score above 700`;
    const out = extractPhrases(prompt, ['bureau.score'], { maxCandidates: 10 });
    expect(out.filter((c) => !c.literal)).toHaveLength(10);
    expect(out[out.length - 1]).toEqual({
      text: 'bureau.score',
      span: [prompt.indexOf('bureau.score'), prompt.indexOf('bureau.score') + 12],
      literal: true
    });
  });

  it('returns nothing for blank input', () => {
    expect(extractPhrases('', ['bureau.score'])).toEqual([]);
    expect(extractPhrases('   \n', ['bureau.score'])).toEqual([]);
  });

  it('returns nothing when every word is a stopword or number', () => {
    expect(extractPhrases('if at least 3 and not more than 9', [])).toEqual([]);
  });
});

describe('extractNumbers', () => {
  it('pairs numbers with the comparator phrase before them', () => {
    expect(extractNumbers('bureau score > 700 and vintage at least 3 years')).toEqual([
      { value: 700, span: [15, 18], comparator: '>' },
      { value: 3, span: [40, 41], comparator: '>=' }
    ]);
  });

  it('prefers the longer phrase', () => {
    expect(extractNumbers('no more than 5')[0].comparator).toBe('<=');
    expect(extractNumbers('more than 5')[0].comparator).toBe('>');
    expect(extractNumbers('not less than 5')[0].comparator).toBe('>=');
  });

  it('reads word comparators', () => {
    expect(extractNumbers('overdue over 50000')[0].comparator).toBe('>');
    expect(extractNumbers('age under 18')[0].comparator).toBe('<');
    expect(extractNumbers('exactly 4 owners')[0].comparator).toBe('==');
  });

  it('leaves the comparator out when none is written', () => {
    expect(extractNumbers('age between 25 and 60')).toEqual([
      { value: 25, span: [12, 14] },
      { value: 60, span: [19, 21] }
    ]);
  });

  it('stops looking back at a clause break', () => {
    const out = extractNumbers('above limit 2.5, score -3');
    expect(out.map((n) => n.value)).toEqual([2.5, -3]);
    expect(out[0].comparator).toBeUndefined();
    expect(out[1].comparator).toBeUndefined();
  });

  it('ignores digits inside words', () => {
    expect(extractNumbers('v2 release')).toEqual([]);
  });
});
