import { describe, it, expect } from 'vitest';
import type { PhraseCandidate } from '@lexirule/core';
import { ConfigurationError } from '@lexirule/core';
import { VocabularyRegistry } from '@lexirule/vocab';
import { createMapperOptions, mapCandidates, phrasesToEmbed } from '../src';

const registry = VocabularyRegistry.load([
  { identifier: 'bureau.score', embedding: [1, 0, 0] },
  { identifier: 'loan.amount', embedding: [0, 1, 0] },
  { identifier: 'applicant.age', embedding: [0, 0, 1] }
]);

const phrase = (text: string, start = 0): PhraseCandidate => ({ text, span: [start, start + text.length], literal: false });
const literal = (text: string, start = 0): PhraseCandidate => ({ text, span: [start, start + text.length], literal: true });

const vectors = new Map<string, number[]>([
  ['bureau score', [0.85, Math.sqrt(1 - 0.85 * 0.85), 0]],
  ['loan size', [0.6, 0.8, 0]],
  ['everything', [1, 1, 1]],
  ['nothing', [0, 0, 0]]
]);

describe('mapCandidates', () => {
  it('maps a paraphrase to its closest key', () => {
    const out = mapCandidates([phrase('bureau score')], registry, vectors, createMapperOptions({ threshold: 0.8 }));
    expect(out.rejected).toEqual([]);
    expect(out.mappings).toHaveLength(1);
    expect(out.mappings[0].user_phrase).toBe('bureau score');
    expect(out.mappings[0].mapped_to).toBe('bureau.score');
    expect(out.mappings[0].similarity).toBeCloseTo(0.85, 10);
  });

  it('maps verbatim identifiers at the literal similarity regardless of threshold', () => {
    const out = mapCandidates([literal('applicant.age')], registry, new Map(), createMapperOptions({ threshold: 1 }));
    expect(out.mappings).toEqual([{ user_phrase: 'applicant.age', mapped_to: 'applicant.age', similarity: 1 }]);
  });

  it('accepts fewer phrases as the threshold rises', () => {
    const candidates = ['bureau score', 'loan size', 'everything'].map((t, i) => phrase(t, i * 20));
    const accepted = (threshold: number) =>
      mapCandidates(candidates, registry, vectors, createMapperOptions({ threshold })).mappings.map((m) => m.user_phrase);

    expect(accepted(0.5)).toEqual(['bureau score', 'loan size', 'everything']);
    expect(accepted(0.7)).toEqual(['bureau score', 'loan size']);
    expect(accepted(0.82)).toEqual(['bureau score']);
    expect(accepted(0.9)).toEqual([]);
  });

  it('records suggestions for rejected phrases, ties broken by identifier', () => {
    const out = mapCandidates([phrase('nothing')], registry, vectors, createMapperOptions({ topK: 2 }));
    expect(out.mappings).toEqual([]);
    expect(out.rejected).toEqual([{
      user_phrase: 'nothing',
      best_similarity: 0,
      suggestions: [
        { identifier: 'applicant.age', similarity: 0 },
        { identifier: 'bureau.score', similarity: 0 }
      ]
    }]);
  });

  it('maps each distinct phrase once', () => {
    const out = mapCandidates([phrase('bureau score'), phrase('bureau score', 20)], registry, vectors);
    expect(out.mappings).toHaveLength(1);
  });

  it('keeps one mapping per mention, the strongest window winning', () => {
    // "bureau score" at 0, with its one-word windows inside it
    const overlapping = new Map<string, number[]>([
      ...vectors,
      ['bureau', [0.6, 0.8, 0]],
      ['score', [0.7, 0, Math.sqrt(1 - 0.49)]]
    ]);
    const out = mapCandidates(
      [phrase('bureau'), phrase('bureau score'), phrase('score', 7)],
      registry, overlapping, createMapperOptions({ threshold: 0.5 })
    );
    expect(out.mappings.map((m) => [m.user_phrase, m.mapped_to])).toEqual([['bureau score', 'bureau.score']]);
    expect(out.rejected).toEqual([]);
  });

  it('lets a stronger short window beat the phrase around it', () => {
    const out = mapCandidates(
      [phrase('loan size', 0), phrase('loan size everything', 0), literal('applicant.age', 30)],
      registry,
      new Map<string, number[]>([...vectors, ['loan size everything', [0.3, 0.3, 0.3]]]),
      createMapperOptions({ threshold: 0.3 })
    );
    expect(out.mappings.map((m) => m.user_phrase)).toEqual(['loan size', 'applicant.age']);
  });

  it('drops warnings for windows inside an accepted phrase', () => {
    const out = mapCandidates(
      [phrase('nothing', 0), phrase('bureau score', 0), phrase('nothing', 40)],
      registry, vectors, createMapperOptions({ threshold: 0.8 })
    );
    expect(out.mappings.map((m) => m.user_phrase)).toEqual(['bureau score']);
    expect(out.rejected.map((r) => r.user_phrase)).toEqual(['nothing']);
  });

  it('skips phrases without a vector', () => {
    expect(mapCandidates([phrase('unknown words')], registry, vectors)).toEqual({ mappings: [], rejected: [] });
  });

  it('maps nothing against an empty registry', () => {
    const empty = VocabularyRegistry.load([]);
    expect(mapCandidates([phrase('bureau score')], empty, vectors)).toEqual({ mappings: [], rejected: [] });
  });

  it('rejects phrase vectors of the wrong dimension', () => {
    const bad = new Map([['bureau score', [1, 0]]]);
    expect(() => mapCandidates([phrase('bureau score')], registry, bad)).toThrow(ConfigurationError);
  });
});

describe('phrasesToEmbed', () => {
  it('lists distinct non-identifier phrases', () => {
    const candidates = [literal('bureau.score'), phrase('loan size'), phrase('loan size', 30), phrase('loan.amount')];
    expect(phrasesToEmbed(candidates, registry)).toEqual(['loan size']);
  });
});

describe('createMapperOptions', () => {
  it('fills defaults', () => {
    expect(createMapperOptions()).toEqual({ threshold: 0.2, topK: 3, literalSimilarity: 1 });
  });

  it('rejects out-of-range settings', () => {
    expect(() => createMapperOptions({ threshold: 1.5 })).toThrow(ConfigurationError);
    expect(() => createMapperOptions({ threshold: Number.NaN })).toThrow(ConfigurationError);
    expect(() => createMapperOptions({ topK: 0 })).toThrow('topK must be a positive integer, got 0');
    expect(() => createMapperOptions({ topK: 1.5 })).toThrow(ConfigurationError);
    expect(() => createMapperOptions({ literalSimilarity: -2 })).toThrow(ConfigurationError);
  });
});
