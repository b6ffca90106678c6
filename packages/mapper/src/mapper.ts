// packages/mapper/src/mapper.ts
import type { KeyMapping, MappingOutcome, PhraseCandidate, RejectedPhrase } from '@lexirule/core';
import { ConfigurationError } from '@lexirule/core';
import type { VocabularyRegistry } from '@lexirule/vocab';
import { rankKeys } from './scorer';

export interface MapperOptions {
  threshold: number;          // accept when similarity >= threshold
  topK: number;               // suggestions kept per rejected phrase
  literalSimilarity: number;  // score given to verbatim identifiers
}

export const DEFAULT_MAPPER_OPTIONS: Readonly<MapperOptions> = Object.freeze({
  threshold: 0.2,
  topK: 3,
  literalSimilarity: 1.0
});

/** Phrase text → embedding, computed by the caller before mapping. */
export type PhraseVectors = ReadonlyMap<string, readonly number[]>;

function inUnitRange(x: number): boolean {
  return Number.isFinite(x) && x >= -1 && x <= 1;
}

/** Validates mapper settings once at startup. */
export function createMapperOptions(partial: Partial<MapperOptions> = {}): MapperOptions {
  const opts = { ...DEFAULT_MAPPER_OPTIONS, ...partial };
  if (!inUnitRange(opts.threshold)) {
    throw new ConfigurationError(`Similarity threshold must be within [-1, 1], got ${opts.threshold}`);
  }
  if (!Number.isInteger(opts.topK) || opts.topK < 1) {
    throw new ConfigurationError(`topK must be a positive integer, got ${opts.topK}`);
  }
  if (!inUnitRange(opts.literalSimilarity)) {
    throw new ConfigurationError(`Literal match similarity must be within [-1, 1], got ${opts.literalSimilarity}`);
  }
  return opts;
}

// literal candidates, and any other phrase spelled exactly like a key
function isIdentifier(c: PhraseCandidate, registry: VocabularyRegistry): boolean {
  return registry.has(c.text);
}

/** Distinct phrase texts that need an embedding (identifiers map to themselves). */
export function phrasesToEmbed(candidates: readonly PhraseCandidate[], registry: VocabularyRegistry): string[] {
  const out = new Set<string>();
  for (const c of candidates) {
    if (!isIdentifier(c, registry)) out.add(c.text);
  }
  return [...out];
}

type Span = readonly [number, number];

interface Accepted { mapping: KeyMapping; span: Span }

const overlaps = (a: Span, b: Span) => a[0] < b[1] && b[0] < a[1];

// best score first; on a tie the longer window, then the earlier one
function byStrength(a: Accepted, b: Accepted): number {
  if (a.mapping.similarity !== b.mapping.similarity) return b.mapping.similarity - a.mapping.similarity;
  const lenA = a.span[1] - a.span[0];
  const lenB = b.span[1] - b.span[0];
  if (lenA !== lenB) return lenB - lenA;
  return a.span[0] - b.span[0];
}

/**
 * Maps candidate phrases to their best registry keys. Overlapping windows of
 * one mention yield a single mapping: the strongest accepted window wins and
 * the windows it overlaps are dropped, rejected ones included. Phrases under
 * the threshold, or without a vector, produce no mapping. Each distinct
 * phrase text appears at most once in the outcome. Pure: safe to run
 * concurrently for independent requests.
 */
export function mapCandidates(
  candidates: readonly PhraseCandidate[],
  registry: VocabularyRegistry,
  vectors: PhraseVectors,
  options: MapperOptions = DEFAULT_MAPPER_OPTIONS
): MappingOutcome {
  const keys = registry.all();
  const scored = new Map<string, KeyMapping | RejectedPhrase | null>();

  const score = (c: PhraseCandidate): KeyMapping | RejectedPhrase | null => {
    if (isIdentifier(c, registry)) {
      return { user_phrase: c.text, mapped_to: c.text, similarity: options.literalSimilarity };
    }
    const vec = vectors.get(c.text);
    if (!vec || keys.length === 0) return null;
    if (vec.length !== registry.dimension) {
      throw new ConfigurationError(
        `Phrase embedding has dimension ${vec.length}; registry expects ${registry.dimension}`,
        { phrase: c.text }
      );
    }
    const ranked = rankKeys(vec, keys, options.topK);
    const best = ranked[0];
    return best.similarity >= options.threshold
      ? { user_phrase: c.text, mapped_to: best.identifier, similarity: best.similarity }
      : { user_phrase: c.text, best_similarity: best.similarity, suggestions: ranked };
  };

  const accepted: Accepted[] = [];
  const rejected: { phrase: RejectedPhrase; span: Span }[] = [];
  for (const c of candidates) {
    let result = scored.get(c.text);
    if (result === undefined) {
      result = score(c);
      scored.set(c.text, result);
    }
    if (!result) continue;
    if ('mapped_to' in result) accepted.push({ mapping: result, span: c.span });
    else rejected.push({ phrase: result, span: c.span });
  }

  const kept: Accepted[] = [];
  for (const a of [...accepted].sort(byStrength)) {
    if (!kept.some((k) => overlaps(k.span, a.span))) kept.push(a);
  }
  kept.sort((a, b) => a.span[0] - b.span[0]);

  const mappings: KeyMapping[] = [];
  const mappedTexts = new Set<string>();
  for (const k of kept) {
    if (mappedTexts.has(k.mapping.user_phrase)) continue;
    mappedTexts.add(k.mapping.user_phrase);
    mappings.push(k.mapping);
  }

  const warnings: RejectedPhrase[] = [];
  const warnedTexts = new Set<string>();
  for (const r of rejected) {
    if (warnedTexts.has(r.phrase.user_phrase) || kept.some((k) => overlaps(k.span, r.span))) continue;
    warnedTexts.add(r.phrase.user_phrase);
    warnings.push(r.phrase);
  }

  return { mappings, rejected: warnings };
}
