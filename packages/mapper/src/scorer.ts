// packages/mapper/src/scorer.ts
// Scoring primitives: cosine, ranked top-k with deterministic ties, confidence mean

import type { CanonicalKey, KeyMapping, KeySuggestion } from '@lexirule/core';
import { ConfigurationError } from '@lexirule/core';

// ----------------------
// Cosine similarity with guards
// ----------------------
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new ConfigurationError(`Embedding dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0, na = 0, nb = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i], y = b[i];
    dot += x * y; na += x * x; nb += y * y;
  }
  if (na === 0 || nb === 0) return 0;
  const sim = dot / (Math.sqrt(na) * Math.sqrt(nb));
  // rounding can push a parallel pair a hair past 1
  return Math.max(-1, Math.min(1, sim));
}

// ----------------------
// Ordering: higher similarity first, then lexicographically smaller identifier
// ----------------------
export function compareSuggestions(a: KeySuggestion, b: KeySuggestion): number {
  if (b.similarity !== a.similarity) return b.similarity - a.similarity;
  return a.identifier < b.identifier ? -1 : a.identifier > b.identifier ? 1 : 0;
}

export function pickTopK<T>(arr: readonly T[], k: number, cmp: (a: T, b: T) => number): T[] {
  return arr.slice().sort(cmp).slice(0, Math.max(0, k));
}

/** Scores a vector against every key by linear scan and returns the best k. */
export function rankKeys(
  vector: readonly number[],
  keys: readonly CanonicalKey[],
  k: number
): KeySuggestion[] {
  const scored = keys.map((key) => ({
    identifier: key.identifier,
    similarity: cosineSimilarity(vector, key.embedding)
  }));
  return pickTopK(scored, k, compareSuggestions);
}

// ----------------------
// Confidence: arithmetic mean of accepted similarities
// ----------------------
export function aggregateConfidence(mappings: readonly Pick<KeyMapping, 'similarity'>[]): number {
  if (mappings.length === 0) return 0;
  let sum = 0;
  for (const m of mappings) sum += m.similarity;
  return sum / mappings.length;
}
