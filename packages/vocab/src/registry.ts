// packages/vocab/src/registry.ts
import type { CanonicalKey, KeyEntry } from '@lexirule/core';
import { ConfigurationError, DuplicateKeyError } from '@lexirule/core';

/**
 * Closed, read-only set of canonical keys with their embeddings.
 *
 * Built once at startup; every key and embedding is frozen, so any number of
 * concurrent requests may read it without coordination.
 */
export class VocabularyRegistry {
  private readonly byId: ReadonlyMap<string, CanonicalKey>;
  private readonly ordered: readonly CanonicalKey[];
  readonly dimension: number;

  private constructor(ordered: readonly CanonicalKey[], dimension: number) {
    this.ordered = ordered;
    this.byId = new Map(ordered.map((k) => [k.identifier, k]));
    this.dimension = dimension;
  }

  static load(entries: Iterable<KeyEntry>): VocabularyRegistry {
    const seen = new Set<string>();
    const keys: CanonicalKey[] = [];
    let dimension = 0;

    for (const e of entries) {
      if (seen.has(e.identifier)) throw new DuplicateKeyError(e.identifier);
      seen.add(e.identifier);

      if (e.embedding.length === 0) {
        throw new ConfigurationError(`Key ${e.identifier} has a zero-dimension embedding`, { identifier: e.identifier });
      }
      if (!e.embedding.every(Number.isFinite)) {
        throw new ConfigurationError(`Key ${e.identifier} has a non-finite embedding component`, { identifier: e.identifier });
      }
      if (dimension === 0) dimension = e.embedding.length;
      else if (e.embedding.length !== dimension) {
        throw new ConfigurationError(
          `Embedding dimension mismatch for ${e.identifier}: expected ${dimension}, got ${e.embedding.length}`,
          { identifier: e.identifier, expected: dimension, actual: e.embedding.length }
        );
      }

      const key: CanonicalKey = {
        identifier: e.identifier,
        embedding: Object.freeze([...e.embedding]),
        ...(e.type ? { type: e.type } : {}),
        ...(e.description ? { description: e.description } : {})
      };
      keys.push(Object.freeze(key));
    }

    return new VocabularyRegistry(Object.freeze(keys), dimension);
  }

  lookup(identifier: string): CanonicalKey | undefined {
    return this.byId.get(identifier);
  }

  has(identifier: string): boolean {
    return this.byId.has(identifier);
  }

  /** Keys in load order. */
  all(): readonly CanonicalKey[] {
    return this.ordered;
  }

  identifiers(): string[] {
    return this.ordered.map((k) => k.identifier);
  }

  get size(): number {
    return this.ordered.length;
  }
}
