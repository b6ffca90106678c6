// apps/http/src/embeddings.ts
// Embedding collaborators. The core only ever sees the vectors they return.

import OpenAI from 'openai';
import { ConfigurationError, EmbeddingError } from '@lexirule/core';
import type { AppConfig } from './config';

export interface Embedder {
  readonly name: string;
  readonly dimension: number;
  embed(texts: string[]): Promise<number[][]>;
}

// ---------- hashing (offline, deterministic) ----------
function fnv1a(s: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

function l2normalize(v: number[]): number[] {
  const n = Math.sqrt(v.reduce((a, x) => a + x * x, 0));
  return n === 0 ? v : v.map((x) => x / n);
}

/**
 * Feature hashing over lower-cased word tokens and their character trigrams.
 * Texts sharing words land close together; no model or network needed.
 */
export class HashingEmbedder implements Embedder {
  readonly name = 'hashing';

  constructor(readonly dimension = 256) {}

  embedOne(text: string): number[] {
    const vec = new Array<number>(this.dimension).fill(0);
    const tokens = text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
    for (const tok of tokens) {
      vec[fnv1a(`w:${tok}`) % this.dimension] += 1;
      const padded = `#${tok}#`;
      for (let i = 0; i + 3 <= padded.length; i++) {
        vec[fnv1a(`g:${padded.slice(i, i + 3)}`) % this.dimension] += 0.5;
      }
    }
    return l2normalize(vec);
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((t) => this.embedOne(t));
  }
}

// ---------- OpenAI ----------
const OPENAI_BATCH = 256;

export class OpenAIEmbedder implements Embedder {
  readonly name = 'openai';
  private readonly client: OpenAI;

  constructor(
    apiKey: string,
    private readonly model: string,
    readonly dimension: number,
    timeoutMs = 30_000
  ) {
    this.client = new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: 2 });
  }

  async embed(texts: string[]): Promise<number[][]> {
    const out: number[][] = [];
    for (let i = 0; i < texts.length; i += OPENAI_BATCH) {
      const batch = texts.slice(i, i + OPENAI_BATCH);
      try {
        const res = await this.client.embeddings.create({
          model: this.model,
          input: batch,
          dimensions: this.dimension
        });
        const ordered = [...res.data].sort((a, b) => a.index - b.index);
        for (const d of ordered) out.push(d.embedding);
      } catch (e) {
        throw new EmbeddingError(`Embedding request failed: ${e instanceof Error ? e.message : String(e)}`, {
          model: this.model,
          batchSize: batch.length
        });
      }
    }
    return out;
  }
}

export function createEmbedder(config: AppConfig): Embedder {
  if (config.embedding.provider === 'openai') {
    if (!config.openaiApiKey) throw new ConfigurationError('OPENAI_API_KEY is not set');
    return new OpenAIEmbedder(config.openaiApiKey, config.embedding.model, config.embedding.dimension, config.llm.timeoutMs);
  }
  return new HashingEmbedder(config.embedding.dimension);
}

/** Embeds distinct texts and returns them keyed by text. */
export async function embedAll(embedder: Embedder, texts: string[]): Promise<Map<string, number[]>> {
  const unique = [...new Set(texts)];
  if (unique.length === 0) return new Map();
  const vectors = await embedder.embed(unique);
  if (vectors.length !== unique.length) {
    throw new EmbeddingError(`Embedder returned ${vectors.length} vectors for ${unique.length} texts`);
  }
  return new Map(unique.map((t, i) => [t, vectors[i]]));
}
