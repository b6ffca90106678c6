// apps/http/src/retrieval.ts
// Policy snippet retrieval used to bias drafting. Chunks are embedded once at
// startup and searched by linear cosine scan.

import fs from 'node:fs';
import { cosineSimilarity } from '@lexirule/mapper';
import { log } from '@lexirule/core';
import type { Embedder } from './embeddings';

export interface PolicyChunk {
  section: string;
  text: string;
}

export interface RetrieverOptions {
  topK: number;
  threshold: number;
  chunkSize?: number;
}

export interface SnippetRetriever {
  readonly size: number;
  retrieve(query: string): Promise<string[]>;
}

/** Splits markdown on "##" headings, then packs each section's lines into ~chunkSize chunks. */
export function chunkPolicyMarkdown(content: string, chunkSize = 500): PolicyChunk[] {
  const chunks: PolicyChunk[] = [];
  for (const raw of content.split('##')) {
    const section = raw.trim();
    if (!section) continue;
    const [title, ...lines] = section.split('\n');
    let current = '';
    for (const line of lines) {
      if (current.length + line.length > chunkSize && current) {
        chunks.push({ section: title.trim(), text: current.trim() });
        current = line;
      } else {
        current += '\n' + line;
      }
    }
    if (current.trim()) chunks.push({ section: title.trim(), text: current.trim() });
  }
  return chunks;
}

export class PolicyRetriever implements SnippetRetriever {
  private constructor(
    private readonly chunks: PolicyChunk[],
    private readonly vectors: number[][],
    private readonly embedder: Embedder,
    private readonly opts: RetrieverOptions
  ) {}

  static async fromMarkdown(content: string, embedder: Embedder, opts: RetrieverOptions): Promise<PolicyRetriever> {
    const chunks = chunkPolicyMarkdown(content, opts.chunkSize);
    const vectors = chunks.length ? await embedder.embed(chunks.map((c) => c.text)) : [];
    return new PolicyRetriever(chunks, vectors, embedder, opts);
  }

  static async fromFile(path: string | undefined, embedder: Embedder, opts: RetrieverOptions): Promise<SnippetRetriever> {
    if (!path || !fs.existsSync(path)) {
      log.warn({ path: path ?? 'unset' }, 'policy-docs-missing; retrieval disabled');
      return EMPTY_RETRIEVER;
    }
    const retriever = await PolicyRetriever.fromMarkdown(fs.readFileSync(path, 'utf-8'), embedder, opts);
    log.info({ path, chunks: retriever.size }, 'policy-docs-indexed');
    return retriever;
  }

  get size(): number {
    return this.chunks.length;
  }

  async retrieve(query: string): Promise<string[]> {
    if (this.chunks.length === 0 || !query.trim()) return [];
    const [qv] = await this.embedder.embed([query]);
    return this.vectors
      .map((vec, index) => ({ index, similarity: cosineSimilarity(qv, vec) }))
      .filter((s) => s.similarity >= this.opts.threshold)
      .sort((a, b) => b.similarity - a.similarity || a.index - b.index)
      .slice(0, this.opts.topK)
      .map((s) => this.chunks[s.index].text);
  }
}

export const EMPTY_RETRIEVER: SnippetRetriever = {
  size: 0,
  retrieve: async () => []
};
