/* tests/helpers.ts */
import type { FastifyInstance } from 'fastify';
import type { KeysFile } from '@lexirule/core';
import type { AppContext } from '../apps/http/src/context';
import { buildRegistry, optionsFromConfig } from '../apps/http/src/context';
import { loadConfig } from '../apps/http/src/config';
import type { Embedder } from '../apps/http/src/embeddings';
import type { SnippetRetriever } from '../apps/http/src/retrieval';
import { EMPTY_RETRIEVER } from '../apps/http/src/retrieval';
import type { DraftInput, DraftedRule, RuleDrafter } from '../apps/http/src/drafting';
import { FixturesDrafter } from '../apps/http/src/drafting';

/**
 * Embedder backed by a fixed table; unknown texts embed to the zero vector,
 * which scores 0 against every key.
 */
export class TableEmbedder implements Embedder {
  readonly name = 'table';
  readonly calls: string[][] = [];

  constructor(readonly dimension: number, private readonly table: Record<string, number[]> = {}) {}

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map((t) => this.table[t] ?? new Array<number>(this.dimension).fill(0));
  }
}

/** Drafter that returns a canned rule and records what it was given. */
export class StubDrafter implements RuleDrafter {
  readonly name = 'stub';
  readonly inputs: DraftInput[] = [];

  constructor(private readonly reply: DraftedRule | (() => Promise<DraftedRule>)) {}

  async draft(input: DraftInput): Promise<DraftedRule> {
    this.inputs.push(input);
    return typeof this.reply === 'function' ? this.reply() : this.reply;
  }
}

export const TEST_KEYS: KeysFile = {
  keys: [
    { key: 'bureau.score', type: 'number', embedding: [1, 0, 0] },
    { key: 'business.vintage_in_years', type: 'number', embedding: [0, 1, 0] },
    { key: 'primary_applicant.is_existing_customer', type: 'boolean', embedding: [0, 0, 1] }
  ]
};

// cos([0.85, sqrt(1 - 0.85²), 0], bureau.score) = 0.85
export const BUREAU_SCORE_PHRASE: number[] = [0.85, Math.sqrt(1 - 0.85 * 0.85), 0];

export interface TestContextOptions {
  keys?: KeysFile;
  embedder?: Embedder;
  drafter?: RuleDrafter;
  retriever?: SnippetRetriever;
  env?: Record<string, string>;
}

export async function buildTestContext(opts: TestContextOptions = {}): Promise<AppContext> {
  const config = loadConfig({ NODE_ENV: 'test', LOG_LEVEL: 'silent', ...opts.env });
  const embedder = opts.embedder ?? new TableEmbedder(3, { 'bureau score': BUREAU_SCORE_PHRASE });
  const registry = await buildRegistry(opts.keys ?? TEST_KEYS, embedder);
  return {
    config,
    registry,
    embedder,
    retriever: opts.retriever ?? EMPTY_RETRIEVER,
    drafter: opts.drafter ?? new FixturesDrafter(),
    ...optionsFromConfig(config)
  };
}

export async function injectJson(
  app: FastifyInstance,
  method: 'GET' | 'POST',
  url: string,
  body?: unknown,
  headers: Record<string, string> = {}
): Promise<{ status: number; json: Record<string, unknown>; headers: Record<string, unknown> }> {
  const res = await app.inject({
    method,
    url,
    headers: body === undefined ? headers : { 'content-type': 'application/json', ...headers },
    ...(body === undefined ? {} : { payload: JSON.stringify(body) })
  });
  const parsed: unknown = res.body ? JSON.parse(res.body) : {};
  const json = typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
    ? Object.fromEntries(Object.entries(parsed))
    : { value: parsed };
  return { status: res.statusCode, json, headers: res.headers };
}
