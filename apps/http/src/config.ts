/**
 * Service configuration, parsed once from the environment at startup.
 *
 * Invalid values fail startup with a ConfigurationError listing every issue.
 */

import { z } from 'zod';
import { ConfigurationError, DEFAULT_ALLOWED_OPERATORS, OperatorEnum } from '@lexirule/core';

const booleanString = z
  .union([z.boolean(), z.string()])
  .transform((val) => {
    if (typeof val === 'boolean') return val;
    const lower = val.toLowerCase().trim();
    return lower === 'true' || lower === '1' || lower === 'yes';
  });

const csvOperators = z
  .string()
  .transform((s) => s.split(',').map((x) => x.trim()).filter(Boolean))
  .pipe(z.array(OperatorEnum).min(1));

const unitInterval = z.coerce.number().min(-1).max(1);

const ConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  CORS_ORIGIN: z.string().default(''),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(600),

  KEYS_PATH: z.string().optional(),
  POLICY_DOCS_PATH: z.string().optional(),

  SIMILARITY_THRESHOLD: unitInterval.default(0.2),
  SIMILARITY_TOP_K: z.coerce.number().int().positive().default(3),
  LITERAL_MATCH_SIMILARITY: unitInterval.default(1),
  MAX_PHRASE_WORDS: z.coerce.number().int().positive().max(8).default(3),
  MAX_CANDIDATES: z.coerce.number().int().positive().default(64),

  MAX_EXPRESSION_DEPTH: z.coerce.number().int().positive().max(256).default(10),
  MAX_RULE_SIZE: z.coerce.number().int().positive().default(5000),
  ALLOWED_OPERATORS: csvOperators.optional(),
  RESTRICT_TO_MAPPED_KEYS: booleanString.default(false),

  EMBEDDING_PROVIDER: z.enum(['hashing', 'openai']).default('hashing'),
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(256),

  LLM_PROVIDER: z.enum(['fixtures', 'openai']).default('fixtures'),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  RAG_TOP_K: z.coerce.number().int().positive().default(3),
  RAG_THRESHOLD: unitInterval.default(0.5)
});

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  server: { host: string; port: number; corsOrigins: string[]; rateLimitMax: number };
  logLevel: string;
  paths: { keys?: string; policyDocs?: string };
  mapping: {
    threshold: number;
    topK: number;
    literalSimilarity: number;
    maxPhraseWords: number;
    maxCandidates: number;
  };
  validation: {
    maxDepth: number;
    maxRuleSize: number;
    allowedOperators: string[];
    restrictToMappedKeys: boolean;
  };
  embedding: { provider: 'hashing' | 'openai'; model: string; dimension: number };
  llm: { provider: 'fixtures' | 'openai'; model: string; temperature: number; timeoutMs: number };
  openaiApiKey?: string;
  rag: { topK: number; threshold: number };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // empty strings mean "unset" so defaults apply
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const parsed = ConfigSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => ({ variable: i.path.join('.'), msg: i.message }));
    throw new ConfigurationError('Invalid configuration', { issues });
  }
  const c = parsed.data;

  if ((c.EMBEDDING_PROVIDER === 'openai' || c.LLM_PROVIDER === 'openai') && !c.OPENAI_API_KEY) {
    throw new ConfigurationError('OPENAI_API_KEY is required when an openai provider is selected');
  }

  return {
    env: c.NODE_ENV,
    server: {
      host: c.HOST,
      port: c.PORT,
      corsOrigins: c.CORS_ORIGIN.split(',').map((s) => s.trim()).filter(Boolean),
      rateLimitMax: c.RATE_LIMIT_MAX
    },
    logLevel: c.LOG_LEVEL,
    paths: { keys: c.KEYS_PATH, policyDocs: c.POLICY_DOCS_PATH },
    mapping: {
      threshold: c.SIMILARITY_THRESHOLD,
      topK: c.SIMILARITY_TOP_K,
      literalSimilarity: c.LITERAL_MATCH_SIMILARITY,
      maxPhraseWords: c.MAX_PHRASE_WORDS,
      maxCandidates: c.MAX_CANDIDATES
    },
    validation: {
      maxDepth: c.MAX_EXPRESSION_DEPTH,
      maxRuleSize: c.MAX_RULE_SIZE,
      allowedOperators: c.ALLOWED_OPERATORS ?? [...DEFAULT_ALLOWED_OPERATORS],
      restrictToMappedKeys: c.RESTRICT_TO_MAPPED_KEYS
    },
    embedding: { provider: c.EMBEDDING_PROVIDER, model: c.EMBEDDING_MODEL, dimension: c.EMBEDDING_DIMENSION },
    llm: { provider: c.LLM_PROVIDER, model: c.OPENAI_MODEL, temperature: c.OPENAI_TEMPERATURE, timeoutMs: c.OPENAI_TIMEOUT_MS },
    ...(c.OPENAI_API_KEY ? { openaiApiKey: c.OPENAI_API_KEY } : {}),
    rag: { topK: c.RAG_TOP_K, threshold: c.RAG_THRESHOLD }
  };
}
