// apps/http/src/pipeline.ts
// extract → embed → map → aggregate; retrieve → draft → decode → validate

import type { KeyMapping, MappingOutcome, ValidationError, ValidationResult } from '@lexirule/core';
import { Defects } from '@lexirule/core';
import type { DecodeOptions, DecodeResult } from '@lexirule/jsonlogic';
import { decodeExpressionTree, decodeJsonLogic, ruleSize } from '@lexirule/jsonlogic';
import { aggregateConfidence, extractPhrases, mapCandidates, phrasesToEmbed } from '@lexirule/mapper';
import { validateExpression } from '@lexirule/validator';
import type { AppContext } from './context';
import { embedAll } from './embeddings';

export interface MappingReport extends MappingOutcome {
  confidence: number;
  candidates: number;
}

export async function mapPrompt(ctx: AppContext, prompt: string): Promise<MappingReport> {
  const candidates = extractPhrases(prompt, ctx.registry.identifiers(), ctx.extractOptions);
  const vectors = await embedAll(ctx.embedder, phrasesToEmbed(candidates, ctx.registry));
  const outcome = mapCandidates(candidates, ctx.registry, vectors, ctx.mapperOptions);
  return { ...outcome, confidence: aggregateConfidence(outcome.mappings), candidates: candidates.length };
}

function invalid(errors: ValidationError[]): ValidationResult {
  return Object.freeze({ valid: false, usedKeys: Object.freeze([]), errors: Object.freeze(errors) });
}

function sizeDefects(ctx: AppContext, rule: unknown): ValidationError[] {
  const max = ctx.config.validation.maxRuleSize;
  const size = ruleSize(rule);
  if (size === undefined) return [Defects.SIZE_UNMEASURABLE(max)];
  return size > max ? [Defects.SIZE_EXCEEDED(size, max)] : [];
}

function checkDecoded(
  ctx: AppContext,
  rule: unknown,
  decode: (value: unknown, opts: DecodeOptions) => DecodeResult,
  mappedKeys?: Iterable<string>
): ValidationResult {
  const sizeErrors = sizeDefects(ctx, rule);

  // the decoder stops where the validator would, so neither walks past maxDepth
  const decoded = decode(rule, { maxDepth: ctx.validatorOptions.maxDepth });
  if (!decoded.ok) return invalid([...sizeErrors, ...decoded.errors]);

  const options = mappedKeys
    ? { ...ctx.validatorOptions, mappedKeys: new Set(mappedKeys) }
    : ctx.validatorOptions;
  const result = validateExpression(decoded.node, ctx.registry, options);
  if (sizeErrors.length === 0) return result;
  return Object.freeze({
    valid: false,
    usedKeys: result.usedKeys,
    errors: Object.freeze([...sizeErrors, ...result.errors])
  });
}

/** Decodes a drafted JSON Logic rule and validates it against the registry. */
export function validateRule(ctx: AppContext, rule: unknown, mappedKeys?: Iterable<string>): ValidationResult {
  return checkDecoded(ctx, rule, decodeJsonLogic, mappedKeys);
}

/** Same checks for a rule sent as a tagged expression tree. */
export function validateTree(ctx: AppContext, tree: unknown, mappedKeys?: Iterable<string>): ValidationResult {
  return checkDecoded(ctx, tree, decodeExpressionTree, mappedKeys);
}

// ---------- wire shapes ----------
const round4 = (x: number) => Math.round(x * 1e4) / 1e4;

export function serializeMappings(mappings: readonly KeyMapping[]) {
  return mappings.map((m) => ({ user_phrase: m.user_phrase, mapped_to: m.mapped_to, similarity: round4(m.similarity) }));
}

export function serializeMappingReport(report: MappingReport) {
  return {
    key_mappings: serializeMappings(report.mappings),
    confidence_score: round4(report.confidence),
    mapping_warnings: report.rejected.map((r) => ({
      user_phrase: r.user_phrase,
      best_similarity: round4(r.best_similarity),
      suggestions: r.suggestions.map((s) => s.identifier)
    }))
  };
}

export function serializeValidation(result: ValidationResult) {
  return { valid: result.valid, used_keys: [...result.usedKeys], errors: [...result.errors] };
}

export interface GenerateTimings {
  mapMs: number;
  retrieveMs: number;
  draftMs: number;
  validateMs: number;
}

export async function generateRule(
  ctx: AppContext,
  input: { prompt: string; contextDocs?: string[] },
  opts: { signal?: AbortSignal } = {}
) {
  const t0 = Date.now();
  const report = await mapPrompt(ctx, input.prompt);
  const t1 = Date.now();
  const snippets = await ctx.retriever.retrieve(input.prompt);
  const t2 = Date.now();

  const draft = await ctx.drafter.draft(
    {
      prompt: input.prompt,
      keys: ctx.registry.all(),
      allowedOperators: [...ctx.validatorOptions.allowedOperators],
      mappings: report.mappings,
      snippets,
      contextDocs: input.contextDocs ?? []
    },
    { signal: opts.signal }
  );
  const t3 = Date.now();

  const mappedKeys = ctx.config.validation.restrictToMappedKeys
    ? report.mappings.map((m) => m.mapped_to)
    : undefined;
  const validation = validateRule(ctx, draft.rule, mappedKeys);
  const t4 = Date.now();

  const timings: GenerateTimings = { mapMs: t1 - t0, retrieveMs: t2 - t1, draftMs: t3 - t2, validateMs: t4 - t3 };
  return {
    body: {
      json_logic: draft.rule,
      explanation: draft.explanation,
      used_keys: [...validation.usedKeys],
      ...serializeMappingReport(report),
      validation: serializeValidation(validation)
    },
    report,
    validation,
    snippets: snippets.length,
    timings
  };
}
