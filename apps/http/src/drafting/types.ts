import type { CanonicalKey, KeyMapping } from '@lexirule/core';

export interface DraftInput {
  prompt: string;
  keys: readonly CanonicalKey[];
  allowedOperators: readonly string[];
  mappings: readonly KeyMapping[];
  snippets: readonly string[];     // retrieved policy text
  contextDocs: readonly string[];  // caller-supplied context
}

export interface DraftedRule {
  rule: unknown;            // JSON Logic as returned; decoded and validated downstream
  explanation: string[];
}

export interface RuleDrafter {
  readonly name: string;
  draft(input: DraftInput, opts?: { signal?: AbortSignal }): Promise<DraftedRule>;
}
