// packages/core/src/schemas.ts
import { z } from 'zod';
import { ALL_OPERATORS } from './types';

export const ValueTypeEnum = z.enum(['number', 'string', 'boolean', 'list']);
export const OperatorEnum = z.enum(ALL_OPERATORS);

// keys.json
export const KeyFileEntry = z.object({
  key: z.string().min(1).regex(/^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/, 'key must be a dot-delimited identifier'),
  type: ValueTypeEnum.optional(),
  description: z.string().optional(),
  embedding: z.array(z.number()).optional()
}).strict();

export const KeysFileSchema = z.object({
  version: z.string().optional(),
  keys: z.array(KeyFileEntry)
}).strict();
export type KeysFile = z.infer<typeof KeysFileSchema>;

// One node of the expression tree, operands left unparsed. Trees arrive from
// callers unbounded, so the walk over them lives in the decoder, which stops
// at the configured depth.
const ScalarSchema = z.union([z.boolean(), z.number(), z.string()]);

export const ExpressionNodeShape = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('var'), key: z.string().min(1) }).strict(),
  z.object({ kind: z.literal('literal'), value: z.union([ScalarSchema, z.array(ScalarSchema)]) }).strict(),
  z.object({ kind: z.literal('op'), operator: z.string(), operands: z.array(z.unknown()) }).strict()
]);
export type ExpressionNodeShape = z.infer<typeof ExpressionNodeShape>;

// ---- HTTP request bodies ----
export const GenerateRuleRequestSchema = z.object({
  prompt: z.string().trim().min(1).max(5000),
  context_docs: z.array(z.string()).optional()
}).strict();
export type GenerateRuleRequest = z.infer<typeof GenerateRuleRequestSchema>;

export const MapRequestSchema = z.object({
  prompt: z.string().trim().min(1).max(5000)
}).strict();

export const ValidateRequestSchema = z.object({
  json_logic: z.unknown().optional(),
  expression: z.unknown().optional(),
  mapped_keys: z.array(z.string()).optional()
}).strict().refine(
  (b) => (b.json_logic === undefined) !== (b.expression === undefined),
  { message: 'exactly one of json_logic or expression is required' }
);
export type ValidateRequest = z.infer<typeof ValidateRequestSchema>;

// ---- drafting collaborator response ----
export const DraftResponseSchema = z.object({
  json_logic: z.unknown(),
  explanation: z.union([z.string(), z.array(z.string())]).optional()
}).passthrough();
