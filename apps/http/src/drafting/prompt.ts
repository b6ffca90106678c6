import type { DraftInput } from './types';

function describeKey(k: DraftInput['keys'][number]): string {
  const meta = [k.type, k.description].filter(Boolean).join(', ');
  return meta ? `- "${k.identifier}" (${meta})` : `- "${k.identifier}"`;
}

export function buildSystemPrompt(input: Omit<DraftInput, 'prompt' | 'mappings'>): string {
  const sections = [
    'You translate business rules written in plain English into JSON Logic.',
    '',
    `Operators you may use: ${input.allowedOperators.join(', ')}.`,
    'Reference data only through {"var": "<key>"} with one of these keys:',
    ...input.keys.map(describeKey),
    '',
    'Constraints:',
    '- never invent keys or operators outside the lists above',
    '- the right-hand side of "in" must be a literal array',
    '- write negation as {"!": <expr>}',
    '',
    'Reply with a single JSON object:',
    '{ "json_logic": { ... }, "explanation": ["one short sentence per condition"] }'
  ];

  if (input.snippets.length) {
    sections.push('', 'Relevant policy excerpts:', ...input.snippets.map((s) => `- ${s}`));
  }
  if (input.contextDocs.length) {
    sections.push('', 'Additional context supplied with the request:', ...input.contextDocs);
  }
  return sections.join('\n');
}

/** User message: the rule itself plus the phrase → key hints found by the mapper. */
export function buildUserPrompt(input: Pick<DraftInput, 'prompt' | 'mappings'>): string {
  if (input.mappings.length === 0) return input.prompt;
  const hints = input.mappings.map((m) => `- "${m.user_phrase}" → ${m.mapped_to}`);
  return [input.prompt, '', 'Phrase hints:', ...hints].join('\n');
}
