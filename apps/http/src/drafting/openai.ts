import OpenAI from 'openai';
import { DraftResponseSchema, DraftingError } from '@lexirule/core';
import { buildSystemPrompt, buildUserPrompt } from './prompt';
import type { DraftInput, DraftedRule, RuleDrafter } from './types';

export function splitExplanation(explanation: string | string[] | undefined): string[] {
  if (explanation === undefined) return [];
  const lines = Array.isArray(explanation) ? explanation : explanation.split(/(?<=[.!?])\s+/);
  return lines.map((l) => l.trim()).filter(Boolean);
}

/** Parses the model's reply; anything but a JSON object with json_logic is a drafting failure. */
export function parseDraftReply(content: string | null | undefined): DraftedRule {
  if (!content) throw new DraftingError('Drafting model returned an empty reply');
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch {
    throw new DraftingError('Drafting model reply is not valid JSON', { preview: content.slice(0, 200) });
  }
  const parsed = DraftResponseSchema.safeParse(json);
  if (!parsed.success || parsed.data.json_logic === undefined) {
    throw new DraftingError('Drafting model reply lacks json_logic', { preview: content.slice(0, 200) });
  }
  return { rule: parsed.data.json_logic, explanation: splitExplanation(parsed.data.explanation) };
}

export class OpenAIDrafter implements RuleDrafter {
  readonly name = 'openai';
  private readonly client: OpenAI;

  constructor(
    apiKey: string,
    private readonly model: string,
    private readonly temperature: number,
    timeoutMs: number
  ) {
    this.client = new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: 1 });
  }

  async draft(input: DraftInput, opts: { signal?: AbortSignal } = {}): Promise<DraftedRule> {
    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          temperature: this.temperature,
          response_format: { type: 'json_object' },
          messages: [
            { role: 'system', content: buildSystemPrompt(input) },
            { role: 'user', content: buildUserPrompt(input) }
          ]
        },
        { signal: opts.signal }
      );
      content = response.choices[0]?.message?.content;
    } catch (e) {
      throw new DraftingError(`Drafting request failed: ${e instanceof Error ? e.message : String(e)}`, { model: this.model });
    }
    return parseDraftReply(content);
  }
}
