import { ConfigurationError } from '@lexirule/core';
import type { AppConfig } from '../config';
import { FixturesDrafter } from './fixtures';
import { OpenAIDrafter } from './openai';
import type { RuleDrafter } from './types';

export { FixturesDrafter } from './fixtures';
export { OpenAIDrafter, parseDraftReply, splitExplanation } from './openai';
export { buildSystemPrompt, buildUserPrompt } from './prompt';
export type { DraftInput, DraftedRule, RuleDrafter } from './types';

export function createDrafter(config: AppConfig): RuleDrafter {
  if (config.llm.provider === 'openai') {
    if (!config.openaiApiKey) throw new ConfigurationError('OPENAI_API_KEY is not set');
    return new OpenAIDrafter(config.openaiApiKey, config.llm.model, config.llm.temperature, config.llm.timeoutMs);
  }
  return new FixturesDrafter();
}
