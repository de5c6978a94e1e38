import type { TextGenerator } from '../llm/types';
import { GenerationError, errorMessage } from '../shared/errors';
import { logger } from '../shared/logger';
import { buildPrompt } from './prompt';
import type { SynthesisMode } from './types';

const QUOTES = new Set(['"', "'"]);

/**
 * Trim the reply and drop one matching pair of enclosing quotes.
 * Inner quotes and mismatched pairs are left alone.
 */
export function cleanGeneratedText(raw: string): string {
  let result = raw.trim();
  if (result.length >= 2) {
    const first = result[0];
    const last = result[result.length - 1];
    if (QUOTES.has(first) && first === last) {
      result = result.slice(1, -1);
    }
  }
  return result.trim();
}

/**
 * Send the diff to the generator once and return the cleaned text.
 * Rejects with GenerationError if the request fails or the reply is empty.
 */
export async function synthesize(generator: TextGenerator, diff: string, mode: SynthesisMode): Promise<string> {
  const prompt = buildPrompt(diff, mode);
  logger.debug('Workflow', 'synthesize', { mode, provider: generator.provider, promptChars: prompt.length });

  let raw: string;
  try {
    raw = await generator.generate(prompt);
  } catch (error) {
    throw new GenerationError(errorMessage(error), { cause: error });
  }

  const text = cleanGeneratedText(raw);
  if (!text) {
    throw new GenerationError(`${generator.provider} returned an empty response`);
  }
  return text;
}
