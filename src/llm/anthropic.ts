import Anthropic from '@anthropic-ai/sdk';
import { logger } from '../shared/logger';
import type { GeneratorOptions, TextGenerator } from './types';

// Enough for a multi-file summary; a commit subject needs far less
const MAX_TOKENS = 1024;

export class AnthropicTextGenerator implements TextGenerator {
  readonly provider = 'anthropic' as const;
  readonly model: string;
  private readonly client: Anthropic;

  constructor(options: GeneratorOptions) {
    this.model = options.model;
    // No retry policy: a failed request surfaces directly
    this.client = new Anthropic({ apiKey: options.apiKey, timeout: options.timeout, maxRetries: 0 });
    logger.debug('LLM', 'Initialized Anthropic client', { model: this.model });
  }

  async generate(prompt: string): Promise<string> {
    logger.llm('request', this.provider, { model: this.model, promptChars: prompt.length });
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: MAX_TOKENS,
      messages: [{ role: 'user', content: prompt }],
    });

    const parts: string[] = [];
    for (const block of response.content) {
      if (block.type === 'text') parts.push(block.text);
    }
    logger.llm('response', this.provider, { stopReason: response.stop_reason, blocks: response.content.length });
    return parts.join('');
  }
}
