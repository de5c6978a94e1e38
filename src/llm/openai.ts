import OpenAI from 'openai';
import { logger } from '../shared/logger';
import type { GeneratorOptions, TextGenerator } from './types';

export class OpenAITextGenerator implements TextGenerator {
  readonly provider = 'openai' as const;
  readonly model: string;
  private readonly client: OpenAI;

  constructor(options: GeneratorOptions) {
    this.model = options.model;
    this.client = new OpenAI({ apiKey: options.apiKey, timeout: options.timeout, maxRetries: 0 });
    logger.debug('LLM', 'Initialized OpenAI client', { model: this.model });
  }

  async generate(prompt: string): Promise<string> {
    logger.llm('request', this.provider, { model: this.model, promptChars: prompt.length });
    const response = await this.client.responses.create({
      model: this.model,
      input: prompt,
      store: false,
    });
    logger.llm('response', this.provider, { status: response.status ?? null });
    return response.output_text;
  }
}
