import type { DiffscribeConfig } from '../config';
import { MissingCredentialError } from '../shared/errors';
import { logger } from '../shared/logger';
import { AnthropicTextGenerator } from './anthropic';
import { OpenAITextGenerator } from './openai';
import type { GeneratorOptions, TextGenerator } from './types';

type GeneratorConfig = Pick<DiffscribeConfig, 'provider' | 'model' | 'requestTimeoutMs' | 'apiKeyEnv' | 'apiKey'>;

/**
 * Build the configured text generator.
 * Throws MissingCredentialError when the provider's API key is absent; no client is constructed in that case.
 */
export function createTextGenerator(config: GeneratorConfig): TextGenerator {
  if (!config.apiKey) {
    logger.error('Config', 'missing_credential', { provider: config.provider, env: config.apiKeyEnv });
    throw new MissingCredentialError(config.apiKeyEnv);
  }

  const options: GeneratorOptions = {
    apiKey: config.apiKey,
    model: config.model,
    timeout: config.requestTimeoutMs,
  };

  switch (config.provider) {
    case 'anthropic':
      return new AnthropicTextGenerator(options);
    case 'openai':
      return new OpenAITextGenerator(options);
  }
}
