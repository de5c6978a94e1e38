export type ProviderName = 'anthropic' | 'openai';

export const PROVIDERS: readonly ProviderName[] = ['anthropic', 'openai'];

export function isProviderName(value: string): value is ProviderName {
  return value === 'anthropic' || value === 'openai';
}

/**
 * A configured text-generation capability: one prompt in, one completion out.
 * Rejects on transport or service errors.
 */
export interface TextGenerator {
  readonly provider: ProviderName;
  readonly model: string;
  generate(prompt: string): Promise<string>;
}

export interface GeneratorOptions {
  apiKey: string;
  model: string;
  /** Request timeout in milliseconds */
  timeout: number;
}
