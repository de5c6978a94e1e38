// Runtime defaults; each can be overridden by environment variable or flag

import type { ProviderName } from '../llm/types';

export const DEFAULT_PROVIDER: ProviderName = 'anthropic';

export const DEFAULT_MODELS: Record<ProviderName, string> = {
  anthropic: 'claude-sonnet-4-20250514',
  openai: 'gpt-5',
};

export const API_KEY_ENV: Record<ProviderName, string> = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
};

export const DEFAULT_GIT_TIMEOUT_MS = 30_000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;
// Largest delay a Node timer holds; anything above fires after 1 ms
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const ENV = {
  provider: 'DIFFSCRIBE_PROVIDER',
  model: 'DIFFSCRIBE_MODEL',
  gitTimeout: 'DIFFSCRIBE_GIT_TIMEOUT_MS',
  requestTimeout: 'DIFFSCRIBE_REQUEST_TIMEOUT_MS',
  logLevel: 'DIFFSCRIBE_LOG_LEVEL',
} as const;
