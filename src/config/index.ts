import { resolve } from 'node:path';
import { isProviderName, PROVIDERS, type ProviderName } from '../llm/types';
import { UsageError } from '../shared/errors';
import { isLogLevelName, type LogLevelName } from '../shared/logger';
import {
  API_KEY_ENV,
  DEFAULT_GIT_TIMEOUT_MS,
  DEFAULT_MODELS,
  DEFAULT_PROVIDER,
  DEFAULT_REQUEST_TIMEOUT_MS,
  ENV,
  MAX_TIMEOUT_MS,
} from './defaults';

export type CliFlags = Record<string, string | boolean>;
export type Env = Record<string, string | undefined>;

export interface DiffscribeConfig {
  provider: ProviderName;
  model: string;
  cwd: string;
  gitTimeoutMs: number;
  /** Only set when the operator gave a git timeout; commits otherwise run unbounded */
  commitTimeoutMs?: number;
  requestTimeoutMs: number;
  logLevel: LogLevelName;
  /** Name of the variable the API key is read from */
  apiKeyEnv: string;
  /** Undefined when the variable is unset or blank; checked lazily by createTextGenerator */
  apiKey?: string;
}

function stringFlag(flags: CliFlags, key: string): string | undefined {
  const v = flags[key];
  return typeof v === 'string' && v.trim() ? v.trim() : undefined;
}

function nonBlank(value: string | undefined): string | undefined {
  return value && value.trim() ? value.trim() : undefined;
}

function parseTimeout(raw: string | undefined, fallback: number, label: string): number {
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new UsageError(`Invalid ${label}: ${raw} (expected a positive number of milliseconds)`);
  }
  if (n > MAX_TIMEOUT_MS) {
    throw new UsageError(`Invalid ${label}: ${raw} (must not exceed ${MAX_TIMEOUT_MS} milliseconds)`);
  }
  return n;
}

/**
 * Resolve configuration: flags over environment over defaults.
 * Throws UsageError for values that cannot be used.
 */
export function resolveConfig(flags: CliFlags = {}, env: Env = process.env): DiffscribeConfig {
  const rawProvider = (stringFlag(flags, 'provider') ?? nonBlank(env[ENV.provider]) ?? DEFAULT_PROVIDER).toLowerCase();
  if (!isProviderName(rawProvider)) {
    throw new UsageError(`Unknown provider: ${rawProvider} (expected one of: ${PROVIDERS.join(', ')})`);
  }
  const provider = rawProvider;

  const model = stringFlag(flags, 'model') ?? nonBlank(env[ENV.model]) ?? DEFAULT_MODELS[provider];
  const cwd = resolve(stringFlag(flags, 'cwd') ?? process.cwd());

  const rawGitTimeout = stringFlag(flags, 'git-timeout') ?? nonBlank(env[ENV.gitTimeout]);
  const gitTimeoutMs = parseTimeout(rawGitTimeout, DEFAULT_GIT_TIMEOUT_MS, 'git timeout');
  const requestTimeoutMs = parseTimeout(
    stringFlag(flags, 'request-timeout') ?? nonBlank(env[ENV.requestTimeout]),
    DEFAULT_REQUEST_TIMEOUT_MS,
    'request timeout'
  );

  let logLevel: LogLevelName = 'WARN';
  const rawLevel = nonBlank(env[ENV.logLevel])?.toUpperCase();
  if (rawLevel) {
    if (!isLogLevelName(rawLevel)) throw new UsageError(`Invalid log level: ${rawLevel}`);
    logLevel = rawLevel;
  }
  if (flags.verbose === true) logLevel = 'DEBUG';

  const apiKeyEnv = API_KEY_ENV[provider];
  return {
    provider,
    model,
    cwd,
    gitTimeoutMs,
    commitTimeoutMs: rawGitTimeout === undefined ? undefined : gitTimeoutMs,
    requestTimeoutMs,
    logLevel,
    apiKeyEnv,
    apiKey: nonBlank(env[apiKeyEnv]),
  };
}
