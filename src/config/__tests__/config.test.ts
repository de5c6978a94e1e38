import { resolve } from 'node:path';
import { UsageError } from '../../shared/errors';
import { resolveConfig } from '..';

describe('resolveConfig', () => {
  it('falls back to defaults', () => {
    const config = resolveConfig({}, {});

    expect(config).toEqual({
      provider: 'anthropic',
      model: 'claude-sonnet-4-20250514',
      cwd: process.cwd(),
      gitTimeoutMs: 30000,
      commitTimeoutMs: undefined,
      requestTimeoutMs: 60000,
      logLevel: 'WARN',
      apiKeyEnv: 'ANTHROPIC_API_KEY',
      apiKey: undefined,
    });
  });

  it('reads provider, model, timeouts and key from the environment', () => {
    const config = resolveConfig({}, {
      DIFFSCRIBE_PROVIDER: 'OpenAI',
      DIFFSCRIBE_MODEL: 'gpt-5-mini',
      DIFFSCRIBE_GIT_TIMEOUT_MS: '5000',
      DIFFSCRIBE_REQUEST_TIMEOUT_MS: '15000',
      DIFFSCRIBE_LOG_LEVEL: 'info',
      OPENAI_API_KEY: 'test-secret',
      ANTHROPIC_API_KEY: 'other-secret',
    });

    expect(config.provider).toBe('openai');
    expect(config.model).toBe('gpt-5-mini');
    expect(config.gitTimeoutMs).toBe(5000);
    expect(config.commitTimeoutMs).toBe(5000);
    expect(config.requestTimeoutMs).toBe(15000);
    expect(config.logLevel).toBe('INFO');
    expect(config.apiKeyEnv).toBe('OPENAI_API_KEY');
    expect(config.apiKey).toBe('test-secret');
  });

  it('lets flags override the environment', () => {
    const config = resolveConfig(
      { provider: 'anthropic', model: 'claude-3-5-haiku-latest', cwd: 'repo', 'git-timeout': '100', verbose: true },
      { DIFFSCRIBE_PROVIDER: 'openai', DIFFSCRIBE_MODEL: 'gpt-5', DIFFSCRIBE_LOG_LEVEL: 'ERROR' }
    );

    expect(config.provider).toBe('anthropic');
    expect(config.model).toBe('claude-3-5-haiku-latest');
    expect(config.cwd).toBe(resolve('repo'));
    expect(config.gitTimeoutMs).toBe(100);
    expect(config.logLevel).toBe('DEBUG');
  });

  it('uses the default model of the chosen provider', () => {
    expect(resolveConfig({ provider: 'openai' }, {}).model).toBe('gpt-5');
  });

  it('treats a blank key as missing', () => {
    expect(resolveConfig({}, { ANTHROPIC_API_KEY: '   ' }).apiKey).toBeUndefined();
  });

  it('rejects an unknown provider', () => {
    expect(() => resolveConfig({ provider: 'gemini' }, {})).toThrow(
      new UsageError('Unknown provider: gemini (expected one of: anthropic, openai)')
    );
  });

  it('rejects a non-positive timeout', () => {
    expect(() => resolveConfig({ 'request-timeout': '0' }, {})).toThrow(
      'Invalid request timeout: 0 (expected a positive number of milliseconds)'
    );
    expect(() => resolveConfig({}, { DIFFSCRIBE_GIT_TIMEOUT_MS: 'soon' })).toThrow(UsageError);
  });

  it('leaves commits unbounded unless a git timeout is given', () => {
    expect(resolveConfig({}, {}).commitTimeoutMs).toBeUndefined();
    expect(resolveConfig({ 'git-timeout': '120000' }, {}).commitTimeoutMs).toBe(120000);
  });

  it('rejects a timeout too large for a timer', () => {
    expect(() => resolveConfig({ 'git-timeout': '3000000000' }, {})).toThrow(
      'Invalid git timeout: 3000000000 (must not exceed 2147483647 milliseconds)'
    );
    expect(() => resolveConfig({}, { DIFFSCRIBE_REQUEST_TIMEOUT_MS: '2147483648' })).toThrow(UsageError);
    expect(resolveConfig({ 'git-timeout': '2147483647' }, {}).gitTimeoutMs).toBe(2147483647);
  });

  it('rejects an unknown log level', () => {
    expect(() => resolveConfig({}, { DIFFSCRIBE_LOG_LEVEL: 'loud' })).toThrow('Invalid log level: LOUD');
  });
});
