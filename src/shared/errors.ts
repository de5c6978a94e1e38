export type DiffscribeErrorCode =
  | 'MISSING_CREDENTIAL'
  | 'GENERATION_FAILED'
  | 'GIT_COMMAND_FAILED'
  | 'USAGE';

export class DiffscribeError extends Error {
  readonly code: DiffscribeErrorCode;

  constructor(code: DiffscribeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The selected provider's API key is not present in the environment. */
export class MissingCredentialError extends DiffscribeError {
  readonly envVar: string;

  constructor(envVar: string) {
    super('MISSING_CREDENTIAL', `${envVar} environment variable not set`);
    this.envVar = envVar;
  }
}

export class GenerationError extends DiffscribeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('GENERATION_FAILED', message, options);
  }
}

export class GitCommandError extends DiffscribeError {
  readonly args: string[];
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(args: string[], exitCode: number | null, stderr: string) {
    const detail = stderr.trim() ? `: ${stderr.trim()}` : '';
    super('GIT_COMMAND_FAILED', `Command 'git ${args.join(' ')}' returned non-zero exit status ${exitCode ?? 'unknown'}${detail}`);
    this.args = args;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class UsageError extends DiffscribeError {
  constructor(message: string) {
    super('USAGE', message);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
