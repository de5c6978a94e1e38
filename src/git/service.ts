/**
 * Git Service
 * Runs the git executable directly (no shell) and captures its output
 */

import { spawn, type SpawnOptions } from 'node:child_process';
import { resolve } from 'node:path';
import { GitCommandError } from '../shared/errors';
import { logger } from '../shared/logger';
import type { CommandResult, Result } from '../shared/types/api';
import { DIFF_ARGS, type DiffCategory, type DiffStats, type GitCommand, type GitService } from './types';

export const DEFAULT_GIT_TIMEOUT = 30000; // 30 seconds
const MAX_STDERR_SIZE = 20000;
const KILL_GRACE_MS = 1000;

/**
 * Spawn git with the given arguments.
 * Resolves ok for any exit status; callers decide what a non-zero code means.
 * Spawn errors (git not installed, bad cwd) resolve as { ok: false }.
 * Without a timeout git runs until it exits. With passthrough, git writes
 * straight to the operator's terminal and nothing is captured.
 */
export function runGit(cmd: GitCommand): Promise<Result<CommandResult>> {
  const { args, cwd = process.cwd(), timeout, passthrough = false } = cmd;
  const resolvedCwd = resolve(cwd);

  return new Promise((resolvePromise) => {
    const startTime = Date.now();
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;

    const finish = (result: Result<CommandResult>) => {
      if (settled) return;
      settled = true;
      resolvePromise(result);
    };

    logger.git('spawn', args, { cwd: resolvedCwd });

    const options: SpawnOptions = {
      cwd: resolvedCwd,
      env: { ...process.env, GIT_PAGER: 'cat' },
      stdio: passthrough ? ['ignore', 'inherit', 'inherit'] : 'pipe',
    };
    const proc = spawn('git', args, options);

    proc.stdout?.setEncoding('utf8');
    proc.stderr?.setEncoding('utf8');

    proc.stdout?.on('data', (chunk: string) => {
      stdout += chunk;
    });

    proc.stderr?.on('data', (chunk: string) => {
      stderr += chunk;

      // Keep stderr reasonable
      if (stderr.length > MAX_STDERR_SIZE) {
        stderr = stderr.substring(0, MAX_STDERR_SIZE) + '\n\n[Error output truncated]';
      }
    });

    let killTimer: NodeJS.Timeout | undefined;
    const timer = timeout === undefined ? undefined : setTimeout(() => {
      timedOut = true;
      proc.kill('SIGTERM');
      // proc.killed only says a signal was sent; check whether git actually exited
      killTimer = setTimeout(() => {
        if (proc.exitCode === null && proc.signalCode === null) {
          proc.kill('SIGKILL');
        }
      }, KILL_GRACE_MS);
      killTimer.unref();
    }, timeout);

    const clearTimers = () => {
      clearTimeout(timer);
      clearTimeout(killTimer);
    };

    proc.on('close', (code) => {
      clearTimers();
      const duration = Date.now() - startTime;
      logger.git('exit', args, { code, duration, timedOut });

      if (timedOut) {
        finish({ ok: false, error: new Error(`git ${args.join(' ')} timed out after ${timeout}ms`) });
        return;
      }

      finish({
        ok: true,
        value: {
          stdout,
          stderr,
          exitCode: code,
          duration,
        },
      });
    });

    proc.on('error', (error) => {
      clearTimers();
      finish({ ok: false, error });
    });
  });
}

/**
 * Count changed files (diff --git headers) and total lines in a diff
 */
export function countDiffStats(diff: string): DiffStats {
  if (!diff) return { files: 0, lines: 0 };
  const lines = diff.split(/\r?\n/);
  const files = lines.filter(line => line.startsWith('diff --git')).length;
  return { files, lines: lines.length };
}

export interface GitServiceOptions {
  cwd?: string;
  /** Limit for diff reads; defaults to DEFAULT_GIT_TIMEOUT */
  timeout?: number;
  /** Limit for git commit, which runs hooks; unlimited unless set */
  commitTimeout?: number;
  /** Where soft failures are reported; defaults to stderr. */
  reportError?: (message: string) => void;
}

class GitServiceImpl implements GitService {
  private readonly cwd: string;
  private readonly timeout: number;
  private readonly commitTimeout: number | undefined;
  private readonly reportError: (message: string) => void;

  constructor(options: GitServiceOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
    this.timeout = options.timeout ?? DEFAULT_GIT_TIMEOUT;
    this.commitTimeout = options.commitTimeout;
    this.reportError = options.reportError ?? ((message) => console.error(message));
  }

  async getDiff(category: DiffCategory): Promise<string> {
    const args = DIFF_ARGS[category];
    const result = await runGit({ args, cwd: this.cwd, timeout: this.timeout });

    if (!result.ok) {
      this.reportError(`Error running git command: ${result.error.message}`);
      return '';
    }

    if (result.value.exitCode !== 0) {
      const err = new GitCommandError(args, result.value.exitCode, result.value.stderr);
      this.reportError(`Error running git command: ${err.message}`);
      return '';
    }

    const diff = result.value.stdout.trim();
    logger.debug('Git', 'diff_read', { category, bytes: diff.length });
    return diff;
  }

  async commit(message: string): Promise<Result<CommandResult>> {
    const args = ['commit', '-m', message];
    // git and its hooks talk to the operator directly
    const result = await runGit({ args, cwd: this.cwd, timeout: this.commitTimeout, passthrough: true });

    if (!result.ok) return result;

    if (result.value.exitCode !== 0) {
      return { ok: false, error: new GitCommandError(['commit', '-m', '<message>'], result.value.exitCode, '') };
    }

    logger.info('Git', 'committed', { duration: result.value.duration });
    return result;
  }
}

export function createGitService(options?: GitServiceOptions): GitService {
  return new GitServiceImpl(options);
}
