import { spawn, type ChildProcess } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import { logger } from '../../shared/logger';
import { countDiffStats, createGitService, runGit } from '../service';

jest.mock('node:child_process', () => ({
  spawn: jest.fn(),
}));

const spawnMock = jest.mocked(spawn);

interface FakeRun {
  stdout?: string;
  stderr?: string;
  code?: number | null;
  /** Emit 'error' instead of closing */
  spawnError?: Error;
  /** Never close; used for timeouts */
  hang?: boolean;
  /** Survive SIGTERM; only SIGKILL ends the process */
  ignoreTerm?: boolean;
  /** No stdout/stderr pipes, as with inherited stdio */
  inherit?: boolean;
  /** Close after this many milliseconds instead of right away */
  delayMs?: number;
}

class FakeChildProcess extends EventEmitter {
  readonly stdout: PassThrough | null;
  readonly stderr: PassThrough | null;
  killed = false;
  exitCode: number | null = null;
  signalCode: string | null = null;
  readonly signals: string[] = [];

  constructor(private readonly run: FakeRun) {
    super();
    this.stdout = run.inherit ? null : new PassThrough();
    this.stderr = run.inherit ? null : new PassThrough();
  }

  kill(signal: string): boolean {
    this.signals.push(signal);
    this.killed = true;
    if (signal === 'SIGTERM' && this.run.ignoreTerm) return true;
    setImmediate(() => {
      this.signalCode = signal;
      this.emit('close', null);
    });
    return true;
  }

  exit(code: number): void {
    this.exitCode = code;
    this.emit('close', code);
  }
}

function scriptSpawn(...runs: FakeRun[]): FakeChildProcess[] {
  const procs: FakeChildProcess[] = [];
  for (const run of runs) {
    spawnMock.mockImplementationOnce(() => {
      const proc = new FakeChildProcess(run);
      procs.push(proc);
      setImmediate(() => {
        if (run.spawnError) {
          proc.emit('error', run.spawnError);
          return;
        }
        if (run.hang) return;
        if (run.stdout) proc.stdout?.write(run.stdout);
        if (run.stderr) proc.stderr?.write(run.stderr);
        // let the data events flush before close
        if (run.delayMs !== undefined) {
          setTimeout(() => proc.exit(run.code ?? 0), run.delayMs);
        } else {
          setImmediate(() => proc.exit(run.code ?? 0));
        }
      });
      return proc as unknown as ChildProcess;
    });
  }
  return procs;
}

describe('git service', () => {
  beforeEach(() => {
    spawnMock.mockReset();
    logger.setSink(() => {});
  });

  describe('getDiff', () => {
    it('runs git diff --cached for staged changes and trims the output', async () => {
      scriptSpawn({ stdout: '\ndiff --git a/f.py b/f.py\n+x = 1\n\n' });
      const git = createGitService({ cwd: '/repo', reportError: jest.fn() });

      const diff = await git.getDiff('staged');

      expect(diff).toBe('diff --git a/f.py b/f.py\n+x = 1');
      expect(spawnMock).toHaveBeenCalledWith('git', ['diff', '--cached'], expect.objectContaining({ cwd: '/repo' }));
    });

    it('runs plain git diff for unstaged changes', async () => {
      scriptSpawn({ stdout: '' });
      const git = createGitService({ cwd: '/repo', reportError: jest.fn() });

      await expect(git.getDiff('unstaged')).resolves.toBe('');
      expect(spawnMock).toHaveBeenCalledWith('git', ['diff'], expect.objectContaining({ cwd: '/repo' }));
    });

    it('reports a non-zero exit and returns an empty diff', async () => {
      scriptSpawn({ stderr: 'fatal: not a git repository (or any of the parent directories): .git\n', code: 128 });
      const reportError = jest.fn();
      const git = createGitService({ cwd: '/tmp', reportError });

      const diff = await git.getDiff('staged');

      expect(diff).toBe('');
      expect(reportError).toHaveBeenCalledTimes(1);
      expect(reportError).toHaveBeenCalledWith(
        "Error running git command: Command 'git diff --cached' returned non-zero exit status 128: fatal: not a git repository (or any of the parent directories): .git"
      );
    });

    it('reports a spawn failure and returns an empty diff', async () => {
      scriptSpawn({ spawnError: new Error('spawn git ENOENT') });
      const reportError = jest.fn();
      const git = createGitService({ reportError });

      await expect(git.getDiff('unstaged')).resolves.toBe('');
      expect(reportError).toHaveBeenCalledWith('Error running git command: spawn git ENOENT');
    });

    it('returns identical text for back-to-back reads of an unchanged tree', async () => {
      const out = 'diff --git a/f.py b/f.py\n-x = 1\n+x = 2\n';
      scriptSpawn({ stdout: out }, { stdout: out });
      const git = createGitService({ reportError: jest.fn() });

      const first = await git.getDiff('staged');
      const second = await git.getDiff('staged');

      expect(second).toBe(first);
      expect(spawnMock).toHaveBeenCalledTimes(2);
    });
  });

  describe('commit', () => {
    it('passes the message as a single argument and lets git write to the terminal', async () => {
      scriptSpawn({ inherit: true });
      const git = createGitService({ cwd: '/repo' });

      const result = await git.commit('Add input validation to parser');

      expect(spawnMock).toHaveBeenCalledWith(
        'git',
        ['commit', '-m', 'Add input validation to parser'],
        expect.objectContaining({ cwd: '/repo', stdio: ['ignore', 'inherit', 'inherit'] })
      );
      expect(result.ok).toBe(true);
      if (result.ok) expect(result.value.exitCode).toBe(0);
    });

    it('returns an error result when git commit fails', async () => {
      scriptSpawn({ inherit: true, code: 1 });
      const git = createGitService({ cwd: '/repo' });

      const result = await git.commit('Add input validation to parser');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe("Command 'git commit -m <message>' returned non-zero exit status 1");
      }
    });

    it('waits for slow hooks when no commit timeout is set', async () => {
      const procs = scriptSpawn({ inherit: true, delayMs: 60 });
      const git = createGitService({ cwd: '/repo', timeout: 10 });

      const result = await git.commit('Add input validation to parser');

      expect(result.ok).toBe(true);
      expect(procs[0].signals).toEqual([]);
    });

    it('applies an explicit commit timeout', async () => {
      const procs = scriptSpawn({ inherit: true, hang: true });
      const git = createGitService({ cwd: '/repo', commitTimeout: 20 });

      const result = await git.commit('Add input validation to parser');

      expect(procs[0].signals).toEqual(['SIGTERM']);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('git commit -m Add input validation to parser timed out after 20ms');
      }
    });
  });

  describe('runGit', () => {
    it('kills git and fails when the timeout elapses', async () => {
      const procs = scriptSpawn({ hang: true });

      const result = await runGit({ args: ['diff'], cwd: '/repo', timeout: 20 });

      expect(procs).toHaveLength(1);
      expect(procs[0].signals).toEqual(['SIGTERM']);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('git diff timed out after 20ms');
    });

    it('escalates to SIGKILL when git ignores SIGTERM', async () => {
      const procs = scriptSpawn({ hang: true, ignoreTerm: true });

      const result = await runGit({ args: ['diff'], cwd: '/repo', timeout: 20 });

      expect(procs[0].signals).toEqual(['SIGTERM', 'SIGKILL']);
      expect(result.ok).toBe(false);
    });

    it('runs without a timer when no timeout is given', async () => {
      const procs = scriptSpawn({ stdout: 'ok\n', delayMs: 50 });

      const result = await runGit({ args: ['status'], cwd: '/repo' });

      expect(procs[0].signals).toEqual([]);
      expect(result.ok).toBe(true);
      if (result.ok) expect(result.value.stdout).toBe('ok\n');
    });
  });
});

describe('countDiffStats', () => {
  it('counts diff --git headers and lines', () => {
    const diff = [
      'diff --git a/a.ts b/a.ts',
      '+one',
      'diff --git a/b.ts b/b.ts',
      '-two',
      '+three',
    ].join('\n');

    expect(countDiffStats(diff)).toEqual({ files: 2, lines: 5 });
  });

  it('returns zeros for an empty diff', () => {
    expect(countDiffStats('')).toEqual({ files: 0, lines: 0 });
  });
});
