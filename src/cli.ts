#!/usr/bin/env node
import { resolveConfig, type CliFlags, type DiffscribeConfig, type Env } from './config';
import { createGitService } from './git/service';
import type { GitService } from './git/types';
import { createTextGenerator } from './llm/client';
import type { TextGenerator } from './llm/types';
import { UsageError } from './shared/errors';
import { ReadlineIO } from './shared/io';
import { logger } from './shared/logger';
import { createHelpDisplay, status } from './shared/terminal-ui';
import type { OperatorIO } from './shared/types/api';
import { exitCodeFor, runCommitWorkflow, runSummaryWorkflow } from './workflow/orchestrator';

const USAGE_EXIT_CODE = 2;

/**
 * Split argv into a command and its flags.
 * Throws UsageError when a flag that takes a value has none.
 */
export function parseArgs(argv: string[]): { cmd: string; flags: CliFlags } {
  const out: CliFlags = {};
  const cmd = argv[0] && !argv[0].startsWith('-') ? argv[0] : 'help';
  const rest = argv[0] === cmd ? argv.slice(1) : argv.slice(0);
  for (let i = 0; i < rest.length; i++) {
    const a = rest[i];
    if (a === '--') break;
    if (a.startsWith('--')) {
      const eq = a.indexOf('=');
      const k = (eq === -1 ? a.slice(2) : a.slice(2, eq)).trim();
      if (eq !== -1) {
        out[k] = a.slice(eq + 1);
      } else if (k === 'verbose' || k === 'help') {
        out[k] = true;
      } else {
        // generic support space-separated values: --key value
        const next = rest[i + 1];
        if (next === undefined || next.startsWith('-')) {
          throw new UsageError(`Missing value for --${k}`);
        }
        out[k] = next;
        i++;
      }
      continue;
    }
    if (a === '-h') {
      out.help = true;
      continue;
    }
    if (a === '-v') {
      out.verbose = true;
    }
  }
  return { cmd, flags: out };
}

function loadConfig(flags: CliFlags, env: Env, io: OperatorIO): DiffscribeConfig | null {
  try {
    return resolveConfig(flags, env);
  } catch (error) {
    if (error instanceof UsageError) {
      io.error(`Error: ${error.message}`);
      return null;
    }
    throw error;
  }
}

function parseArgsOrReport(argv: string[], io: OperatorIO): { cmd: string; flags: CliFlags } | null {
  try {
    return parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      io.error(`Error: ${error.message}`);
      return null;
    }
    throw error;
  }
}

export interface CliOverrides {
  env?: Env;
  io?: OperatorIO;
  git?: GitService;
  resolveGenerator?: () => TextGenerator;
}

/**
 * Run one CLI invocation and return the process exit code.
 */
export async function run(argv: string[], overrides: CliOverrides = {}): Promise<number> {
  const io = overrides.io ?? new ReadlineIO();

  try {
    const parsed = parseArgsOrReport(argv, io);
    if (!parsed) return USAGE_EXIT_CODE;
    const { cmd, flags } = parsed;

    if (flags.help || cmd === 'help') {
      io.write(createHelpDisplay());
      return 0;
    }
    if (cmd !== 'commit' && cmd !== 'summary') {
      io.error(status.unknownCommand(cmd));
      io.write(createHelpDisplay());
      return USAGE_EXIT_CODE;
    }

    const config = loadConfig(flags, overrides.env ?? process.env, io);
    if (!config) return USAGE_EXIT_CODE;
    logger.setLevel(config.logLevel);
    logger.debug('Config', 'resolved', {
      provider: config.provider,
      model: config.model,
      cwd: config.cwd,
      gitTimeoutMs: config.gitTimeoutMs,
      requestTimeoutMs: config.requestTimeoutMs,
    });

    const deps = {
      git: overrides.git ?? createGitService({
        cwd: config.cwd,
        timeout: config.gitTimeoutMs,
        commitTimeout: config.commitTimeoutMs,
        reportError: (message: string) => io.error(message),
      }),
      resolveGenerator: overrides.resolveGenerator ?? (() => createTextGenerator(config)),
      io,
    };

    const outcome = cmd === 'commit' ? await runCommitWorkflow(deps) : await runSummaryWorkflow(deps);
    logger.info('Workflow', 'finished', { command: cmd, outcome: outcome.kind });
    return exitCodeFor(outcome);
  } finally {
    io.close();
  }
}

async function main(): Promise<void> {
  const code = await run(process.argv.slice(2));
  process.exit(code);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('diffscribe failed:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
