/**
 * Per-command workflows.
 * Both return a RunOutcome; only the CLI turns an outcome into a process exit.
 */

import { countDiffStats } from '../git/service';
import type { TextGenerator } from '../llm/types';
import { MissingCredentialError, errorMessage } from '../shared/errors';
import { logger } from '../shared/logger';
import { formatSummary, status } from '../shared/terminal-ui';
import type { OperatorIO } from '../shared/types/api';
import { confirm } from './confirm';
import { synthesize } from './synthesizer';
import type { RunOutcome, SynthesisMode, WorkflowDeps } from './types';

const GENERATION_ERROR_LABEL: Record<SynthesisMode, string> = {
  commit_message: 'Error generating commit message',
  summary: 'Error generating summary',
};

/**
 * Resolve the generator and run the synthesizer, reporting failures on the error stream.
 */
async function generateOrFail(
  deps: WorkflowDeps,
  diff: string,
  mode: SynthesisMode
): Promise<{ ok: true; text: string } | { ok: false; outcome: RunOutcome }> {
  let generator: TextGenerator;
  try {
    generator = deps.resolveGenerator();
  } catch (error) {
    if (error instanceof MissingCredentialError) {
      deps.io.error(`Error: ${error.message}`);
      return { ok: false, outcome: { kind: 'service_error', reason: 'missing_credential', message: error.message } };
    }
    throw error;
  }

  try {
    const text = await synthesize(generator, diff, mode);
    return { ok: true, text };
  } catch (error) {
    const message = errorMessage(error);
    deps.io.error(`${GENERATION_ERROR_LABEL[mode]}: ${message}`);
    logger.error('Workflow', 'generation_failed', { mode, provider: generator.provider });
    return { ok: false, outcome: { kind: 'service_error', reason: 'request_failed', message } };
  }
}

export async function runCommitWorkflow(deps: WorkflowDeps): Promise<RunOutcome> {
  const { git, io } = deps;
  io.write(status.commitBanner());

  io.write(status.checkingStaged());
  const diff = await git.getDiff('staged');
  if (!diff) {
    io.write(status.noStagedChanges());
    return { kind: 'no_changes' };
  }

  io.write(status.foundLines(countDiffStats(diff).lines));

  io.write(status.generatingMessage());
  const generated = await generateOrFail(deps, diff, 'commit_message');
  if (!generated.ok) return generated.outcome;

  const decision = await confirm(generated.text, io);
  if (decision.kind === 'abort') {
    io.write(status.aborted());
    return { kind: 'aborted' };
  }

  const message = decision.text;
  io.write(status.committing(message));
  const result = await git.commit(message);
  if (!result.ok) {
    io.error(`Error committing changes: ${result.error.message}`);
    return { kind: 'commit_failed', message, error: result.error.message };
  }

  io.write(status.committed());
  return { kind: 'committed', message };
}

export async function runSummaryWorkflow(deps: WorkflowDeps): Promise<RunOutcome> {
  const { git, io } = deps;
  io.write(status.summaryBanner());

  io.write(status.analyzingUnstaged());
  const diff = await git.getDiff('unstaged');
  if (!diff) {
    io.write(status.noUnstagedChanges());
    return { kind: 'no_changes' };
  }

  const stats = countDiffStats(diff);
  io.write(status.foundFilesAndLines(stats.files, stats.lines));

  io.write(status.generatingSummary());
  const generated = await generateOrFail(deps, diff, 'summary');
  if (!generated.ok) return generated.outcome;

  displaySummary(generated.text, io);
  return { kind: 'displayed', summary: generated.text };
}

function displaySummary(summary: string, io: OperatorIO): void {
  io.write(`\n${formatSummary(summary)}`);
}

export function exitCodeFor(outcome: RunOutcome): number {
  switch (outcome.kind) {
    case 'service_error':
      return 1;
    case 'no_changes':
    case 'aborted':
    case 'displayed':
    case 'committed':
    case 'commit_failed':
      return 0;
  }
}
