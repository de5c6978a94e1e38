/**
 * Git layer types
 */

import type { CommandResult, Result } from '../shared/types/api';

export type DiffCategory = 'staged' | 'unstaged';

export interface GitCommand {
  args: string[];
  cwd?: string;
  /** Milliseconds before git is killed; no limit when unset */
  timeout?: number;
  /** Inherit the terminal for stdout and stderr instead of capturing them */
  passthrough?: boolean;
}

export interface DiffStats {
  files: number;
  lines: number;
}

export interface GitService {
  /** Trimmed diff text, or '' when there is nothing to show or git failed. */
  getDiff(category: DiffCategory): Promise<string>;
  commit(message: string): Promise<Result<CommandResult>>;
}

export const DIFF_ARGS: Record<DiffCategory, string[]> = {
  staged: ['diff', '--cached'],
  unstaged: ['diff'],
};
