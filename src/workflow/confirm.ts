/**
 * Confirmation loop
 * Gates the commit on an explicit operator decision: commit, edit or abort.
 */

import { logger } from '../shared/logger';
import { formatCandidateMessage } from '../shared/terminal-ui';
import type { OperatorIO } from '../shared/types/api';
import type { ConfirmationDecision } from './types';

export const CHOICE_PROMPT = '\n[c]ommit / [e]dit / [a]bort? ';
export const EDIT_PROMPT = '> ';
export const EDIT_INSTRUCTIONS = '\nEnter your commit message (press Enter when done):';
export const EMPTY_EDIT_NOTICE = 'Empty message, please try again.';
export const INVALID_CHOICE_NOTICE = "Invalid choice. Please enter 'c', 'e', or 'a'.";

export type ConfirmState =
  | { kind: 'awaiting_choice' }
  | { kind: 'awaiting_edit' }
  | { kind: 'done'; decision: ConfirmationDecision };

export type PendingState = Exclude<ConfirmState, { kind: 'done' }>;

export interface Transition {
  state: ConfirmState;
  /** Text shown to the operator on this transition */
  notice?: string;
}

/**
 * One step of the loop. `input` is the raw line read in `state`, or null at end of input.
 */
export function transition(state: PendingState, input: string | null, candidate: string): Transition {
  if (input === null) {
    return { state: { kind: 'done', decision: { kind: 'abort' } } };
  }

  switch (state.kind) {
    case 'awaiting_choice': {
      const choice = input.trim().toLowerCase();
      switch (choice) {
        case 'c':
          return { state: { kind: 'done', decision: { kind: 'accept', text: candidate } } };
        case 'a':
          return { state: { kind: 'done', decision: { kind: 'abort' } } };
        case 'e':
          return { state: { kind: 'awaiting_edit' }, notice: EDIT_INSTRUCTIONS };
        default:
          return { state, notice: INVALID_CHOICE_NOTICE };
      }
    }
    case 'awaiting_edit': {
      const edited = input.trim();
      if (!edited) {
        return { state: { kind: 'awaiting_choice' }, notice: EMPTY_EDIT_NOTICE };
      }
      return { state: { kind: 'done', decision: { kind: 'accept_edited', text: edited } } };
    }
  }
}

function promptFor(state: PendingState): string {
  return state.kind === 'awaiting_choice' ? CHOICE_PROMPT : EDIT_PROMPT;
}

/**
 * Show the candidate and loop until the operator decides.
 * End of input at any read counts as abort.
 */
export async function confirm(candidate: string, io: OperatorIO): Promise<ConfirmationDecision> {
  io.write(`\n${formatCandidateMessage(candidate)}`);

  let state: ConfirmState = { kind: 'awaiting_choice' };
  while (state.kind !== 'done') {
    const input = await io.readLine(promptFor(state));
    const next = transition(state, input, candidate);
    if (next.notice) io.write(next.notice);
    if (input === null) logger.debug('Workflow', 'confirm_eof');
    state = next.state;
  }

  logger.debug('Workflow', 'confirm_decision', { decision: state.decision.kind });
  return state.decision;
}
