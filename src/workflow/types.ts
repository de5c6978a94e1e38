/**
 * Workflow value types
 */

import type { GitService } from '../git/types';
import type { TextGenerator } from '../llm/types';
import type { OperatorIO } from '../shared/types/api';

export type SynthesisMode = 'commit_message' | 'summary';

export type ConfirmationDecision =
  | { kind: 'accept'; text: string }
  | { kind: 'accept_edited'; text: string }
  | { kind: 'abort' };

export type ServiceErrorReason = 'missing_credential' | 'request_failed';

export type RunOutcome =
  | { kind: 'no_changes' }
  | { kind: 'service_error'; reason: ServiceErrorReason; message: string }
  | { kind: 'committed'; message: string }
  | { kind: 'commit_failed'; message: string; error: string }
  | { kind: 'displayed'; summary: string }
  | { kind: 'aborted' };

export interface WorkflowDeps {
  git: GitService;
  /**
   * Called once a non-empty diff exists, before any request is made.
   * Throws MissingCredentialError when no API key is configured.
   */
  resolveGenerator: () => TextGenerator;
  io: OperatorIO;
}
