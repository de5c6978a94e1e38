export { resolveConfig, type DiffscribeConfig } from './config';
export { countDiffStats, createGitService, runGit, type GitServiceOptions } from './git/service';
export type { DiffCategory, DiffStats, GitService } from './git/types';
export { AnthropicTextGenerator } from './llm/anthropic';
export { createTextGenerator } from './llm/client';
export { OpenAITextGenerator } from './llm/openai';
export type { ProviderName, TextGenerator } from './llm/types';
export * from './shared/errors';
export { ReadlineIO } from './shared/io';
export { logger } from './shared/logger';
export type { CommandResult, OperatorIO, Result } from './shared/types/api';
export { confirm, transition } from './workflow/confirm';
export { exitCodeFor, runCommitWorkflow, runSummaryWorkflow } from './workflow/orchestrator';
export { buildPrompt } from './workflow/prompt';
export { cleanGeneratedText, synthesize } from './workflow/synthesizer';
export type { ConfirmationDecision, RunOutcome, SynthesisMode, WorkflowDeps } from './workflow/types';
