import type { SynthesisMode } from './types';

const COMMIT_MESSAGE_TEMPLATE = `You are a Git commit message expert. Analyze the following git diff and generate a concise, professional commit message.

REQUIREMENTS:
- The message must be 50-72 characters long
- Use imperative mood (e.g., "Add feature" not "Added feature")
- Be specific about what changed
- Do not include any explanation, prefix, or formatting
- Return ONLY the commit message text, nothing else

GIT DIFF:
{{diff}}

Commit message:`;

const SUMMARY_TEMPLATE = `You are a code review assistant. Analyze the following git diff and generate a clear, concise natural-language summary.

Your summary should explain:
1. What files were changed
2. What type of changes were made (bug fix, new feature, refactoring, documentation, configuration, etc.)
3. A brief description of the specific changes in each file

Format your response as:
- Start with an overview sentence
- List each file with bullet points explaining changes
- Be specific but concise
- Use technical terms appropriately but keep it readable

GIT DIFF:
{{diff}}

Summary:`;

const TEMPLATES: Record<SynthesisMode, string> = {
  commit_message: COMMIT_MESSAGE_TEMPLATE,
  summary: SUMMARY_TEMPLATE,
};

/**
 * Build the single request prompt for a mode with the diff embedded verbatim.
 * Uses a replacer function so `$` sequences in the diff are not treated as patterns.
 */
export function buildPrompt(diff: string, mode: SynthesisMode): string {
  return TEMPLATES[mode].replace('{{diff}}', () => diff);
}
