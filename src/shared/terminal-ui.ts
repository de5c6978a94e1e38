/**
 * Terminal UI utilities and formatting
 */

// ANSI color codes
export const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
  brightRed: '\x1b[91m',
  brightGreen: '\x1b[92m',
  brightYellow: '\x1b[93m',
  brightBlue: '\x1b[94m',
  brightMagenta: '\x1b[95m',
  brightCyan: '\x1b[96m',
} as const;

export const COMMIT_RULE_WIDTH = 70;
export const SUMMARY_RULE_WIDTH = 80;

export function rule(width: number): string {
  return '='.repeat(width);
}

/**
 * Frame a block of text between two rules with a heading, e.g.
 *
 *   ======
 *   TITLE
 *   ======
 *
 *   body
 *
 *   ======
 */
export function createFramedBlock(title: string, body: string, width: number): string {
  const line = rule(width);
  return [
    line,
    `${colors.bright}${title}${colors.reset}`,
    line,
    '',
    body,
    '',
    line,
  ].join('\n');
}

export function formatCandidateMessage(message: string): string {
  return createFramedBlock('SUGGESTED COMMIT MESSAGE:', message, COMMIT_RULE_WIDTH);
}

export function formatSummary(summary: string): string {
  return createFramedBlock('DIFF SUMMARY', summary, SUMMARY_RULE_WIDTH);
}

/**
 * Create CLI help display
 */
export function createHelpDisplay(): string {
  return `
${colors.brightCyan}╭──────────────────────────────────────────────────────╮
│                                                      │
│  ${colors.bright}DIFFSCRIBE${colors.reset}${colors.brightCyan} - AI commit messages and diff summaries  │
│                                                      │
╰──────────────────────────────────────────────────────╯${colors.reset}

${colors.bright}USAGE:${colors.reset}
  ${colors.brightGreen}diffscribe${colors.reset} ${colors.gray}<command>${colors.reset} ${colors.dim}[flags]${colors.reset}

${colors.bright}COMMANDS:${colors.reset}
  ${colors.brightGreen}commit${colors.reset}     Generate a message for staged changes and commit
  ${colors.brightGreen}summary${colors.reset}    Summarize unstaged changes
  ${colors.brightGreen}help${colors.reset}       Show this help

${colors.bright}FLAGS:${colors.reset}
  ${colors.brightYellow}--provider${colors.reset} ${colors.gray}<name>${colors.reset}        anthropic | openai ${colors.dim}(default: anthropic or $DIFFSCRIBE_PROVIDER)${colors.reset}
  ${colors.brightYellow}--model${colors.reset} ${colors.gray}<id>${colors.reset}             Model identifier ${colors.dim}(default: provider default or $DIFFSCRIBE_MODEL)${colors.reset}
  ${colors.brightYellow}--cwd${colors.reset} ${colors.gray}<dir>${colors.reset}              Repository directory ${colors.dim}(default: current directory)${colors.reset}
  ${colors.brightYellow}--git-timeout${colors.reset} ${colors.gray}<ms>${colors.reset}       Kill git after this long ${colors.dim}(default: 30000 for diffs, none for commits)${colors.reset}
  ${colors.brightYellow}--request-timeout${colors.reset} ${colors.gray}<ms>${colors.reset}   Abort the model request after this long ${colors.dim}(default: 60000)${colors.reset}
  ${colors.brightYellow}--verbose${colors.reset}                Debug logging on stderr
  ${colors.brightYellow}--help, -h${colors.reset}               Show this help

${colors.bright}ENVIRONMENT:${colors.reset}
  ${colors.brightYellow}ANTHROPIC_API_KEY${colors.reset}        Required for the anthropic provider
  ${colors.brightYellow}OPENAI_API_KEY${colors.reset}           Required for the openai provider

${colors.bright}EXAMPLES:${colors.reset}
  ${colors.gray}$${colors.reset} ${colors.brightGreen}diffscribe commit${colors.reset}
  ${colors.gray}$${colors.reset} ${colors.brightGreen}diffscribe summary${colors.reset} ${colors.brightYellow}--provider${colors.reset} ${colors.gray}openai${colors.reset}
  ${colors.gray}$${colors.reset} ${colors.brightGreen}diffscribe commit${colors.reset} ${colors.brightYellow}--model=claude-3-5-haiku-latest${colors.reset}
`;
}

/**
 * Status message formatters
 */
export const status = {
  commitBanner: () =>
    `${colors.brightCyan}${colors.bright}AI Git Commit Message Generator${colors.reset}\n`,

  summaryBanner: () =>
    `${colors.brightCyan}${colors.bright}AI-Powered Git Diff Summarizer${colors.reset}\n`,

  checkingStaged: () =>
    `${colors.brightBlue}Checking for staged changes...${colors.reset}`,

  analyzingUnstaged: () =>
    `${colors.brightBlue}📋 Analyzing unstaged changes...${colors.reset}`,

  noStagedChanges: () =>
    `\n${colors.brightYellow}⚠ No staged changes found.${colors.reset}\n` +
    `Use 'git add <files>' to stage changes before running this tool.`,

  noUnstagedChanges: () =>
    `\n${colors.brightYellow}⚠ No unstaged changes found.${colors.reset}\n` +
    `Make some changes to your files, then run this tool to see a summary.\n` +
    `To see staged changes, use: git diff --cached`,

  foundLines: (lines: number) =>
    `${colors.brightGreen}✓ Found ${lines} lines of changes${colors.reset}\n`,

  foundFilesAndLines: (files: number, lines: number) =>
    `${colors.brightGreen}✓ Found ${files} file(s) with ${lines} lines of changes${colors.reset}\n`,

  generatingMessage: () =>
    `${colors.brightBlue}Generating commit message with AI...${colors.reset}`,

  generatingSummary: () =>
    `${colors.brightBlue}Generating summary with AI...${colors.reset}\n`,

  committing: (message: string) =>
    `\nCommitting with message: '${message}'`,

  committed: () =>
    `\n${colors.brightGreen}✓ Changes committed successfully!${colors.reset}`,

  aborted: () =>
    `\n${colors.brightRed}X Commit aborted.${colors.reset}`,

  unknownCommand: (cmd: string) =>
    `${colors.brightRed}❌ Unknown command: ${colors.bright}${cmd}${colors.reset}`,
};

/**
 * Format log level with colors
 */
export function formatLogLevel(level: string): string {
  switch (level.toUpperCase()) {
    case 'DEBUG':
      return `${colors.gray}DEBUG${colors.reset}`;
    case 'INFO':
      return `${colors.brightBlue}INFO ${colors.reset}`;
    case 'WARN':
      return `${colors.brightYellow}WARN ${colors.reset}`;
    case 'ERROR':
      return `${colors.brightRed}ERROR${colors.reset}`;
    default:
      return level.padEnd(5);
  }
}

/**
 * Format category with colors
 */
export function formatCategory(category: string): string {
  const categoryColors: Record<string, string> = {
    'Git': colors.brightMagenta,
    'LLM': colors.brightYellow,
    'Workflow': colors.brightCyan,
    'Config': colors.brightBlue,
  };

  const color = categoryColors[category] || colors.white;
  return `${color}${category.padEnd(10)}${colors.reset}`;
}
