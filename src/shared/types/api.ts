/**
 * Shared types used across the git, llm and workflow layers
 */

export type Result<T> =
  | {
      ok: true;
      value: T;
    }
  | {
      ok: false;
      error: Error;
    };

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  duration: number;
}

/**
 * Line-oriented operator I/O.
 * readLine resolves null once input has ended (EOF / closed stream).
 */
export interface OperatorIO {
  write(text: string): void;
  error(text: string): void;
  readLine(prompt: string): Promise<string | null>;
  close(): void;
}
