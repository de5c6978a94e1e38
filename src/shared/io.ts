import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { OperatorIO } from './types/api';

/**
 * OperatorIO over readline.
 * Lines that arrive before they are asked for are queued; once the input closes,
 * pending and future reads resolve null.
 */
export class ReadlineIO implements OperatorIO {
  private rl: Interface | null = null;
  private readonly queued: string[] = [];
  private readonly waiting: Array<(line: string | null) => void> = [];
  private ended = false;

  constructor(
    private readonly input: Readable = process.stdin,
    private readonly output: Writable = process.stdout,
    private readonly errorOutput: Writable = process.stderr
  ) {}

  write(text: string): void {
    this.output.write(`${text}\n`);
  }

  error(text: string): void {
    this.errorOutput.write(`${text}\n`);
  }

  readLine(prompt: string): Promise<string | null> {
    this.output.write(prompt);
    this.ensureInterface();

    const next = this.queued.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.ended) return Promise.resolve(null);

    return new Promise(resolve => {
      this.waiting.push(resolve);
    });
  }

  close(): void {
    this.rl?.close();
  }

  // Created on first read so commands that never prompt do not hold stdin open
  private ensureInterface(): void {
    if (this.rl || this.ended) return;
    const rl = createInterface({ input: this.input, crlfDelay: Infinity });
    rl.on('line', (line: string) => {
      const waiter = this.waiting.shift();
      if (waiter) waiter(line);
      else this.queued.push(line);
    });
    rl.on('close', () => {
      this.ended = true;
      for (const waiter of this.waiting.splice(0)) waiter(null);
    });
    this.rl = rl;
  }
}
