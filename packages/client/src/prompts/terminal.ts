/**
 * Terminal prompts
 *
 * Prompts and messages go to stderr; stdout is left to openconnect.
 */

import { createInterface, type Interface } from 'readline';
import { Writable, type Readable } from 'stream';
import { UserCancelledError, type Prompter, type UserInteraction } from '@gp-okta/core';

/**
 * Output that can stop echoing while a secret is typed
 */
class MaskedOutput extends Writable {
  muted = false;

  constructor(private readonly target: Writable) {
    super();
  }

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (!this.muted) {
      this.target.write(chunk);
    }
    callback();
  }
}

export interface TerminalPrompterOptions {
  input?: Readable & { isTTY?: boolean };
  output?: Writable;
}

interface PendingAnswer {
  hidden: boolean;
  resolve(answer: string): void;
  reject(error: Error): void;
}

/**
 * One readline interface for the life of the prompter, so lines piped in
 * ahead of a question are kept for it. Call close() before another process
 * takes over the terminal.
 */
export class TerminalPrompter implements Prompter {
  private readonly input: Readable & { isTTY?: boolean };
  private readonly output: Writable;
  private readonly masked: MaskedOutput;
  private rl: Interface | undefined;
  private readonly lines: string[] = [];
  private pending: PendingAnswer | undefined;
  private ended = false;

  constructor(options: TerminalPrompterOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stderr;
    this.masked = new MaskedOutput(this.output);
  }

  text(message: string): Promise<string> {
    return this.ask(`${message}: `, false);
  }

  secret(message: string): Promise<string> {
    return this.ask(`${message}: `, true);
  }

  async confirm(message: string): Promise<boolean> {
    const answer = await this.ask(`${message} [y/N]: `, false);
    return /^y(es)?$/i.test(answer.trim());
  }

  info(message: string): void {
    this.output.write(`${message}\n`);
  }

  /**
   * Stop reading input; an unanswered question fails with UserCancelledError
   */
  close(): void {
    this.rl?.close();
    this.ended = true;
  }

  private open(): Interface {
    if (this.rl) {
      return this.rl;
    }
    const rl = createInterface({
      input: this.input,
      output: this.masked,
      terminal: this.input.isTTY === true,
    });
    rl.on('line', line => {
      const pending = this.pending;
      if (pending) {
        this.pending = undefined;
        this.answer(pending, line);
      } else {
        this.lines.push(line);
      }
    });
    rl.on('SIGINT', () => {
      rl.close();
    });
    rl.on('close', () => {
      this.ended = true;
      const pending = this.pending;
      if (pending) {
        this.pending = undefined;
        this.masked.muted = false;
        if (pending.hidden) {
          this.output.write('\n');
        }
        pending.reject(new UserCancelledError());
      }
    });
    this.rl = rl;
    return rl;
  }

  private ask(query: string, hidden: boolean): Promise<string> {
    if (this.pending) {
      return Promise.reject(new Error('TerminalPrompter is already waiting for an answer'));
    }

    return new Promise<string>((resolve, reject) => {
      const pending: PendingAnswer = { hidden, resolve, reject };
      const queued = this.lines.shift();
      if (this.ended) {
        if (queued === undefined) {
          reject(new UserCancelledError());
          return;
        }
        this.output.write(query);
        this.answer(pending, queued);
        return;
      }

      const rl = this.open();
      this.masked.muted = false;
      rl.setPrompt(query);
      rl.prompt();

      if (queued !== undefined) {
        this.answer(pending, queued);
        return;
      }
      this.masked.muted = hidden;
      this.pending = pending;
    });
  }

  private answer(pending: PendingAnswer, line: string): void {
    this.masked.muted = false;
    if (pending.hidden) {
      this.output.write('\n');
    }
    pending.resolve(line);
  }
}

/**
 * Hardware key callbacks on top of a Prompter
 */
export class ConsoleInteraction implements UserInteraction {
  constructor(private readonly prompter: Prompter) {}

  promptPresence(): void {
    this.prompter.info('Touch your hardware token to confirm user presence');
  }

  async requestPin(_permissions: number, _rpId: string): Promise<string | undefined> {
    const pin = await this.prompter.secret('Enter your hardware token pin');
    return pin === '' ? undefined : pin;
  }

  async requestUserVerification(_permissions: number, _rpId: string): Promise<boolean> {
    this.prompter.info('User Verification requested.');
    return true;
  }
}
