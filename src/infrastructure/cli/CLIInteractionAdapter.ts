import * as readline from 'readline';
import { UserInteractionPort } from '../../application/ports/UserInteractionPort';
import { TaskCancelledError } from '../../domain/errors/AppErrors';
import { getLogger } from '../logging/Logger';

/**
 * Colors for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  yellow: '\x1b[33m',
};

/**
 * Terminal adapter for questions to the operator: the task itself,
 * `request_user_input`, and confirmations from the security gate.
 */
export class CLIInteractionAdapter implements UserInteractionPort {
  private rl: readline.Interface | null = null;
  private logger = getLogger('CLI');

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  private getReadline(): readline.Interface {
    if (!this.rl) {
      this.rl = readline.createInterface({
        input: this.input,
        output: this.output,
      });
    }
    return this.rl;
  }

  /**
   * Close the readline interface.
   */
  close(): void {
    if (this.rl) {
      this.rl.close();
      this.rl = null;
    }
  }

  /**
   * Prints the question and resolves with the trimmed answer. Rejects with
   * TaskCancelledError if the signal fires first.
   */
  ask(prompt: string, signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) {
      return Promise.reject(new TaskCancelledError());
    }
    const rl = this.getReadline();
    this.logger.debug('Waiting for operator input');

    return new Promise((resolve, reject) => {
      const onAbort = (): void => {
        reject(new TaskCancelledError());
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      const question = `\n${colors.bold}${colors.yellow}?${colors.reset} ${prompt}\n${colors.cyan}> ${colors.reset}`;
      const answer = (value: string): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve(value.trim());
      };
      if (signal) {
        rl.question(question, { signal }, answer);
      } else {
        rl.question(question, answer);
      }
    });
  }

  /**
   * Prints a line for the operator outside the log stream.
   */
  say(message: string): void {
    this.output.write(`${colors.dim}${message}${colors.reset}\n`);
  }
}
