import readline from 'node:readline/promises';
import { logger } from './logger.js';

/**
 * Hands control to the person at the keyboard until they press Enter.
 */
export interface Prompter {
  pause(message: string, action?: string): Promise<void>;
}

export class ConsolePrompter implements Prompter {
  constructor(private readonly signal?: AbortSignal) {}

  async pause(message: string, action = 'Press Enter to continue...'): Promise<void> {
    if (this.signal?.aborted) return;

    logger.prompt(message);

    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    // readline owns the TTY in raw mode, so forward Ctrl+C to the process handler
    rl.on('SIGINT', () => {
      process.kill(process.pid, 'SIGINT');
    });

    try {
      await rl.question(`${action} `, { signal: this.signal });
    } catch (error) {
      if (!this.signal?.aborted) {
        throw error;
      }
    } finally {
      rl.close();
    }
  }
}
