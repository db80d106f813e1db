import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { Interface, createInterface } from 'readline/promises';
import { GameInterruptedError } from '../../common/errors/trivia.errors';

/**
 * Line-based terminal I/O. Ctrl+C or end of input aborts the pending
 * prompt with GameInterruptedError.
 */
@Injectable()
export class ConsoleService implements OnModuleDestroy {
  private readline: Interface | null = null;
  private readonly abortController = new AbortController();

  async prompt(query: string): Promise<string> {
    const { signal } = this.abortController;
    if (signal.aborted) {
      throw new GameInterruptedError();
    }

    try {
      return await this.terminal().question(query, { signal });
    } catch (error) {
      if (signal.aborted) {
        throw new GameInterruptedError();
      }
      throw error;
    }
  }

  print(...lines: string[]): void {
    for (const line of lines) {
      process.stdout.write(`${line}\n`);
    }
  }

  clear(): void {
    if (process.stdout.isTTY) {
      process.stdout.write('\x1b[H\x1b[J');
    }
  }

  interrupt(): void {
    this.abortController.abort();
  }

  onModuleDestroy() {
    this.readline?.close();
  }

  private terminal(): Interface {
    if (!this.readline) {
      this.readline = createInterface({
        input: process.stdin,
        output: process.stdout,
      });
      this.readline.on('SIGINT', () => this.interrupt());
      this.readline.on('close', () => this.interrupt());
    }
    return this.readline;
  }
}
