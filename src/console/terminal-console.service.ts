import { Injectable, OnModuleDestroy } from '@nestjs/common';
import * as readline from 'readline';

import { ConsoleIO } from './console-io';

const bold = (color: number, text: string) => `\x1b[1;${color}m${text}\x1b[m`;

@Injectable()
export class TerminalConsole implements ConsoleIO, OnModuleDestroy {
  private readonly rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  private readonly lines = this.rl[Symbol.asyncIterator]();
  private readonly colors = Boolean(process.stdout.isTTY);

  prompt(text: string): void {
    process.stdout.write(`${text}\n`);
  }

  async readLine(): Promise<string | null> {
    const result = await this.lines.next();
    return result.done ? null : result.value;
  }

  emphasizeSuccess(text: string): string {
    return this.colors ? bold(32, text) : text;
  }

  emphasizeFailure(text: string): string {
    return this.colors ? bold(31, text) : text;
  }

  onModuleDestroy() {
    this.rl.close();
  }
}
