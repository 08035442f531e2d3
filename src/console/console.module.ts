import { Module } from '@nestjs/common';

import { CONSOLE_IO } from './console-io';
import { Prompter } from './prompter';
import { TerminalConsole } from './terminal-console.service';

@Module({
  providers: [{ provide: CONSOLE_IO, useClass: TerminalConsole }, Prompter],
  exports: [Prompter],
})
export class ConsoleModule {}
