import { Inject, Injectable } from '@nestjs/common';

import { capitalize, DELIMITER, joinValues } from '../quiz/normalizer';
import { OptionCountRange } from '../quiz/options';
import { EndOfSession, InputFormatError } from '../quiz/quiz.errors';
import { CONSOLE_IO, ConsoleIO } from './console-io';

export interface Choice<T> {
  label: string;
  value: T;
}

export const toChoices = (labels: readonly string[]): Choice<string>[] =>
  labels.map((label) => ({ label, value: label }));

export const splitTokens = (input: string, multiple: boolean): string[] =>
  multiple ? input.split(DELIMITER).map((token) => token.trim()) : [input];

export const describeRange = ({ lower, upper, extras }: OptionCountRange): string => {
  const range = `${lower}..${upper}`;
  return extras.length > 0 ? `${range} or ${joinValues(extras.map(String))}` : range;
};

export const parseInteger = (input: string, range: OptionCountRange): number => {
  if (!/^[+-]?\d+$/.test(input)) {
    throw new InputFormatError('Only an integer is accepted');
  }
  const value = Number(input);
  if (!((range.lower <= value && value <= range.upper) || range.extras.includes(value))) {
    throw new InputFormatError(`The integer should be one of ${describeRange(range)}`);
  }
  return value;
};

/** Zero-based indices of the options picked by 1-based input such as "2" or "1, 3". */
export const parseOptionIndices = (input: string, optionCount: number, multiple: boolean): number[] => {
  const indices = new Set<number>();
  for (const token of splitTokens(input, multiple)) {
    if (!/^\d+$/.test(token)) {
      throw new InputFormatError(
        token.includes(DELIMITER) && !multiple
          ? 'Only one option index is accepted'
          : 'Only option indices are accepted',
      );
    }
    const index = Number(token) - 1;
    if (index < 0 || index >= optionCount) {
      throw new InputFormatError(`${token} is not a valid option index`);
    }
    indices.add(index);
  }
  return Array.from(indices).sort((a, b) => a - b);
};

@Injectable()
export class Prompter {
  constructor(@Inject(CONSOLE_IO) private readonly io: ConsoleIO) {}

  print(text: string): void {
    this.io.prompt(text);
  }

  success(text: string): string {
    return this.io.emphasizeSuccess(text);
  }

  failure(text: string): string {
    return this.io.emphasizeFailure(text);
  }

  async text(head: string, multiple: boolean): Promise<string[]> {
    this.print(`\n${capitalize(head)}:`);
    return splitTokens(await this.readInput(), multiple);
  }

  async integer(head: string, range: OptionCountRange): Promise<number> {
    this.print(`\n${capitalize(head)} (${describeRange(range)}):`);
    return this.readUntilValid((input) => parseInteger(input, range));
  }

  async select<T>(head: string, choices: readonly Choice<T>[]): Promise<T> {
    const [value] = await this.selectMany(head, choices, false);
    return value;
  }

  async selectMany<T>(head: string, choices: readonly Choice<T>[], multiple = true): Promise<T[]> {
    const [open, close] = multiple ? ['[', ']'] : ['(', ')'];
    const body = choices.map((choice, i) => `${open}${i + 1}${close} ${choice.label}`).join('\n');
    this.print(`\n${capitalize(head)}:\n${body}`);

    const indices = await this.readUntilValid((input) =>
      parseOptionIndices(input, choices.length, multiple),
    );
    return indices.map((index) => choices[index].value);
  }

  private async readInput(): Promise<string> {
    const line = await this.io.readLine();
    const input = line?.trim();
    if (!input) {
      throw new EndOfSession();
    }
    return input;
  }

  private async readUntilValid<T>(parse: (input: string) => T): Promise<T> {
    for (;;) {
      const input = await this.readInput();
      try {
        return parse(input);
      } catch (error) {
        if (!(error instanceof InputFormatError)) {
          throw error;
        }
        this.print(`Error: ${error.message}.`);
      }
    }
  }
}
