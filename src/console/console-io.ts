export const CONSOLE_IO = 'CONSOLE_IO';

export interface ConsoleIO {
  prompt(text: string): void;
  /** The next line of input, or null once the input stream has ended. */
  readLine(): Promise<string | null>;
  emphasizeSuccess(text: string): string;
  emphasizeFailure(text: string): string;
}
