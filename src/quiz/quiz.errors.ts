/** The filtered dataset cannot produce a quiz. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** Malformed input; the prompt is shown again and nothing is counted. */
export class InputFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputFormatError';
  }
}

/** Empty input or a closed stream; unwinds the session without further output. */
export class EndOfSession extends Error {
  constructor() {
    super('End of session');
    this.name = 'EndOfSession';
  }
}
