/**
 * Bad input from the person at the terminal: unknown operation, bad mode,
 * missing restore file. Raised before any external process is started.
 */
export class UsageError extends Error {
  constructor(message: string, public readonly hint?: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
