/**
 * Spinner for long-running commands
 *
 * Writes to stderr so stdout stays clean for command output.
 */

import ora, { type Ora } from 'ora';

export class Spinner {
  private readonly ora: Ora;

  constructor(text: string) {
    this.ora = ora({ text, stream: process.stderr });
  }

  start(): this {
    this.ora.start();
    return this;
  }

  succeed(text?: string): this {
    this.ora.succeed(text);
    return this;
  }

  fail(text?: string): this {
    this.ora.fail(text);
    return this;
  }
}

export function createSpinner(text: string): Spinner {
  return new Spinner(text);
}
