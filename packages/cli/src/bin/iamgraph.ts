#!/usr/bin/env tsx
/**
 * iamgraph CLI Entry Point
 */

import { CommanderError } from 'commander';
import { createProgram } from '../program.js';
import { exitCodeFor, formatError } from '../errors.js';

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    // Commander has already printed its own message
    if (!(error instanceof CommanderError)) {
      console.error(formatError(error));
      if (process.env['DEBUG'] && error instanceof Error) {
        console.error(error.stack);
      }
    }
    process.exit(exitCodeFor(error));
  }
}

void main();
