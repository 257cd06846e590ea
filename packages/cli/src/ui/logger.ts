/**
 * Coloured logger for the terminal
 */

import chalk from 'chalk';
import { ConsoleLogger, type Logger, type LogLevel } from 'iamgraph-core';

const COLORS: Record<LogLevel, (text: string) => string> = {
  error: chalk.red,
  warn: chalk.yellow,
  info: text => text,
  debug: chalk.gray,
};

export function createCliLogger(level: LogLevel): Logger {
  return new ConsoleLogger(level, {
    timestamps: level === 'debug',
    sink: (lineLevel, line) => {
      process.stderr.write(`${COLORS[lineLevel](line)}\n`);
    },
  });
}
