/**
 * Visualize Command - iamgraph visualize
 *
 * Writes the stored graph as Graphviz DOT or JSON. png and svg are
 * rendered by the external `dot` binary.
 */

import { spawn } from 'node:child_process';
import * as fs from 'node:fs/promises';

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { renderDot, renderJson, sanitizeName } from 'iamgraph-core';
import { createContext } from '../context.js';

export type FileType = 'dot' | 'json' | 'png' | 'svg';

interface VisualizeOptions {
  filetype: FileType;
  output?: string | undefined;
  account?: string | undefined;
  onlyEscalations?: boolean | undefined;
}

/**
 * Pipe DOT text through `dot -T<format> -o <output>`
 */
export function runGraphviz(dot: string, format: 'png' | 'svg', output: string, binary = 'dot'): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(binary, [`-T${format}`, '-o', output], { stdio: ['pipe', 'ignore', 'pipe'] });
    let stderr = '';

    child.stderr.setEncoding('utf-8');
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });
    child.on('error', error => {
      reject(new Error(`Cannot run Graphviz '${binary}': ${error.message}. Install Graphviz or use --filetype dot`));
    });
    child.on('close', code => {
      if (code === 0) {
        resolve();
      } else {
        reject(new Error(`Graphviz '${binary}' exited with code ${code ?? 'null'}: ${stderr.trim()}`));
      }
    });

    child.stdin.end(dot);
  });
}

async function visualizeAction(options: VisualizeOptions, command: Command): Promise<void> {
  const { config, store, logger } = createContext(command);
  const snapshot = await store.load(config.profile, options.account);
  const renderOptions = {
    includeAccessEdges: !options.onlyEscalations,
    name: `${snapshot.metadata.profile}-${snapshot.metadata.accountId}`,
  };

  if (options.filetype === 'dot' || options.filetype === 'json') {
    const text = options.filetype === 'dot'
      ? renderDot(snapshot.graph, renderOptions)
      : renderJson(snapshot.graph, renderOptions);
    if (!options.output) {
      process.stdout.write(text);
      return;
    }
    await fs.writeFile(options.output, text, 'utf-8');
    console.log(chalk.green(`Wrote ${options.output}`));
    return;
  }

  const output = options.output
    ?? `${sanitizeName(snapshot.metadata.profile)}-${sanitizeName(snapshot.metadata.accountId)}.${options.filetype}`;
  logger.debug(`Rendering ${options.filetype} with Graphviz`);
  await runGraphviz(renderDot(snapshot.graph, renderOptions), options.filetype, output);
  console.log(chalk.green(`Wrote ${output}`));
}

export function createVisualizeCommand(): Command {
  return new Command('visualize')
    .description('Export the stored graph for viewing')
    .addOption(
      new Option('-t, --filetype <type>', 'Output type').choices(['dot', 'json', 'png', 'svg']).default('svg')
    )
    .option('-o, --output <file>', 'Output file (dot and json default to stdout)')
    .option('--account <id>', 'Account id (default: most recent graph of the profile)')
    .option('--only-escalations', 'Leave out role assumption edges')
    .action(visualizeAction);
}
