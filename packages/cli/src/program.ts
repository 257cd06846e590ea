/**
 * CLI program definition
 */

import { Command } from 'commander';
import { VERSION } from 'iamgraph-core';
import {
  createArgQueryCommand,
  createGraphCommand,
  createQueryCommand,
  createVisualizeCommand,
} from './commands/index.js';

function throwInsteadOfExit(command: Command): void {
  command.exitOverride();
  for (const sub of command.commands) throwInsteadOfExit(sub);
}

/**
 * Create and configure the main CLI program. Commander errors are thrown
 * as CommanderError instead of exiting the process.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('iamgraph')
    .description('IAM privilege-escalation graph - find who can become whom')
    .version(VERSION, '-v, --version', 'Output the current version')
    .option('--profile <name>', 'Credential profile, also the storage key (env: AWS_PROFILE)')
    .option('--storage <dir>', 'Storage root (env: IAMGRAPH_STORAGE)')
    .option('--region <region>', 'Region for regional API calls (env: AWS_REGION)')
    .option('--verbose', 'Enable verbose output')
    .option('--no-color', 'Disable colored output');

  program.addCommand(createGraphCommand());
  program.addCommand(createQueryCommand());
  program.addCommand(createArgQueryCommand());
  program.addCommand(createVisualizeCommand());

  program.addHelpText(
    'after',
    `
Examples:
  $ iamgraph graph create                        Build the graph for the default profile
  $ iamgraph graph create --from-file auth.json  Build from an authorization-details export
  $ iamgraph graph list                          List stored graphs
  $ iamgraph graph display                       Show graph statistics
  $ iamgraph query -s "preset privesc *"         Who can escalate to admin
  $ iamgraph query -s "can role/A reach role/B"  Path between two principals
  $ iamgraph argquery -A iam:PassRole            Who can pass roles
  $ iamgraph visualize --filetype dot            Graphviz DOT on stdout
`
  );

  throwInsteadOfExit(program);
  return program;
}
