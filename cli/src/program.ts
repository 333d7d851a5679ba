/**
 * Builds the `workrun` command-line program.
 */

import { Command } from 'commander';
import { registerRunCommand, type CommandDependencies } from './commands/run.js';
import { registerListCommand } from './commands/list.js';

export const VERSION = '0.1.0';

export function createProgram(deps: CommandDependencies = {}): Command {
  const program = new Command();

  program
    .name('workrun')
    .description('Dispatch workload definitions to an external worker, one at a time')
    .version(VERSION, '-v, --version', 'Show version number')
    .helpOption('-h, --help', 'Show help');

  registerRunCommand(program, deps);
  registerListCommand(program, deps);

  return program;
}
