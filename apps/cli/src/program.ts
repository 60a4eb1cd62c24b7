import { Command } from 'commander';
import { registerCommands } from './commands';

export function createProgram(): Command {
  const program = new Command('voter-ingest')
    .description('Schema detection, normalization and deduplicated import of state voter files')
    .version('0.1.0');

  registerCommands(program);
  return program;
}
