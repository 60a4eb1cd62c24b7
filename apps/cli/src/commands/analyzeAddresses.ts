/**
 * Analyze Addresses Command
 *
 * Lists residential addresses shared by many registered voters in an
 * imported SQLite table, optionally writing the full report as JSON.
 *
 * Usage:
 *   voter-ingest analyze-addresses <state_code> [options]
 */

import fs from 'fs/promises';
import type { Command } from 'commander';
import type { CrowdedAddress } from '@rollcall/types';
import { DEFAULT_CROWDED_THRESHOLD, SqliteStorageSink, defaultTableName } from '@rollcall/database';
import { parsePositiveInt, resolveRuntimeConfig } from '../config';
import type { CliFlags } from '../config';
import { ExitCode, commandLogger, processIO, runCommand } from '../context';
import type { CommandIO } from '../context';
import { formatCrowdedAddresses } from '../output';
import { requireStateCode } from './onboard';

export interface AnalyzeAddressesOptions extends CliFlags {
  threshold: number;
  output?: string;
}

export interface AddressReport {
  state_code: string;
  table: string;
  threshold: number;
  generated_at: string;
  addresses: CrowdedAddress[];
}

export async function runAnalyzeAddresses(
  stateCode: string,
  options: AnalyzeAddressesOptions,
  io: CommandIO = processIO
): Promise<ExitCode> {
  return runCommand(io, async () => {
    const state = requireStateCode(stateCode);
    const runtime = resolveRuntimeConfig(options, io.env);
    const logger = commandLogger(runtime.verbose, io.env);
    const scope = { state_code: state, table: runtime.table ?? defaultTableName(state) };

    const sink = new SqliteStorageSink(runtime.dbPath, { logger });
    try {
      if (!(await sink.exists(scope))) {
        io.err(`Table ${scope.table} not found in ${runtime.dbPath}`);
        return ExitCode.FAILURE;
      }

      const addresses = sink.addressesWithManyVoters(scope, options.threshold);
      io.out(`${addresses.length} address(es) with at least ${options.threshold} voters in ${scope.table}`);
      formatCrowdedAddresses(addresses).forEach(line => io.out(line));

      if (options.output) {
        const report: AddressReport = {
          state_code: state,
          table: scope.table,
          threshold: options.threshold,
          generated_at: new Date().toISOString(),
          addresses
        };
        await fs.writeFile(options.output, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
        io.out(`Report written to ${options.output}`);
      }

      return ExitCode.SUCCESS;
    } finally {
      sink.close();
    }
  });
}

export function registerAnalyzeAddressesCommand(program: Command): void {
  program
    .command('analyze-addresses')
    .description('List addresses with many registered voters')
    .argument('<state_code>', 'Two-letter state code (e.g. WA)')
    .option('--db <path>', 'SQLite database file')
    .option('--table <name>', 'Table to analyze (default voters_<state>)')
    .option('--threshold <n>', 'Minimum voters at one address', parsePositiveInt, DEFAULT_CROWDED_THRESHOLD)
    .option('--output <file>', 'Also write the report as JSON')
    .option('--verbose', 'Enable debug logging', false)
    .action(async (stateCode: string, options: AnalyzeAddressesOptions) => {
      process.exitCode = await runAnalyzeAddresses(stateCode, options);
    });
}
