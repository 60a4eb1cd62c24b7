/**
 * Import Command
 *
 * Streams a voter extract through the import pipeline into the state's
 * voter table, using the configuration saved by `onboard`.
 *
 * Usage:
 *   voter-ingest import <state_code> <input_path> [options]
 *
 * Exit codes: 0 success (row-level errors included), 2 configuration error,
 * 3 storage error, 1 anything else.
 */

import path from 'path';
import type { Command } from 'commander';
import type { StorageSink } from '@rollcall/types';
import {
  FileConfigStore,
  ImportPipeline,
  InvalidConfigError,
  SinkError,
  createRowReader,
  getErrorMessage,
  limitRows
} from '@rollcall/data-ingestion';
import type { Logger } from '@rollcall/data-ingestion';
import {
  SqliteStorageSink,
  SupabaseStorageSink,
  createAdminClient,
  defaultTableName
} from '@rollcall/database';
import { parsePositiveInt, resolveRuntimeConfig } from '../config';
import type { CliFlags, RuntimeConfig } from '../config';
import { ExitCode, commandLogger, processIO, runCommand } from '../context';
import type { CommandIO } from '../context';
import { formatSummary } from '../output';
import { requireStateCode } from './onboard';

export interface ImportOptions extends CliFlags {
  limit?: number;
}

export interface ClosableSink extends StorageSink {
  close?: () => void;
}

export type SinkFactory = (runtime: RuntimeConfig, logger: Logger) => ClosableSink;

export const createSink: SinkFactory = (runtime, logger) => {
  if (runtime.sink === 'supabase') {
    if (!runtime.supabase) {
      throw new InvalidConfigError('environment', ['SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required']);
    }
    return new SupabaseStorageSink(createAdminClient(runtime.supabase), { logger });
  }

  try {
    return new SqliteStorageSink(runtime.dbPath, { logger });
  } catch (error) {
    throw new SinkError(`Cannot open database ${runtime.dbPath}: ${getErrorMessage(error)}`, false, { cause: error });
  }
};

export async function runImport(
  stateCode: string,
  inputPath: string,
  options: ImportOptions,
  io: CommandIO = processIO,
  sinkFactory: SinkFactory = createSink
): Promise<ExitCode> {
  return runCommand(io, async () => {
    const state = requireStateCode(stateCode);
    const runtime = resolveRuntimeConfig(options, io.env);
    const logger = commandLogger(runtime.verbose, io.env);

    const config = await new FileConfigStore(runtime.configDir, logger).load(state);
    const scope = { state_code: state, table: runtime.table ?? defaultTableName(state) };
    const reader = createRowReader(inputPath, { encoding: runtime.encoding, logger });
    const rows = options.limit === undefined ? reader.rows() : limitRows(reader.rows(), options.limit);

    const sink = sinkFactory(runtime, logger);
    const controller = new AbortController();
    const onInterrupt = (): void => {
      io.err('Interrupted; stopping after the current row');
      controller.abort();
    };

    try {
      process.once('SIGINT', onInterrupt);
      const summary = await new ImportPipeline({ logger }).run(state, rows, config, sink, scope, {
        signal: controller.signal,
        sourceRef: path.basename(inputPath),
        logger,
        onProgress: progress => logger.info('Import progress', { ...progress })
      });

      formatSummary(summary).forEach(line => io.out(line));
      return ExitCode.SUCCESS;
    } finally {
      process.removeListener('SIGINT', onInterrupt);
      sink.close?.();
    }
  });
}

export function registerImportCommand(program: Command): void {
  program
    .command('import')
    .description('Import a voter file using the saved state configuration')
    .argument('<state_code>', 'Two-letter state code (e.g. WA)')
    .argument('<input_path>', 'Voter file (CSV or Excel)')
    .option('--config-dir <dir>', 'Directory holding state configurations')
    .option('--db <path>', 'SQLite database file')
    .option('--table <name>', 'Destination table (default voters_<state>)')
    .option('--sink <kind>', 'Storage backend: sqlite or supabase')
    .option('--encoding <encoding>', 'Text encoding of CSV input (utf8 or latin1)')
    .option('--limit <n>', 'Import at most n rows', parsePositiveInt)
    .option('--verbose', 'Enable debug logging', false)
    .action(async (stateCode: string, inputPath: string, options: ImportOptions) => {
      process.exitCode = await runImport(stateCode, inputPath, options);
    });
}
