/**
 * Onboard Command
 *
 * Samples a state's voter extract, detects how its columns map onto the
 * canonical voter record and saves the result as the state's configuration.
 *
 * Usage:
 *   voter-ingest onboard <state_code> <input_path> [options]
 */

import type { Command } from 'commander';
import {
  ConfigBuilder,
  DEFAULT_SAMPLE_SIZE,
  FileConfigStore,
  InvalidConfigError,
  STATE_ABBREVIATIONS,
  SchemaDetector,
  createError,
  createRowReader,
  sampleRows
} from '@rollcall/data-ingestion';
import { collect, parseMapPairs, parsePositiveInt, resolveRuntimeConfig } from '../config';
import type { CliFlags } from '../config';
import { ExitCode, commandLogger, processIO, runCommand } from '../context';
import type { CommandIO } from '../context';
import { formatDetectionWarnings, formatMappings } from '../output';

export interface OnboardOptions extends CliFlags {
  sampleSize: number;
  map: string[];
  force: boolean;
}

export function requireStateCode(stateCode: string): string {
  const state = stateCode.toUpperCase();
  if (!STATE_ABBREVIATIONS.has(state)) {
    throw new InvalidConfigError('state_code', [`"${stateCode}" is not a US state or territory code`]);
  }
  return state;
}

export async function runOnboard(
  stateCode: string,
  inputPath: string,
  options: OnboardOptions,
  io: CommandIO = processIO
): Promise<ExitCode> {
  return runCommand(io, async () => {
    const state = requireStateCode(stateCode);
    const runtime = resolveRuntimeConfig(options, io.env);
    const logger = commandLogger(runtime.verbose, io.env);
    const manual = parseMapPairs(options.map);

    const reader = createRowReader(inputPath, { encoding: runtime.encoding, logger });
    const sample = await sampleRows(reader, options.sampleSize);
    if (sample.headers.length === 0) {
      throw createError(`No header row found in ${inputPath}`);
    }

    const store = new FileConfigStore(runtime.configDir, logger);
    const existing = options.force ? undefined : await store.loadIfExists(state);
    const builder = new ConfigBuilder({
      logger,
      detector: new SchemaDetector({ logger, sampleSize: options.sampleSize })
    });

    const { config: detected, detection } = builder.buildWithDetection(state, sample.headers, sample.rows, existing);
    const config = Object.keys(manual).length > 0 ? builder.applyManualMappings(detected, manual) : detected;
    const savedPath = await store.save(config);

    io.out(`Saved ${state} configuration version ${config.version} to ${savedPath}`);
    io.out(`Sampled ${sample.rows.length} row(s) over ${sample.headers.length} column(s)`);
    io.out('Mappings:');
    formatMappings(config).forEach(line => io.out(line));

    const warnings = formatDetectionWarnings(detection);
    if (warnings.length > 0) {
      io.out('Warnings:');
      warnings.forEach(line => io.out(line));
    }

    if (config.pending_confirmation.length > 0) {
      io.out(`Needs confirmation after header change: ${config.pending_confirmation.join(', ')}`);
    }

    const missing = builder.missingRequiredFields(config.field_mappings);
    if (missing.length > 0) {
      io.out(`Unmapped required fields: ${missing.join(', ')}`);
      io.out('Imports will be refused until these are mapped (use --map COLUMN=field).');
    }

    return ExitCode.SUCCESS;
  });
}

export function registerOnboardCommand(program: Command): void {
  program
    .command('onboard')
    .description('Detect column mappings for a state export and save its configuration')
    .argument('<state_code>', 'Two-letter state code (e.g. WA)')
    .argument('<input_path>', 'Sample voter file (CSV or Excel)')
    .option('--config-dir <dir>', 'Directory holding state configurations')
    .option('--sample-size <n>', 'Rows to sample for detection', parsePositiveInt, DEFAULT_SAMPLE_SIZE)
    .option('--map <column=field>', 'Map a source column by hand (repeatable)', collect, [])
    .option('--encoding <encoding>', 'Text encoding of CSV input (utf8 or latin1)')
    .option('--force', 'Ignore any existing configuration for the state', false)
    .option('--verbose', 'Enable debug logging', false)
    .action(async (stateCode: string, inputPath: string, options: OnboardOptions) => {
      process.exitCode = await runOnboard(stateCode, inputPath, options);
    });
}
