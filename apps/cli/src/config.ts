/**
 * Runtime configuration for the voter-ingest CLI
 *
 * Precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (VOTER_*, SUPABASE_*), loaded from .env by dotenv
 * 3. Default values
 */

import path from 'path';
import { InvalidArgumentError } from 'commander';
import { z } from 'zod';
import { CANONICAL_FIELDS } from '@rollcall/types';
import { InvalidConfigError, getErrorMessage } from '@rollcall/data-ingestion';
import type { ManualMappings } from '@rollcall/data-ingestion';
import { supabaseConfigFromEnv } from '@rollcall/database';
import type { SupabaseConnectionConfig } from '@rollcall/database';

export const DEFAULT_CONFIG_DIR = 'configs';
export const DEFAULT_DB_PATH = 'voters.db';

export const SinkKindSchema = z.enum(['sqlite', 'supabase']);
export type SinkKind = z.infer<typeof SinkKindSchema>;

export const RuntimeConfigSchema = z.object({
  configDir: z.string().min(1),
  dbPath: z.string().min(1),
  verbose: z.boolean(),
  sink: SinkKindSchema,
  table: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]{0,62}$/, 'table must be a plain identifier').optional(),
  encoding: z.enum(['utf8', 'latin1']),
  supabase: z.object({
    url: z.string().url(),
    serviceRoleKey: z.string().min(1)
  }).optional()
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

// Flags shared by the subcommands; each command passes the ones it has
export interface CliFlags {
  configDir?: string;
  db?: string;
  verbose?: boolean;
  sink?: string;
  table?: string;
  encoding?: string;
}

export function resolveRuntimeConfig(flags: CliFlags, env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const sink = flags.sink ?? env.VOTER_SINK ?? 'sqlite';

  const candidate = {
    configDir: path.resolve(flags.configDir ?? env.VOTER_CONFIG_DIR ?? DEFAULT_CONFIG_DIR),
    dbPath: flags.db ?? env.VOTER_DB_PATH ?? DEFAULT_DB_PATH,
    verbose: flags.verbose ?? false,
    sink,
    table: flags.table,
    encoding: flags.encoding ?? env.VOTER_ENCODING ?? 'utf8',
    supabase: sink === 'supabase' ? supabaseSettings(env) : undefined
  };

  const result = RuntimeConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new InvalidConfigError(
      'command-line options',
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}

function supabaseSettings(env: NodeJS.ProcessEnv): SupabaseConnectionConfig {
  try {
    return supabaseConfigFromEnv(env);
  } catch (error) {
    throw new InvalidConfigError('environment', [getErrorMessage(error)]);
  }
}

const CanonicalFieldSchema = z.enum(CANONICAL_FIELDS);

/**
 * Parse `COLUMN=field` pairs given with --map
 */
export function parseMapPairs(pairs: string[]): ManualMappings {
  const result: ManualMappings = {};
  const issues: string[] = [];

  for (const pair of pairs) {
    const separator = pair.lastIndexOf('=');
    if (separator <= 0 || separator === pair.length - 1) {
      issues.push(`expected COLUMN=field, got "${pair}"`);
      continue;
    }

    const field = CanonicalFieldSchema.safeParse(pair.slice(separator + 1).trim());
    if (!field.success) {
      issues.push(`unknown canonical field in "${pair}"`);
      continue;
    }
    result[pair.slice(0, separator)] = field.data;
  }

  if (issues.length > 0) {
    throw new InvalidConfigError('--map', issues);
  }
  return result;
}

// Commander option parsers

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  return parsed;
}

export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}
