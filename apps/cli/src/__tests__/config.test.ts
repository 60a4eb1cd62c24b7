import { describe, it, expect } from '@jest/globals';
import path from 'path';
import { InvalidArgumentError } from 'commander';
import {
  ConfigMissingError,
  InvalidConfigError,
  SinkError,
  ValidationError
} from '@rollcall/data-ingestion';
import { collect, parseMapPairs, parsePositiveInt, resolveRuntimeConfig } from '../config';
import { ExitCode, exitCodeFor } from '../exitCodes';

describe('resolveRuntimeConfig', () => {
  it('falls back to defaults', () => {
    expect(resolveRuntimeConfig({}, {})).toMatchObject({
      configDir: path.resolve('configs'),
      dbPath: 'voters.db',
      verbose: false,
      sink: 'sqlite',
      encoding: 'utf8'
    });
  });

  it('prefers flags over environment variables', () => {
    const env = { VOTER_DB_PATH: '/data/env.db', VOTER_CONFIG_DIR: '/etc/voters', VOTER_ENCODING: 'latin1' };

    const fromEnv = resolveRuntimeConfig({}, env);
    expect(fromEnv).toMatchObject({ dbPath: '/data/env.db', configDir: '/etc/voters', encoding: 'latin1' });

    const fromFlags = resolveRuntimeConfig({ db: '/tmp/flag.db', encoding: 'utf8' }, env);
    expect(fromFlags).toMatchObject({ dbPath: '/tmp/flag.db', configDir: '/etc/voters', encoding: 'utf8' });
  });

  it('reads Supabase settings for the supabase sink', () => {
    const runtime = resolveRuntimeConfig(
      { sink: 'supabase' },
      { SUPABASE_URL: 'http://localhost:54321', SUPABASE_SERVICE_ROLE_KEY: 'test-secret' }
    );

    expect(runtime.supabase).toEqual({ url: 'http://localhost:54321', serviceRoleKey: 'test-secret' });
  });

  it('rejects the supabase sink without credentials', () => {
    expect(() => resolveRuntimeConfig({ sink: 'supabase' }, {})).toThrow(InvalidConfigError);
    expect(() => resolveRuntimeConfig({ sink: 'supabase' }, { SUPABASE_URL: 'http://localhost:54321' })).toThrow(
      'Invalid configuration in environment: Missing env var: SUPABASE_SERVICE_ROLE_KEY'
    );
  });

  it('rejects unknown sinks, encodings and table names', () => {
    expect(() => resolveRuntimeConfig({ sink: 'postgres' }, {})).toThrow(InvalidConfigError);
    expect(() => resolveRuntimeConfig({ encoding: 'utf16le' }, {})).toThrow(InvalidConfigError);
    expect(() => resolveRuntimeConfig({ table: 'voters-wa' }, {})).toThrow(InvalidConfigError);
  });
});

describe('parseMapPairs', () => {
  it('maps columns to canonical fields', () => {
    expect(parseMapPairs(['Col9=precinct', 'Res Zip=zip'])).toEqual({ Col9: 'precinct', 'Res Zip': 'zip' });
  });

  it('splits on the last equals sign', () => {
    expect(parseMapPairs(['A=B=county'])).toEqual({ 'A=B': 'county' });
  });

  it('reports every malformed pair', () => {
    const error = (() => {
      try {
        parseMapPairs(['Col9', 'Col10=shoe_size']);
        return undefined;
      } catch (caught) {
        return caught;
      }
    })();

    expect(error).toBeInstanceOf(InvalidConfigError);
    if (error instanceof InvalidConfigError) {
      expect(error.issues).toEqual([
        'expected COLUMN=field, got "Col9"',
        'unknown canonical field in "Col10=shoe_size"'
      ]);
    }
  });
});

describe('option parsers', () => {
  it('accepts positive integers only', () => {
    expect(parsePositiveInt('25')).toBe(25);
    expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('2.5')).toThrow(InvalidArgumentError);
  });

  it('collects repeated options', () => {
    expect(collect('B=zip', ['A=city'])).toEqual(['A=city', 'B=zip']);
  });
});

describe('exitCodeFor', () => {
  it('maps errors to exit codes', () => {
    expect(exitCodeFor(new ConfigMissingError('WA'))).toBe(ExitCode.CONFIG_ERROR);
    expect(exitCodeFor(new InvalidConfigError('wa_config.json', ['bad']))).toBe(ExitCode.CONFIG_ERROR);
    expect(exitCodeFor(new SinkError('disk full', false))).toBe(ExitCode.SINK_ERROR);
    expect(exitCodeFor(new ValidationError('Missing voter_id', 1))).toBe(ExitCode.FAILURE);
    expect(exitCodeFor(new Error('boom'))).toBe(ExitCode.FAILURE);
  });
});
