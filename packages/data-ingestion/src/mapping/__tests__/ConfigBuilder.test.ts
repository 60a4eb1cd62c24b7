/**
 * Config Builder Tests
 * Onboarding, re-onboarding against changed headers and manual overrides
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import type { RawRow } from '@rollcall/types';
import { ConfigBuilder } from '../ConfigBuilder';
import { InvalidConfigError } from '../../errors';
import { createLogger } from '../../utils/logger';

const HEADERS = ['VID', 'First', 'Last', 'Addr1', 'City', 'ST', 'Zip', 'Col9'];
const ROWS: RawRow[] = [
  { VID: '100', First: 'Ana', Last: 'Diaz', Addr1: '12 Main St', City: 'Olympia', ST: 'WA', Zip: '98501', Col9: 'P-1' }
];

describe('ConfigBuilder', () => {
  let now: Date;
  let builder: ConfigBuilder;

  beforeEach(() => {
    now = new Date('2026-01-01T00:00:00.000Z');
    builder = new ConfigBuilder({ clock: () => now, logger: createLogger({ level: 'silent' }) });
  });

  it('creates version 1 from detection', () => {
    const config = builder.build('wa', HEADERS, ROWS);

    expect(config.state_code).toBe('WA');
    expect(config.version).toBe(1);
    expect(config.source_columns).toEqual(HEADERS);
    expect(config.pending_confirmation).toEqual([]);
    expect(config.created_at).toBe('2026-01-01T00:00:00.000Z');
    expect(config.updated_at).toBe('2026-01-01T00:00:00.000Z');
    expect(config.field_mappings.map(mapping => mapping.canonical_field)).toEqual([
      'voter_id',
      'first_name',
      'last_name',
      'address_line',
      'city',
      'state',
      'zip'
    ]);
  });

  it('is idempotent for unchanged headers', () => {
    const first = builder.build('WA', HEADERS, ROWS);
    now = new Date('2026-02-01T00:00:00.000Z');
    const second = builder.build('WA', HEADERS, ROWS, first);

    expect(second.field_mappings).toEqual(first.field_mappings);
    expect(second.version).toBe(1);
    expect(second.created_at).toBe('2026-01-01T00:00:00.000Z');
    expect(second.updated_at).toBe('2026-02-01T00:00:00.000Z');
  });

  it('keeps manual mappings when re-onboarding', () => {
    const detected = builder.build('WA', HEADERS, ROWS);
    const manual = builder.applyManualMappings(detected, { Col9: 'precinct' });

    expect(manual.version).toBe(2);
    expect(manual.field_mappings[manual.field_mappings.length - 1]).toEqual({
      source_column: 'Col9',
      canonical_field: 'precinct',
      confidence: 1.0,
      method: 'manual'
    });

    const rebuilt = builder.build('WA', HEADERS, ROWS, manual);
    expect(rebuilt.field_mappings).toEqual(manual.field_mappings);
    expect(rebuilt.version).toBe(2);
  });

  it('keeps the version when a manual mapping is already in place', () => {
    const manual = builder.applyManualMappings(builder.build('WA', HEADERS, ROWS), { Col9: 'precinct' });
    const rebuilt = builder.build('WA', HEADERS, ROWS, manual);

    const again = builder.applyManualMappings(rebuilt, { Col9: 'precinct' });

    expect(again.version).toBe(2);
    expect(again.field_mappings).toEqual(manual.field_mappings);
  });

  it('replaces existing mappings for the same field or column', () => {
    const detected = builder.build('WA', HEADERS, ROWS);
    const manual = builder.applyManualMappings(detected, { Col9: 'city' });

    expect(manual.field_mappings.filter(mapping => mapping.canonical_field === 'city')).toEqual([
      { source_column: 'Col9', canonical_field: 'city', confidence: 1.0, method: 'manual' }
    ]);
    expect(manual.field_mappings.some(mapping => mapping.source_column === 'City')).toBe(false);
  });

  it('rejects manual mappings for unknown columns', () => {
    const detected = builder.build('WA', HEADERS, ROWS);
    expect(() => builder.applyManualMappings(detected, { Precinct: 'precinct' })).toThrow(InvalidConfigError);
  });

  it('flags fields whose column vanished and fills them from fresh detection', () => {
    const first = builder.build('WA', HEADERS, ROWS);
    const changedHeaders = ['VID', 'First', 'Last', 'Addr1', 'City', 'ST', 'PostalCode', 'Col9'];
    const changedRows: RawRow[] = [{ ...ROWS[0], PostalCode: '98501' }];

    const second = builder.build('WA', changedHeaders, changedRows, first);

    expect(second.version).toBe(2);
    expect(second.pending_confirmation).toEqual(['zip']);
    expect(second.source_columns).toEqual(changedHeaders);
    expect(second.field_mappings[6]).toEqual({
      source_column: 'PostalCode',
      canonical_field: 'zip',
      confidence: 0.8,
      method: 'alias'
    });
  });

  it('clears pending fields once they are mapped by hand', () => {
    const first = builder.build('WA', HEADERS, ROWS);
    const second = builder.build('WA', HEADERS.filter(header => header !== 'Zip'), ROWS, first);
    expect(second.pending_confirmation).toEqual(['zip']);

    const confirmed = builder.applyManualMappings(second, { Col9: 'zip' });
    expect(confirmed.pending_confirmation).toEqual([]);
    expect(confirmed.version).toBe(3);
  });

  it('refuses a config that belongs to another state', () => {
    const oregon = builder.build('OR', HEADERS, ROWS);
    expect(() => builder.build('WA', HEADERS, ROWS, oregon)).toThrow(InvalidConfigError);
  });

  it('reports completeness', () => {
    const complete = builder.build('WA', HEADERS, ROWS);
    const partial = builder.build('WA', ['First', 'Last'], []);

    expect(builder.isComplete(complete)).toBe(true);
    expect(builder.isComplete(partial)).toBe(false);
    expect(builder.missingRequiredFields(partial.field_mappings)).toEqual([
      'voter_id',
      'address_line',
      'street_number',
      'street_name'
    ]);
  });
});
