/**
 * Schema Detector Tests
 * Header matching tiers, value-pattern inference and conflict resolution
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import type { RawRow } from '@rollcall/types';
import { SchemaDetector } from '../SchemaDetector';
import { createLogger } from '../../utils/logger';

const silentLogger = createLogger({ level: 'silent' });

describe('SchemaDetector', () => {
  let detector: SchemaDetector;

  beforeEach(() => {
    detector = new SchemaDetector({ logger: silentLogger });
  });

  describe('header matching', () => {
    it.each(['VoterID', 'voter_id', 'Voter ID', ' VOTER-ID '])('matches %p exactly', header => {
      const result = detector.detect([header], []);
      expect(result.mappings).toEqual([
        { source_column: header, canonical_field: 'voter_id', confidence: 1.0, method: 'exact' }
      ]);
    });

    it('maps a typical export through aliases', () => {
      const headers = ['VID', 'First', 'Last', 'Addr1', 'City', 'ST', 'Zip'];
      const rows: RawRow[] = [
        { VID: '1', First: 'Ana', Last: 'Diaz', Addr1: '12 Main St', City: 'Olympia', ST: 'WA', Zip: '98501' }
      ];

      const result = detector.detect(headers, rows);

      expect(result.mappings).toEqual([
        { source_column: 'VID', canonical_field: 'voter_id', confidence: 0.8, method: 'alias' },
        { source_column: 'First', canonical_field: 'first_name', confidence: 0.8, method: 'alias' },
        { source_column: 'Last', canonical_field: 'last_name', confidence: 0.8, method: 'alias' },
        { source_column: 'Addr1', canonical_field: 'address_line', confidence: 0.8, method: 'alias' },
        { source_column: 'City', canonical_field: 'city', confidence: 1.0, method: 'exact' },
        { source_column: 'ST', canonical_field: 'state', confidence: 0.8, method: 'alias' },
        { source_column: 'Zip', canonical_field: 'zip', confidence: 1.0, method: 'exact' }
      ]);
      expect(result.unmappedRequired).toEqual([]);
      expect(result.unmappedColumns).toEqual([]);
      expect(result.conflicts).toEqual([]);
    });

    it('maps split street components from contained aliases', () => {
      const headers = ['StateVoterID', 'FName', 'LName', 'RegStNum', 'RegStName', 'RegStType', 'RegZipCode'];

      const result = detector.detect(headers, []);
      const byColumn = new Map(result.mappings.map(mapping => [mapping.source_column, mapping]));

      expect(byColumn.get('StateVoterID')?.canonical_field).toBe('voter_id');
      expect(byColumn.get('RegStNum')).toEqual({
        source_column: 'RegStNum',
        canonical_field: 'street_number',
        confidence: 0.6,
        method: 'alias'
      });
      expect(byColumn.get('RegStName')?.canonical_field).toBe('street_name');
      expect(byColumn.get('RegStType')?.canonical_field).toBe('street_type');
      expect(byColumn.get('RegZipCode')?.canonical_field).toBe('zip');
      expect(result.unmappedRequired).toEqual([]);
    });

    it('does not take mailing columns for residential fields', () => {
      const headers = ['VID', 'Address', 'City', 'MailCity'];
      const rows: RawRow[] = [{ VID: '1', Address: '1 Elm St', City: 'Tacoma', MailCity: 'Seattle' }];

      const result = detector.detect(headers, rows);

      expect(result.mappings.map(mapping => mapping.source_column)).toEqual(['VID', 'Address', 'City']);
      expect(result.unmappedColumns).toEqual(['MailCity']);
    });

    it('reports required fields left without a mapping', () => {
      const result = detector.detect(['First', 'Last'], []);
      expect(result.unmappedRequired).toEqual(['voter_id', 'address_line', 'street_number', 'street_name']);
    });
  });

  describe('value-pattern inference', () => {
    const rows: RawRow[] = [
      { VID: '1', Address: '1 Elm St', Col7: '98101', Col8: 'x' },
      { VID: '2', Address: '2 Elm St', Col7: '98102-1234', Col8: 'WA' },
      { VID: '3', Address: '3 Elm St', Col7: 'n/a', Col8: 'y' },
      { VID: '4', Address: '4 Elm St', Col7: '98103', Col8: 'OR' }
    ];

    it('scales confidence by the fraction of matching samples', () => {
      const result = detector.detect(['VID', 'Address', 'Col7'], rows);
      expect(result.mappings[2]).toEqual({
        source_column: 'Col7',
        canonical_field: 'zip',
        confidence: 0.525,
        method: 'pattern'
      });
    });

    it('discards candidates below the minimum confidence', () => {
      const result = detector.detect(['VID', 'Address', 'Col8'], rows);
      expect(result.mappings.map(mapping => mapping.canonical_field)).toEqual(['voter_id', 'address_line']);
      expect(result.unmappedColumns).toEqual(['Col8']);
    });

    it('only considers the configured number of sample rows', () => {
      const limited = new SchemaDetector({ logger: silentLogger, sampleSize: 2 });
      const result = limited.detect(['VID', 'Address', 'Col7'], rows);
      expect(result.mappings[2]).toEqual({
        source_column: 'Col7',
        canonical_field: 'zip',
        confidence: 0.7,
        method: 'pattern'
      });
    });

    it('gives no pattern candidate without samples', () => {
      const result = detector.detect(['VID', 'Address', 'Col7'], []);
      expect(result.unmappedColumns).toEqual(['Col7']);
    });
  });

  describe('conflicts', () => {
    it('keeps the higher confidence column and records the other', () => {
      const result = detector.detect(['VID', 'Voter_ID', 'Address'], []);

      expect(result.mappings.map(mapping => mapping.source_column)).toEqual(['Voter_ID', 'Address']);
      expect(result.conflicts).toEqual([
        {
          canonical_field: 'voter_id',
          kept_column: 'Voter_ID',
          discarded_column: 'VID',
          discarded_confidence: 0.8,
          reason: 'lower_confidence'
        }
      ]);
    });

    it('breaks ties by header order', () => {
      const result = detector.detect(['ID', 'VID'], []);
      expect(result.mappings.map(mapping => mapping.source_column)).toEqual(['ID']);
      expect(result.conflicts[0]).toMatchObject({ kept_column: 'ID', discarded_column: 'VID' });
    });

    it('prefers complete split components when they are at least as confident', () => {
      const result = detector.detect(['VID', 'Address', 'HouseNumber', 'StreetName'], []);

      expect(result.mappings.map(mapping => mapping.canonical_field)).toEqual([
        'voter_id',
        'street_number',
        'street_name'
      ]);
      expect(result.conflicts).toEqual([
        {
          canonical_field: 'address_line',
          kept_column: null,
          discarded_column: 'Address',
          discarded_confidence: 0.8,
          reason: 'address_precedence'
        }
      ]);
    });

    it('keeps the combined line over less confident split components', () => {
      const result = detector.detect(['VID', 'Address', 'RegStNum', 'RegStName'], []);

      expect(result.mappings.map(mapping => mapping.canonical_field)).toEqual(['voter_id', 'address_line']);
      expect(result.conflicts.map(conflict => [conflict.canonical_field, conflict.kept_column])).toEqual([
        ['street_number', 'Address'],
        ['street_name', 'Address']
      ]);
    });
  });

  it('is deterministic', () => {
    const headers = ['VID', 'Addr1', 'ST', 'Col7'];
    const rows: RawRow[] = [
      { VID: '1', Addr1: '9 Oak Ave', ST: 'WA', Col7: '98501' },
      { VID: '2', Addr1: '10 Oak Ave', ST: 'WA', Col7: '98502' }
    ];

    expect(detector.detect(headers, rows)).toEqual(detector.detect(headers, rows));
  });
});
