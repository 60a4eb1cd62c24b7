/**
 * Voter table layout shared by the storage sinks
 */

import { z } from 'zod';
import type { CanonicalRecord } from '@rollcall/types';

export const VOTER_COLUMNS = [
  'voter_id',
  'first_name',
  'middle_name',
  'last_name',
  'name_suffix',
  'street_number',
  'street_name',
  'unit',
  'city',
  'state',
  'zip',
  'birth_date',
  'registration_date',
  'party',
  'county',
  'precinct',
  'state_code',
  'source_row_ref'
] as const satisfies ReadonlyArray<keyof CanonicalRecord>;

export const ADDRESS_COLUMNS = ['street_number', 'street_name', 'unit', 'city', 'zip'] as const;

// Row payload written to a voter table
export const VoterRowSchema = z.object({
  voter_id: z.string().min(1),
  first_name: z.string(),
  middle_name: z.string(),
  last_name: z.string(),
  name_suffix: z.string(),
  street_number: z.string(),
  street_name: z.string(),
  unit: z.string(),
  city: z.string(),
  state: z.string(),
  zip: z.string(),
  birth_date: z.string(),
  registration_date: z.string(),
  party: z.string(),
  county: z.string(),
  precinct: z.string(),
  state_code: z.string().length(2),
  source_row_ref: z.string()
});

export type VoterRow = z.infer<typeof VoterRowSchema>;

const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]{0,62}$/;

export function defaultTableName(stateCode: string): string {
  return `voters_${stateCode.toLowerCase()}`;
}

export function isValidTableName(table: string): boolean {
  return TABLE_NAME_PATTERN.test(table);
}

export function assertValidTableName(table: string): string {
  if (!isValidTableName(table)) {
    throw new Error(`Invalid table name "${table}": use letters, digits and underscores`);
  }
  return table;
}
