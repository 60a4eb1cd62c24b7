import type { CanonicalRecord } from '@rollcall/types';

export function voterRecord(voterId: string, overrides: Partial<CanonicalRecord> = {}): CanonicalRecord {
  return {
    voter_id: voterId,
    first_name: 'Ana',
    middle_name: '',
    last_name: 'Diaz',
    name_suffix: '',
    street_number: '12',
    street_name: 'N Main ST',
    unit: '',
    city: 'Olympia',
    state: 'WA',
    zip: '98501',
    birth_date: '',
    registration_date: '',
    party: '',
    county: 'Thurston',
    precinct: '',
    state_code: 'WA',
    source_row_ref: `wa.csv:${voterId}`,
    ...overrides
  };
}
