// Core voter-record types shared by the ingestion pipeline, storage sinks and CLI

export const CANONICAL_FIELDS = [
  'voter_id',
  'first_name',
  'middle_name',
  'last_name',
  'name_suffix',
  'address_line',
  'street_number',
  'street_fraction',
  'street_pre_direction',
  'street_name',
  'street_type',
  'street_post_direction',
  'unit_type',
  'unit',
  'city',
  'state',
  'zip',
  'birth_date',
  'registration_date',
  'party',
  'county',
  'precinct'
] as const;

export type CanonicalField = typeof CANONICAL_FIELDS[number];

// Normalization rule family of a canonical field
export type FieldKind =
  | 'identifier'
  | 'name'
  | 'street'
  | 'unit'
  | 'city'
  | 'state'
  | 'zip'
  | 'date'
  | 'text';

export const DetectionMethod = {
  EXACT: 'exact' as const,
  ALIAS: 'alias' as const,
  PATTERN: 'pattern' as const,
  MANUAL: 'manual' as const
} as const;

export type DetectionMethod = typeof DetectionMethod[keyof typeof DetectionMethod];

export interface FieldMapping {
  source_column: string;
  canonical_field: CanonicalField;
  confidence: number; // 0-1
  method: DetectionMethod;
}

// Persisted, reusable schema mapping for one state's export format
export interface StateConfig {
  state_code: string;
  version: number;
  field_mappings: FieldMapping[];
  source_columns: string[];
  pending_confirmation: CanonicalField[];
  created_at: string;
  updated_at: string;
}

export type RawRow = Record<string, string>;

export interface CanonicalRecord {
  voter_id: string;
  first_name: string;
  middle_name: string;
  last_name: string;
  name_suffix: string;
  street_number: string;
  street_name: string;
  unit: string;
  city: string;
  state: string;
  zip: string;
  birth_date: string;
  registration_date: string;
  party: string;
  county: string;
  precinct: string;
  state_code: string;
  source_row_ref: string;
}

// Destination unit within which voter_id uniqueness is enforced
export interface ImportScope {
  state_code: string;
  table: string;
}

export type SinkInsertResult =
  | { status: 'inserted' }
  | { status: 'duplicate' }
  | { status: 'error'; error: Error; transient: boolean };

export interface StorageSink {
  exists(scope: ImportScope): Promise<boolean>;
  existingVoterIds(scope: ImportScope): Promise<Set<string>>;
  insert(scope: ImportScope, record: CanonicalRecord): Promise<SinkInsertResult>;
}

export type RowErrorType = 'validation_error' | 'normalization_error' | 'duplicate_voter_id';

export interface RowError {
  row_number: number;
  error_type: RowErrorType;
  field?: CanonicalField;
  value?: string;
  error_message: string;
}

export interface ImportSummary {
  run_id: string;
  state_code: string;
  scope: ImportScope;
  rows_seen: number;
  inserted: number;
  duplicates: number;
  validation_errors: number;
  normalization_errors: number;
  errors: RowError[];
  cancelled: boolean;
  started_at: string;
  finished_at?: string;
}

export interface CrowdedAddress {
  street_number: string;
  street_name: string;
  unit: string;
  city: string;
  zip: string;
  voter_count: number;
  voter_ids: string[];
}
