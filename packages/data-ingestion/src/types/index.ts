import type {
  CanonicalField,
  DetectionMethod,
  FieldMapping,
  ImportSummary,
  RawRow
} from '@rollcall/types';
import type { Logger } from '../utils/logger';

// Source file formats the row readers understand
export const FileFormat = {
  CSV: 'csv' as const,
  XLSX: 'xlsx' as const,
  XLS: 'xls' as const,
  UNKNOWN: 'unknown' as const
} as const;

export type FileFormat = typeof FileFormat[keyof typeof FileFormat];

// Schema detection types
export interface DetectionCandidate {
  source_column: string;
  canonical_field: CanonicalField;
  confidence: number;
  method: DetectionMethod;
  header_index: number;
}

export type ConflictReason = 'lower_confidence' | 'address_precedence';

export interface DetectionConflict {
  canonical_field: CanonicalField;
  kept_column: string | null;
  discarded_column: string;
  discarded_confidence: number;
  reason: ConflictReason;
}

export interface DetectionResult {
  mappings: FieldMapping[];
  unmappedRequired: CanonicalField[];
  unmappedFields: CanonicalField[];
  unmappedColumns: string[];
  conflicts: DetectionConflict[];
}

export interface DetectionOptions {
  sampleSize?: number;
  minConfidence?: number;
  logger?: Logger;
}

// Onboarding: source column -> canonical field set by an operator
export type ManualMappings = Record<string, CanonicalField>;

// Import run types
export type ImportProgress = Pick<
  ImportSummary,
  'rows_seen' | 'inserted' | 'duplicates' | 'validation_errors' | 'normalization_errors'
>;

export interface PipelineOptions {
  signal?: AbortSignal;
  sourceRef?: string;
  maxErrorDetails?: number;
  maxSinkRetries?: number;
  progressInterval?: number;
  onProgress?: (progress: ImportProgress) => void;
  runId?: string;
  logger?: Logger;
}

// Row reader types
export interface RawRowReader {
  readHeaders(): Promise<string[]>;
  rows(): AsyncIterable<RawRow>;
}

export interface RowSample {
  headers: string[];
  rows: RawRow[];
}

export interface CsvReaderOptions {
  encoding?: BufferEncoding;
  delimiter?: string;
}

export interface ExcelReaderOptions {
  sheetName?: string;
}
