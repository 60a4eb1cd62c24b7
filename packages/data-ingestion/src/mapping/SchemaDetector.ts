/**
 * Schema Detector
 * Infers which source column carries each canonical voter field, from header
 * names first and from sampled values when the header says nothing.
 */

import { CANONICAL_FIELDS, DetectionMethod } from '@rollcall/types';
import type { CanonicalField, FieldMapping, RawRow } from '@rollcall/types';
import { AliasCatalog, aliasCatalog, normalizeHeader } from '../catalog/AliasCatalog';
import type {
  DetectionCandidate,
  DetectionConflict,
  DetectionOptions,
  DetectionResult
} from '../types';
import defaultLogger, { Logger } from '../utils/logger';

export const DEFAULT_SAMPLE_SIZE = 100;
export const MIN_CONFIDENCE = 0.5;

export const CONFIDENCE = {
  EXACT: 1.0,
  ALIAS: 0.8,
  CONTAINED_ALIAS: 0.6,
  PATTERN: 0.7
} as const;

// Split components that together replace a combined street line
export const SPLIT_ADDRESS_FIELDS: readonly CanonicalField[] = [
  'street_number',
  'street_fraction',
  'street_pre_direction',
  'street_name',
  'street_type',
  'street_post_direction'
];

function roundConfidence(value: number): number {
  return Math.round(value * 10000) / 10000;
}

export class SchemaDetector {
  private readonly catalog: AliasCatalog;
  private readonly sampleSize: number;
  private readonly minConfidence: number;
  private readonly logger: Logger;

  constructor(options: DetectionOptions & { catalog?: AliasCatalog } = {}) {
    this.catalog = options.catalog ?? aliasCatalog;
    this.sampleSize = options.sampleSize ?? DEFAULT_SAMPLE_SIZE;
    this.minConfidence = options.minConfidence ?? MIN_CONFIDENCE;
    this.logger = options.logger ?? defaultLogger.child('schema-detector');
  }

  detect(headers: string[], sampleRows: RawRow[]): DetectionResult {
    const samples = sampleRows.slice(0, this.sampleSize);
    const conflicts: DetectionConflict[] = [];
    const byField = new Map<CanonicalField, DetectionCandidate>();

    headers.forEach((header, index) => {
      const candidate = this.classifyColumn(header, index, samples);
      if (!candidate || candidate.confidence < this.minConfidence) return;

      const current = byField.get(candidate.canonical_field);
      if (!current) {
        byField.set(candidate.canonical_field, candidate);
        return;
      }

      // Earlier header keeps the field on a tie
      const [kept, discarded] = candidate.confidence > current.confidence
        ? [candidate, current]
        : [current, candidate];
      byField.set(kept.canonical_field, kept);
      this.recordConflict(conflicts, discarded, kept.source_column, 'lower_confidence');
    });

    this.resolveAddressPrecedence(byField, conflicts);

    const accepted = Array.from(byField.values()).sort((a, b) => a.header_index - b.header_index);
    const mappings: FieldMapping[] = accepted.map(candidate => ({
      source_column: candidate.source_column,
      canonical_field: candidate.canonical_field,
      confidence: candidate.confidence,
      method: candidate.method
    }));

    const mappedFields = new Set(mappings.map(mapping => mapping.canonical_field));
    const mappedColumns = new Set(accepted.map(candidate => candidate.header_index));
    const unmappedRequired = this.catalog.missingRequired(mappedFields);

    if (unmappedRequired.length > 0) {
      this.logger.warn('Required fields have no mapping', { fields: unmappedRequired });
    }

    return {
      mappings,
      unmappedRequired,
      unmappedFields: CANONICAL_FIELDS.filter(field => !mappedFields.has(field)),
      unmappedColumns: headers.filter((_, index) => !mappedColumns.has(index)),
      conflicts
    };
  }

  /**
   * Best candidate for one column: exact name, whole alias, contained alias,
   * then value patterns over the sample rows
   */
  classifyColumn(header: string, index: number, samples: RawRow[]): DetectionCandidate | undefined {
    const normalized = normalizeHeader(header);
    if (normalized === '') return undefined;

    const candidate = (field: CanonicalField, confidence: number, method: DetectionMethod): DetectionCandidate => ({
      source_column: header,
      canonical_field: field,
      confidence,
      method,
      header_index: index
    });

    const exact = this.catalog.matchExact(normalized);
    if (exact) {
      return candidate(exact, CONFIDENCE.EXACT, DetectionMethod.EXACT);
    }

    const alias = this.catalog.matchAlias(normalized);
    if (alias) {
      return candidate(alias, CONFIDENCE.ALIAS, DetectionMethod.ALIAS);
    }

    const contained = this.catalog.matchContained(normalized);
    if (contained) {
      return candidate(contained.field, CONFIDENCE.CONTAINED_ALIAS, DetectionMethod.ALIAS);
    }

    return this.inferFromValues(header, index, samples);
  }

  private inferFromValues(header: string, index: number, samples: RawRow[]): DetectionCandidate | undefined {
    if (samples.length === 0) return undefined;

    const values = samples.map(row => (row[header] ?? '').trim());
    let best: DetectionCandidate | undefined;

    for (const entry of this.catalog.fields) {
      const signature = entry.signature;
      if (!signature) continue;

      const matches = values.filter(value =>
        signature.regex.test(value) && (!signature.lookup || signature.lookup.has(value))
      ).length;
      if (matches === 0) continue;

      const confidence = roundConfidence(CONFIDENCE.PATTERN * (matches / samples.length));
      if (!best || confidence > best.confidence) {
        best = {
          source_column: header,
          canonical_field: entry.field,
          confidence,
          method: DetectionMethod.PATTERN,
          header_index: index
        };
      }
    }

    return best;
  }

  /**
   * A combined street line and complete split components describe the same
   * address; keep one representation
   */
  private resolveAddressPrecedence(
    byField: Map<CanonicalField, DetectionCandidate>,
    conflicts: DetectionConflict[]
  ): void {
    const combined = byField.get('address_line');
    if (!combined) return;

    const number = byField.get('street_number');
    const name = byField.get('street_name');

    if (number && name && (number.confidence + name.confidence) / 2 >= combined.confidence) {
      byField.delete('address_line');
      this.recordConflict(conflicts, combined, null, 'address_precedence');
      return;
    }

    for (const field of SPLIT_ADDRESS_FIELDS) {
      const component = byField.get(field);
      if (!component) continue;
      byField.delete(field);
      this.recordConflict(conflicts, component, combined.source_column, 'address_precedence');
    }
  }

  private recordConflict(
    conflicts: DetectionConflict[],
    discarded: DetectionCandidate,
    keptColumn: string | null,
    reason: DetectionConflict['reason']
  ): void {
    conflicts.push({
      canonical_field: discarded.canonical_field,
      kept_column: keptColumn,
      discarded_column: discarded.source_column,
      discarded_confidence: discarded.confidence,
      reason
    });

    this.logger.warn('Discarded column mapping', {
      field: discarded.canonical_field,
      discardedColumn: discarded.source_column,
      keptColumn,
      reason
    });
  }
}

export default SchemaDetector;
