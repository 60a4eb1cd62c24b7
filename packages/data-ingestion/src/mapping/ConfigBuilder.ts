/**
 * Config Builder
 * Turns detection output into a persisted StateConfig and merges it with an
 * earlier config for the same state, so operator decisions survive re-onboarding.
 */

import { DetectionMethod } from '@rollcall/types';
import type { CanonicalField, FieldMapping, RawRow, StateConfig } from '@rollcall/types';
import { AliasCatalog, aliasCatalog } from '../catalog/AliasCatalog';
import { InvalidConfigError } from '../errors';
import type { DetectionResult, ManualMappings } from '../types';
import defaultLogger, { Logger } from '../utils/logger';
import { SchemaDetector, SPLIT_ADDRESS_FIELDS } from './SchemaDetector';

export interface ConfigBuilderOptions {
  detector?: SchemaDetector;
  catalog?: AliasCatalog;
  clock?: () => Date;
  logger?: Logger;
}

export interface BuildResult {
  config: StateConfig;
  detection: DetectionResult;
}

function sameMappings(a: FieldMapping[], b: FieldMapping[]): boolean {
  return a.length === b.length && a.every((mapping, index) =>
    mapping.source_column === b[index].source_column &&
    mapping.canonical_field === b[index].canonical_field &&
    mapping.confidence === b[index].confidence &&
    mapping.method === b[index].method
  );
}

function orderByColumns(mappings: FieldMapping[], columns: string[]): FieldMapping[] {
  return [...mappings].sort((a, b) => columns.indexOf(a.source_column) - columns.indexOf(b.source_column));
}

export class ConfigBuilder {
  private readonly detector: SchemaDetector;
  private readonly catalog: AliasCatalog;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(options: ConfigBuilderOptions = {}) {
    this.catalog = options.catalog ?? aliasCatalog;
    this.logger = options.logger ?? defaultLogger.child('config-builder');
    this.detector = options.detector ?? new SchemaDetector({ catalog: this.catalog, logger: this.logger });
    this.clock = options.clock ?? (() => new Date());
  }

  build(stateCode: string, headers: string[], sampleRows: RawRow[], existing?: StateConfig): StateConfig {
    return this.buildWithDetection(stateCode, headers, sampleRows, existing).config;
  }

  /**
   * Same as build, also returning the detection result for reporting
   */
  buildWithDetection(
    stateCode: string,
    headers: string[],
    sampleRows: RawRow[],
    existing?: StateConfig
  ): BuildResult {
    const state = stateCode.toUpperCase();
    const detection = this.detector.detect(headers, sampleRows);
    const now = this.clock().toISOString();

    if (existing && existing.state_code.toUpperCase() !== state) {
      throw new InvalidConfigError(`${state} onboarding`, [
        `existing configuration belongs to state ${existing.state_code}`
      ]);
    }

    if (!existing) {
      this.logger.info('Created state configuration', {
        state,
        mappings: detection.mappings.length,
        unmappedRequired: detection.unmappedRequired
      });

      return {
        detection,
        config: {
          state_code: state,
          version: 1,
          field_mappings: detection.mappings,
          source_columns: [...headers],
          pending_confirmation: [],
          created_at: now,
          updated_at: now
        }
      };
    }

    const headerSet = new Set(headers);
    const retained = existing.field_mappings.filter(mapping => headerSet.has(mapping.source_column));
    const lostFields = existing.field_mappings
      .filter(mapping => !headerSet.has(mapping.source_column))
      .map(mapping => mapping.canonical_field);
    const merged = orderByColumns(this.fillGaps(retained, detection.mappings), headers);

    if (lostFields.length === 0) {
      const changed = !sameMappings(merged, existing.field_mappings);
      if (changed) {
        this.logger.info('Added mappings to state configuration', { state, version: existing.version + 1 });
      }

      return {
        detection,
        config: {
          ...existing,
          state_code: state,
          version: changed ? existing.version + 1 : existing.version,
          field_mappings: merged,
          source_columns: [...headers],
          pending_confirmation: [...existing.pending_confirmation],
          updated_at: now
        }
      };
    }

    const pending = Array.from(new Set([...existing.pending_confirmation, ...lostFields]));
    this.logger.warn('Source headers changed; mappings need confirmation', { state, pending });

    return {
      detection,
      config: {
        ...existing,
        state_code: state,
        version: existing.version + 1,
        field_mappings: merged,
        source_columns: [...headers],
        pending_confirmation: pending,
        updated_at: now
      }
    };
  }

  /**
   * Pin source columns to canonical fields by hand
   */
  applyManualMappings(config: StateConfig, overrides: ManualMappings): StateConfig {
    const unknown = Object.keys(overrides).filter(column => !config.source_columns.includes(column));
    if (unknown.length > 0) {
      throw new InvalidConfigError(
        `${config.state_code} manual mappings`,
        unknown.map(column => `column "${column}" is not in the source headers`)
      );
    }

    const fields = new Set(Object.values(overrides));
    const columns = new Set(Object.keys(overrides));
    const kept = config.field_mappings.filter(mapping =>
      !fields.has(mapping.canonical_field) && !columns.has(mapping.source_column)
    );
    const manual: FieldMapping[] = Object.entries(overrides).map(([column, field]) => ({
      source_column: column,
      canonical_field: field,
      confidence: 1.0,
      method: DetectionMethod.MANUAL
    }));

    const fieldMappings = orderByColumns([...kept, ...manual], config.source_columns);
    const pending = config.pending_confirmation.filter(field => !fields.has(field));
    if (sameMappings(fieldMappings, config.field_mappings) && pending.length === config.pending_confirmation.length) {
      return config;
    }

    return {
      ...config,
      version: config.version + 1,
      field_mappings: fieldMappings,
      pending_confirmation: pending,
      updated_at: this.clock().toISOString()
    };
  }

  missingRequiredFields(mappings: FieldMapping[]): CanonicalField[] {
    return this.catalog.missingRequired(new Set(mappings.map(mapping => mapping.canonical_field)));
  }

  isComplete(config: StateConfig): boolean {
    return this.missingRequiredFields(config.field_mappings).length === 0;
  }

  /**
   * Add detected mappings for fields and columns the kept mappings leave
   * uncovered, without mixing the two address representations
   */
  private fillGaps(kept: FieldMapping[], detected: FieldMapping[]): FieldMapping[] {
    const result = [...kept];
    const fields = new Set(kept.map(mapping => mapping.canonical_field));
    const columns = new Set(kept.map(mapping => mapping.source_column));

    for (const mapping of detected) {
      if (fields.has(mapping.canonical_field) || columns.has(mapping.source_column)) continue;

      const isSplit = SPLIT_ADDRESS_FIELDS.includes(mapping.canonical_field);
      if (isSplit && fields.has('address_line')) continue;
      if (mapping.canonical_field === 'address_line' && SPLIT_ADDRESS_FIELDS.some(field => fields.has(field))) continue;

      result.push(mapping);
      fields.add(mapping.canonical_field);
      columns.add(mapping.source_column);
    }

    return result;
  }
}

export default ConfigBuilder;
