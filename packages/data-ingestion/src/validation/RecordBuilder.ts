import type { CanonicalField, CanonicalRecord, RawRow, StateConfig } from '@rollcall/types';
import { AliasCatalog, aliasCatalog } from '../catalog/AliasCatalog';
import { NormalizationError, ValidationError } from '../errors';
import { FieldNormalizer, collapseWhitespace } from './FieldNormalizer';
import type { AddressLineParts } from './FieldNormalizer';

export interface RecordBuilderOptions {
  catalog?: AliasCatalog;
  normalizer?: FieldNormalizer;
  sourceRef?: string;
}

/**
 * Applies a StateConfig to one raw row: mapping, required-field checks and
 * normalization. Throws a row-level error for rows that cannot be used.
 */
export class RecordBuilder {
  private readonly stateCode: string;
  private readonly columns: Map<CanonicalField, string>;
  private readonly useSplitAddress: boolean;
  private readonly catalog: AliasCatalog;
  private readonly normalizer: FieldNormalizer;
  private readonly sourceRef: string;

  constructor(config: StateConfig, options: RecordBuilderOptions = {}) {
    this.stateCode = config.state_code.toUpperCase();
    this.columns = new Map(config.field_mappings.map(mapping => [mapping.canonical_field, mapping.source_column]));
    this.catalog = options.catalog ?? aliasCatalog;
    this.normalizer = options.normalizer ?? new FieldNormalizer(this.catalog);
    this.sourceRef = options.sourceRef ?? 'row';
    this.useSplitAddress = this.columns.has('street_number') && this.columns.has('street_name');
  }

  build(row: RawRow, rowNumber: number): CanonicalRecord {
    this.validateRequired(row, rowNumber);

    const value = (field: CanonicalField): string =>
      this.normalizeField(field, this.rawValue(row, field), rowNumber);

    const voterId = value('voter_id');
    const address = this.buildAddress(row, rowNumber);
    const record: CanonicalRecord = {
      voter_id: voterId,
      first_name: value('first_name'),
      middle_name: value('middle_name'),
      last_name: value('last_name'),
      name_suffix: value('name_suffix'),
      street_number: address.street_number,
      street_name: address.street_name,
      unit: address.unit,
      city: value('city'),
      state: value('state') || this.stateCode,
      zip: value('zip'),
      birth_date: value('birth_date'),
      registration_date: value('registration_date'),
      party: value('party'),
      county: value('county'),
      precinct: value('precinct'),
      state_code: this.stateCode,
      source_row_ref: `${this.sourceRef}:${rowNumber}`
    };

    return record;
  }

  private buildAddress(row: RawRow, rowNumber: number): AddressLineParts {
    const unit = this.normalizeField('unit', this.composeRaw(row, 'unit'), rowNumber);

    if (this.useSplitAddress) {
      return {
        street_number: this.normalizeField('street_number', this.composeRaw(row, 'street_number'), rowNumber),
        street_name: this.normalizeField('street_name', this.composeRaw(row, 'street_name'), rowNumber),
        unit
      };
    }

    const line = this.normalizeField('address_line', this.rawValue(row, 'address_line'), rowNumber);
    const parts = this.normalizer.splitAddressLine(line);
    // A dedicated unit column wins over the unit found in the line
    return { ...parts, unit: unit || parts.unit };
  }

  private validateRequired(row: RawRow, rowNumber: number): void {
    const voterId = this.rawValue(row, 'voter_id');
    if (collapseWhitespace(voterId) === '') {
      throw new ValidationError('Missing voter_id', rowNumber, 'voter_id', voterId);
    }

    const addressFields: CanonicalField[] = this.useSplitAddress
      ? ['street_number', 'street_name']
      : ['address_line'];
    for (const field of addressFields) {
      const value = this.rawValue(row, field);
      if (collapseWhitespace(value) === '') {
        throw new ValidationError(`Missing ${field}`, rowNumber, field, value);
      }
    }
  }

  private normalizeField(field: CanonicalField, raw: string, rowNumber: number): string {
    const result = this.normalizer.normalize(field, raw);
    if (!result.isValid) {
      throw new NormalizationError(`Invalid ${field}: ${result.error}`, rowNumber, field, raw);
    }
    return result.normalized;
  }

  private composeRaw(row: RawRow, field: CanonicalField): string {
    return this.catalog.partsOf(field)
      .map(part => collapseWhitespace(this.rawValue(row, part)))
      .filter(value => value !== '')
      .join(' ');
  }

  private rawValue(row: RawRow, field: CanonicalField): string {
    const column = this.columns.get(field);
    return column === undefined ? '' : row[column] ?? '';
  }
}

export default RecordBuilder;
