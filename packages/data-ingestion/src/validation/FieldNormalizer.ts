import type { CanonicalField, FieldKind } from '@rollcall/types';
import { AliasCatalog, aliasCatalog, STATE_ABBREVIATIONS, STATE_NAMES } from '../catalog/AliasCatalog';
import abbreviationData from './street-abbreviations.json';

/**
 * Field normalization for canonical voter records.
 * Every rule maps its own output to itself, so normalizing twice is a no-op.
 */

// Present-but-blank marker, distinct from a missing (unmapped) value
export const EMPTY_VALUE = '';

export type NormalizeResult =
  | { isValid: true; normalized: string; original: string }
  | { isValid: false; normalized: null; original: string; error: string };

export interface AddressLineParts {
  street_number: string;
  street_name: string;
  unit: string;
}

function withIdentities(table: Record<string, string>): Map<string, string> {
  const map = new Map(Object.entries(table));
  for (const abbreviation of Object.values(table)) {
    map.set(abbreviation, abbreviation);
  }
  return map;
}

const DIRECTIONALS = withIdentities(abbreviationData.directionals);
const STREET_TYPES = withIdentities(abbreviationData.street_types);
const UNIT_DESIGNATORS: ReadonlySet<string> = new Set(abbreviationData.unit_designators);

const DATE_PATTERNS: Array<{ regex: RegExp; order: 'ymd' | 'mdy' }> = [
  { regex: /^(\d{4})-(\d{1,2})-(\d{1,2})$/, order: 'ymd' },
  { regex: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: 'mdy' },
  { regex: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, order: 'mdy' },
  { regex: /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/, order: 'ymd' }
];

export function collapseWhitespace(value: string): string {
  return value.trim().replace(/\s+/g, ' ');
}

function lookupKey(token: string): string {
  return token.toUpperCase().replace(/[.,]+$/, '');
}

function isUnitDesignator(token: string): boolean {
  return token.startsWith('#') || UNIT_DESIGNATORS.has(lookupKey(token));
}

function startsWithDigit(token: string): boolean {
  return /^\d/.test(token);
}

function valid(normalized: string, original: string): NormalizeResult {
  return { isValid: true, normalized, original };
}

function invalid(error: string, original: string): NormalizeResult {
  return { isValid: false, normalized: null, original, error };
}

export class FieldNormalizer {
  private readonly catalog: AliasCatalog;

  constructor(catalog: AliasCatalog = aliasCatalog) {
    this.catalog = catalog;
  }

  /**
   * Normalize a raw value according to the canonical field's kind
   */
  normalize(field: CanonicalField, rawValue: string): NormalizeResult {
    return this.normalizeKind(this.catalog.kindOf(field), rawValue);
  }

  normalizeKind(kind: FieldKind, rawValue: string): NormalizeResult {
    const value = collapseWhitespace(rawValue);
    if (value === '') {
      return valid(EMPTY_VALUE, rawValue);
    }

    switch (kind) {
      case 'name':
      case 'city':
        return valid(this.titleCase(value), rawValue);
      case 'street':
        return valid(this.normalizeStreet(value), rawValue);
      case 'state':
        return this.normalizeState(value, rawValue);
      case 'zip':
        return this.normalizeZip(value, rawValue);
      case 'date':
        return this.normalizeDate(value, rawValue);
      case 'identifier':
      case 'unit':
      case 'text':
        return valid(value, rawValue);
    }
  }

  /**
   * Title-case each segment between spaces, hyphens, apostrophes and periods
   */
  titleCase(value: string): string {
    return value.replace(/[^\s\-'’.]+/g, segment =>
      segment.charAt(0).toUpperCase() + segment.slice(1).toLowerCase()
    );
  }

  /**
   * Abbreviate the street type and directionals of a street line.
   * House numbers and anything from a unit designator onwards stay as written.
   */
  normalizeStreet(value: string): string {
    const tokens = value.split(' ');
    const unitStart = this.findUnitStart(tokens);
    const street = tokens.slice(0, unitStart);
    const rest = tokens.slice(unitStart);

    let start = 0;
    while (start < street.length && startsWithDigit(street[start])) {
      start++;
    }
    const end = street.length - 1;
    let typeIndex = end;

    if (end - start >= 1) {
      street[start] = this.abbreviate(street[start], DIRECTIONALS);
      if (DIRECTIONALS.has(lookupKey(street[end]))) {
        street[end] = this.abbreviate(street[end], DIRECTIONALS);
        typeIndex = end - 1;
      }
    }

    if (typeIndex > 0 && typeIndex >= start) {
      street[typeIndex] = this.abbreviate(street[typeIndex], STREET_TYPES);
    }

    return [...street, ...rest].join(' ');
  }

  /**
   * Split a normalized combined street line into number, name and unit
   */
  splitAddressLine(line: string): AddressLineParts {
    const tokens = collapseWhitespace(line).split(' ').filter(token => token !== '');
    const unitStart = this.findUnitStart(tokens);
    const street = tokens.slice(0, unitStart);

    let numberEnd = 0;
    if (street.length > 1 && startsWithDigit(street[0])) {
      numberEnd = 1;
      if (street.length > 2 && /^\d+\/\d+$/.test(street[1])) {
        numberEnd = 2;
      }
    }

    return {
      street_number: street.slice(0, numberEnd).join(' '),
      street_name: street.slice(numberEnd).join(' '),
      unit: tokens.slice(unitStart).join(' ')
    };
  }

  private normalizeState(value: string, original: string): NormalizeResult {
    const upper = value.toUpperCase().replace(/\./g, '');
    if (STATE_ABBREVIATIONS.has(upper)) {
      return valid(upper, original);
    }
    const abbreviation = STATE_NAMES.get(upper);
    if (abbreviation) {
      return valid(abbreviation, original);
    }
    return invalid(`Unrecognized state "${value}"`, original);
  }

  private normalizeZip(value: string, original: string): NormalizeResult {
    const digits = value.replace(/\D/g, '');
    if (digits.length === 5) {
      return valid(digits, original);
    }
    if (digits.length === 9) {
      return valid(`${digits.slice(0, 5)}-${digits.slice(5)}`, original);
    }
    return invalid(`ZIP code must have 5 or 9 digits, got ${digits.length}`, original);
  }

  private normalizeDate(value: string, original: string): NormalizeResult {
    if (/^\d{4}$/.test(value)) {
      return valid(value, original);
    }

    // Drop a trailing time of day, as spreadsheet exports often carry one
    const datePart = value.replace(/[ T]\d{1,2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/i, '');

    for (const { regex, order } of DATE_PATTERNS) {
      const match = datePart.match(regex);
      if (!match) continue;

      const [, a, b, c] = match;
      const [year, month, day] = order === 'ymd'
        ? [Number(a), Number(b), Number(c)]
        : [Number(c), Number(a), Number(b)];
      const date = new Date(Date.UTC(year, month - 1, day));

      if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
        return invalid(`Invalid calendar date "${value}"`, original);
      }
      return valid(date.toISOString().slice(0, 10), original);
    }

    return invalid(`Unrecognized date format "${value}"`, original);
  }

  private findUnitStart(tokens: string[]): number {
    for (let i = 1; i < tokens.length; i++) {
      if (isUnitDesignator(tokens[i])) {
        return i;
      }
    }
    return tokens.length;
  }

  private abbreviate(token: string, table: Map<string, string>): string {
    return table.get(lookupKey(token)) ?? token;
  }
}

export const fieldNormalizer = new FieldNormalizer();

export default FieldNormalizer;
