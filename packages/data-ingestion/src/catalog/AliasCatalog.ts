/**
 * Alias Catalog
 * Static table of canonical voter fields, their header synonyms and value signatures
 */

import { z } from 'zod';
import { CANONICAL_FIELDS } from '@rollcall/types';
import type { CanonicalField, FieldKind } from '@rollcall/types';
import aliasData from './aliases.json';
import stateData from './states.json';

const CanonicalFieldSchema = z.enum(CANONICAL_FIELDS);

const FieldKindSchema = z.enum(['identifier', 'name', 'street', 'unit', 'city', 'state', 'zip', 'date', 'text']);

const CatalogSchema = z.object({
  fields: z.array(z.object({
    field: CanonicalFieldSchema,
    kind: FieldKindSchema,
    aliases: z.array(z.string().min(1)),
    pattern: z.object({
      regex: z.string(),
      lookup: z.literal('state_abbreviations').optional()
    }).optional()
  })),
  required: z.array(z.object({
    name: z.string(),
    any_of: z.array(z.array(CanonicalFieldSchema).min(1)).min(1)
  })),
  compositions: z.record(z.string(), z.array(CanonicalFieldSchema)),
  substring_excluded_tokens: z.array(z.string())
});

type CatalogData = z.infer<typeof CatalogSchema>;

export interface ValueSignature {
  regex: RegExp;
  lookup?: ReadonlySet<string>;
}

export interface CatalogEntry {
  field: CanonicalField;
  kind: FieldKind;
  normalizedName: string;
  aliases: string[]; // normalized
  signature?: ValueSignature;
}

// A required field group is satisfied when every field of any one alternative is mapped
export interface RequiredFieldGroup {
  name: string;
  anyOf: CanonicalField[][];
}

export interface AliasMatch {
  field: CanonicalField;
  alias: string;
}

/**
 * Lowercase, strip punctuation and whitespace, collapse separators
 */
export function normalizeHeader(header: string): string {
  return header
    .replace(/^\uFEFF/, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '');
}

export const STATE_ABBREVIATIONS: ReadonlySet<string> = new Set(Object.keys(stateData));

export const STATE_NAMES: ReadonlyMap<string, string> = new Map(
  Object.entries(stateData).map(([abbr, name]) => [name, abbr])
);

export class AliasCatalog {
  private readonly entries: CatalogEntry[];
  private readonly byField: Map<CanonicalField, CatalogEntry>;
  private readonly exactIndex: Map<string, CanonicalField>;
  private readonly aliasIndex: Map<string, CanonicalField>;
  private readonly requiredGroups: RequiredFieldGroup[];
  private readonly compositions: Map<CanonicalField, CanonicalField[]>;
  private readonly excludedTokens: string[];

  constructor(data: unknown = aliasData) {
    const parsed: CatalogData = CatalogSchema.parse(data);

    this.entries = parsed.fields.map(entry => ({
      field: entry.field,
      kind: entry.kind,
      normalizedName: normalizeHeader(entry.field),
      aliases: Array.from(new Set(entry.aliases.map(normalizeHeader))),
      signature: entry.pattern
        ? {
            regex: new RegExp(entry.pattern.regex),
            lookup: entry.pattern.lookup === 'state_abbreviations' ? STATE_ABBREVIATIONS : undefined
          }
        : undefined
    }));

    this.byField = new Map(this.entries.map(entry => [entry.field, entry]));
    this.exactIndex = new Map();
    this.aliasIndex = new Map();

    for (const entry of this.entries) {
      this.claim(this.exactIndex, entry.normalizedName, entry.field);
    }
    for (const entry of this.entries) {
      for (const alias of entry.aliases) {
        if (alias === entry.normalizedName) continue;
        const owner = this.exactIndex.get(alias);
        if (owner && owner !== entry.field) {
          throw new Error(`Alias "${alias}" of ${entry.field} collides with canonical field ${owner}`);
        }
        this.claim(this.aliasIndex, alias, entry.field);
      }
    }

    this.requiredGroups = parsed.required.map(group => ({ name: group.name, anyOf: group.any_of }));
    this.compositions = new Map();
    for (const [target, parts] of Object.entries(parsed.compositions)) {
      this.compositions.set(CanonicalFieldSchema.parse(target), parts);
    }
    this.excludedTokens = parsed.substring_excluded_tokens.map(normalizeHeader);
  }

  get fields(): readonly CatalogEntry[] {
    return this.entries;
  }

  getEntry(field: CanonicalField): CatalogEntry {
    const entry = this.byField.get(field);
    if (!entry) {
      throw new Error(`Field ${field} is not in the alias catalog`);
    }
    return entry;
  }

  kindOf(field: CanonicalField): FieldKind {
    return this.getEntry(field).kind;
  }

  /**
   * Canonical field whose own name equals the normalized header
   */
  matchExact(normalizedHeader: string): CanonicalField | undefined {
    return this.exactIndex.get(normalizedHeader);
  }

  matchAlias(normalizedHeader: string): CanonicalField | undefined {
    return this.aliasIndex.get(normalizedHeader);
  }

  /**
   * Longest canonical name or alias (4+ chars) contained in the header.
   * Ties go to the field listed first in the catalog.
   */
  matchContained(normalizedHeader: string): AliasMatch | undefined {
    if (this.excludedTokens.some(token => normalizedHeader.includes(token))) {
      return undefined;
    }

    let best: AliasMatch | undefined;
    for (const entry of this.entries) {
      for (const candidate of [entry.normalizedName, ...entry.aliases]) {
        if (candidate.length < 4 || !normalizedHeader.includes(candidate)) continue;
        if (!best || candidate.length > best.alias.length) {
          best = { field: entry.field, alias: candidate };
        }
      }
    }
    return best;
  }

  get required(): readonly RequiredFieldGroup[] {
    return this.requiredGroups;
  }

  /**
   * Component fields folded into a record field, in output order
   */
  partsOf(field: CanonicalField): CanonicalField[] {
    return this.compositions.get(field) ?? [field];
  }

  /**
   * Required groups not satisfied by the given set of mapped fields,
   * reported as the union of the fields of every alternative
   */
  missingRequired(mapped: ReadonlySet<CanonicalField>): CanonicalField[] {
    const missing: CanonicalField[] = [];
    for (const group of this.requiredGroups) {
      const satisfied = group.anyOf.some(alternative => alternative.every(field => mapped.has(field)));
      if (satisfied) continue;
      for (const alternative of group.anyOf) {
        for (const field of alternative) {
          if (!mapped.has(field) && !missing.includes(field)) {
            missing.push(field);
          }
        }
      }
    }
    return missing;
  }

  private claim(index: Map<string, CanonicalField>, key: string, field: CanonicalField): void {
    const owner = index.get(key);
    if (owner && owner !== field) {
      throw new Error(`Header "${key}" is claimed by both ${owner} and ${field}`);
    }
    index.set(key, field);
  }
}

export const aliasCatalog = new AliasCatalog();
