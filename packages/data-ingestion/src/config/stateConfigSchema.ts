import { z } from 'zod';
import { CANONICAL_FIELDS } from '@rollcall/types';
import type { StateConfig } from '@rollcall/types';

export const FieldMappingSchema = z.object({
  source_column: z.string(),
  canonical_field: z.enum(CANONICAL_FIELDS),
  confidence: z.number().min(0).max(1),
  method: z.enum(['exact', 'alias', 'pattern', 'manual'])
});

export const StateConfigSchema = z.object({
  state_code: z.string().regex(/^[A-Za-z]{2}$/, 'state_code must be a two-letter code'),
  version: z.number().int().positive(),
  field_mappings: z.array(FieldMappingSchema),
  source_columns: z.array(z.string()).default([]),
  pending_confirmation: z.array(z.enum(CANONICAL_FIELDS)).default([]),
  created_at: z.string().datetime(),
  updated_at: z.string().datetime()
}).superRefine((config, ctx) => {
  const fields = new Set<string>();
  const columns = new Set<string>();
  config.field_mappings.forEach((mapping, index) => {
    if (fields.has(mapping.canonical_field)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['field_mappings', index, 'canonical_field'],
        message: `${mapping.canonical_field} is mapped more than once`
      });
    }
    if (columns.has(mapping.source_column)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['field_mappings', index, 'source_column'],
        message: `column "${mapping.source_column}" is mapped more than once`
      });
    }
    fields.add(mapping.canonical_field);
    columns.add(mapping.source_column);
  });
});

/**
 * Validate untrusted JSON as a StateConfig, returning readable issue strings on failure
 */
export function parseStateConfig(data: unknown): { success: true; config: StateConfig } | { success: false; issues: string[] } {
  const result = StateConfigSchema.safeParse(data);
  if (result.success) {
    return { success: true, config: { ...result.data, state_code: result.data.state_code.toUpperCase() } };
  }
  return {
    success: false,
    issues: result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
  };
}
