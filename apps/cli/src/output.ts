import type { CrowdedAddress, ImportSummary, StateConfig } from '@rollcall/types';
import type { DetectionResult } from '@rollcall/data-ingestion';

function pad(value: string, width: number): string {
  return value.length >= width ? value : value + ' '.repeat(width - value.length);
}

export function formatMappings(config: StateConfig): string[] {
  if (config.field_mappings.length === 0) {
    return ['  (no columns mapped)'];
  }

  const width = Math.max(...config.field_mappings.map(mapping => mapping.source_column.length));
  return config.field_mappings.map(mapping =>
    `  ${pad(mapping.source_column, width)} -> ${pad(mapping.canonical_field, 22)} ${mapping.confidence.toFixed(2)} (${mapping.method})`
  );
}

export function formatDetectionWarnings(detection: DetectionResult): string[] {
  return detection.conflicts.map(conflict =>
    conflict.kept_column === null
      ? `  Ignored "${conflict.discarded_column}" for ${conflict.canonical_field}: split address columns take precedence`
      : `  Ignored "${conflict.discarded_column}" for ${conflict.canonical_field}: "${conflict.kept_column}" kept`
  );
}

export function formatSummary(summary: ImportSummary): string[] {
  const lines = [
    `Import ${summary.run_id} into ${summary.scope.table}${summary.cancelled ? ' (cancelled)' : ''}`,
    `  Rows seen:            ${summary.rows_seen}`,
    `  Inserted:             ${summary.inserted}`,
    `  Duplicates:           ${summary.duplicates}`,
    `  Validation errors:    ${summary.validation_errors}`,
    `  Normalization errors: ${summary.normalization_errors}`
  ];

  if (summary.errors.length > 0) {
    lines.push('  Row errors:');
    for (const error of summary.errors) {
      const value = error.value === undefined ? '' : ` [${JSON.stringify(error.value)}]`;
      lines.push(`    row ${error.row_number}: ${error.error_type}: ${error.error_message}${value}`);
    }
  }
  return lines;
}

export function formatCrowdedAddresses(addresses: CrowdedAddress[]): string[] {
  return addresses.map(address => {
    const street = [address.street_number, address.street_name, address.unit].filter(part => part !== '').join(' ');
    return `  ${address.voter_count} voters  ${street}, ${address.city} ${address.zip}`.trimEnd();
  });
}
