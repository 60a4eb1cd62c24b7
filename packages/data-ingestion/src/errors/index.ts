import type { CanonicalField, ImportSummary, RowError, RowErrorType } from '@rollcall/types';

export type VoterIngestErrorCode =
  | 'CONFIG_MISSING'
  | 'CONFIG_INCOMPLETE'
  | 'CONFIG_INVALID'
  | 'VALIDATION'
  | 'NORMALIZATION'
  | 'DUPLICATE_VOTER_ID'
  | 'SINK';

export abstract class VoterIngestError extends Error {
  abstract readonly code: VoterIngestErrorCode;
  abstract readonly fatal: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Configuration-level failures: the run aborts before the first row

export class ConfigMissingError extends VoterIngestError {
  readonly code = 'CONFIG_MISSING';
  readonly fatal = true;

  constructor(readonly stateCode: string, detail?: string) {
    super(detail ?? `No configuration found for state ${stateCode}. Run onboarding first.`);
  }
}

export class ConfigIncompleteError extends VoterIngestError {
  readonly code = 'CONFIG_INCOMPLETE';
  readonly fatal = true;

  constructor(readonly stateCode: string, readonly missingFields: string[]) {
    super(`Configuration for ${stateCode} has no mapping for required field(s): ${missingFields.join(', ')}`);
  }
}

export class InvalidConfigError extends VoterIngestError {
  readonly code = 'CONFIG_INVALID';
  readonly fatal = true;

  constructor(readonly source: string, readonly issues: string[], options?: { cause?: unknown }) {
    super(`Invalid configuration in ${source}: ${issues.join('; ')}`, options);
  }
}

// Row-level failures: recorded in the summary, never raised past the pipeline

export abstract class RowLevelError extends VoterIngestError {
  readonly fatal = false;
  abstract readonly errorType: RowErrorType;

  constructor(
    message: string,
    readonly rowNumber: number,
    readonly field?: CanonicalField,
    readonly value?: string
  ) {
    super(message);
  }

  toRowError(): RowError {
    return {
      row_number: this.rowNumber,
      error_type: this.errorType,
      field: this.field,
      value: this.value,
      error_message: this.message
    };
  }
}

export class ValidationError extends RowLevelError {
  readonly code = 'VALIDATION';
  readonly errorType = 'validation_error';
}

export class NormalizationError extends RowLevelError {
  readonly code = 'NORMALIZATION';
  readonly errorType = 'normalization_error';
}

export class DuplicateVoterIdError extends RowLevelError {
  readonly code = 'DUPLICATE_VOTER_ID';
  readonly errorType = 'duplicate_voter_id';

  constructor(rowNumber: number, voterId: string) {
    super(`Voter ID ${voterId} already present in scope`, rowNumber, 'voter_id', voterId);
  }
}

export class SinkError extends VoterIngestError {
  readonly code = 'SINK';
  readonly fatal = true;
  summary?: ImportSummary;

  constructor(message: string, readonly transient: boolean, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function isVoterIngestError(error: unknown): error is VoterIngestError {
  return error instanceof VoterIngestError;
}
