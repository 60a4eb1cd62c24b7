import { isVoterIngestError } from '@rollcall/data-ingestion';

export const ExitCode = {
  SUCCESS: 0,
  FAILURE: 1,
  CONFIG_ERROR: 2,
  SINK_ERROR: 3
} as const;

export type ExitCode = typeof ExitCode[keyof typeof ExitCode];

export function exitCodeFor(error: unknown): ExitCode {
  if (!isVoterIngestError(error)) {
    return ExitCode.FAILURE;
  }

  switch (error.code) {
    case 'CONFIG_MISSING':
    case 'CONFIG_INCOMPLETE':
    case 'CONFIG_INVALID':
      return ExitCode.CONFIG_ERROR;
    case 'SINK':
      return ExitCode.SINK_ERROR;
    default:
      return ExitCode.FAILURE;
  }
}
