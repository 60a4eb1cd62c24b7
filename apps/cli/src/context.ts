import { createLogger, getErrorMessage, parseLogLevel } from '@rollcall/data-ingestion';
import type { Logger } from '@rollcall/data-ingestion';
import { ExitCode, exitCodeFor } from './exitCodes';

// Where a command writes its report; swapped out in tests
export interface CommandIO {
  out: (line: string) => void;
  err: (line: string) => void;
  env: NodeJS.ProcessEnv;
}

export const processIO: CommandIO = {
  out: line => console.log(line),
  err: line => console.error(line),
  env: process.env
};

export function commandLogger(verbose: boolean, env: NodeJS.ProcessEnv): Logger {
  return createLogger({
    level: verbose ? 'debug' : parseLogLevel(env.LOG_LEVEL, 'warn'),
    service: 'voter-ingest'
  });
}

/**
 * Run a command body, report a thrown error and map it to an exit code
 */
export async function runCommand(io: CommandIO, body: () => Promise<ExitCode>): Promise<ExitCode> {
  try {
    return await body();
  } catch (error) {
    io.err(`Error: ${getErrorMessage(error)}`);
    return exitCodeFor(error);
  }
}

export { ExitCode };
