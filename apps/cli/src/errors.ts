import { CommanderError } from 'commander';
import { ClientError } from '@gabi/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_SERVICE = 2;
export const EXIT_CODE_IO = 3;

export type CliErrorCode =
  | 'INVALID_ARGS'
  | 'MISSING_CONFIGURATION'
  | 'SERVICE_FAILED'
  | 'IO_FAILED'
  | 'INTERNAL_ERROR';

/** Help and version requests end parsing early but are not failures. */
export function isCommanderExit(error: CommanderError): boolean {
  return error.code === 'commander.helpDisplayed' || error.code === 'commander.version';
}

export function errorCode(error: unknown): CliErrorCode {
  if (error instanceof CommanderError) return 'INVALID_ARGS';
  if (error instanceof ClientError) {
    switch (error.kind) {
      case 'configuration':
        return 'MISSING_CONFIGURATION';
      case 'service':
        return 'SERVICE_FAILED';
      case 'io':
        return 'IO_FAILED';
    }
  }
  return 'INTERNAL_ERROR';
}

export function toExitCode(error: unknown): number {
  if (error instanceof CommanderError) {
    return isCommanderExit(error) ? EXIT_CODE_SUCCESS : EXIT_CODE_USAGE;
  }
  if (error instanceof ClientError) {
    if (error.kind === 'configuration') return EXIT_CODE_USAGE;
    if (error.kind === 'io') return EXIT_CODE_IO;
    return EXIT_CODE_SERVICE;
  }
  return EXIT_CODE_SERVICE;
}
