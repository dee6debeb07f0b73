/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import {
  InvalidParameterError,
  InvalidTodoIdError,
  TodoNotFoundError,
} from "@todoquery/sdk";

export const EXIT_CODE = {
  OK: 0,
  FAILURE: 1,
  NOT_FOUND: 2,
  INVALID_ARGS: 3,
} as const;

export type ExitCode = (typeof EXIT_CODE)[keyof typeof EXIT_CODE];

// Longest error message printed before truncation
const MAX_MESSAGE_LENGTH = 2000;

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: ExitCode;

  constructor(message: string, options?: { exitCode?: ExitCode; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? EXIT_CODE.FAILURE;
  }
}

/**
 * Map SDK and commander errors to CLI exit codes
 * - 0: success (help and version output)
 * - 1: store or unknown error
 * - 2: todo not found
 * - 3: invalid arguments
 */
export function mapSdkErrorToExitCode(error: unknown): ExitCode {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof TodoNotFoundError) {
    return EXIT_CODE.NOT_FOUND;
  }

  if (error instanceof InvalidTodoIdError || error instanceof InvalidParameterError) {
    return EXIT_CODE.INVALID_ARGS;
  }

  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? EXIT_CODE.OK : EXIT_CODE.INVALID_ARGS;
  }

  return EXIT_CODE.FAILURE;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    if (message.length > MAX_MESSAGE_LENGTH) {
      message = message.substring(0, MAX_MESSAGE_LENGTH) + "... (truncated)";
    }

    if (verbose && error.cause !== undefined) {
      const cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
      message += `\n  Cause: ${cause}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
