/**
 * Error types for loading and merging tables.
 *
 * Every failure the tool reports is a MergeToolError carrying a stable code,
 * a process exit code and a severity. Warnings stop processing just like
 * errors but are logged at warn level.
 */

import type { Logger } from './logger';

// --- Exit Codes ---

export const ExitCode = {
  SUCCESS: 0,
  ERROR: 1,
  MISUSE: 2,
  LOAD_FAILED: 3,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

// --- Error Codes ---

export const ErrorCode = {
  UNKNOWN: 'unknown_error',
  FILE_LOAD: 'file_load_error',
  KEY_COLUMN_MISSING: 'key_column_missing',
  KEY_COUNT_MISMATCH: 'key_count_mismatch',
  INVALID_OPTION: 'invalid_option',
  MERGE_FAILED: 'merge_failed',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export type Severity = 'error' | 'warning';

interface MergeToolErrorOptions {
  code: ErrorCodeValue;
  exitCode: ExitCodeValue;
  severity?: Severity;
  cause?: unknown;
}

export class MergeToolError extends Error {
  readonly code: ErrorCodeValue;
  readonly exitCode: ExitCodeValue;
  readonly severity: Severity;

  constructor(message: string, options: MergeToolErrorOptions) {
    super(message, { cause: options.cause });
    this.name = 'MergeToolError';
    this.code = options.code;
    this.exitCode = options.exitCode;
    this.severity = options.severity ?? 'error';
  }
}

/** Unreadable or corrupt file, or a sheet the workbook does not have. */
export class FileLoadError extends MergeToolError {
  readonly fileName: string;

  constructor(fileName: string, message: string, cause?: unknown) {
    super(message, { code: ErrorCode.FILE_LOAD, exitCode: ExitCode.LOAD_FAILED, cause });
    this.name = 'FileLoadError';
    this.fileName = fileName;
  }
}

export class KeyColumnError extends MergeToolError {
  readonly columns: string[];

  constructor(message: string, columns: string[] = []) {
    super(message, { code: ErrorCode.KEY_COLUMN_MISSING, exitCode: ExitCode.ERROR });
    this.name = 'KeyColumnError';
    this.columns = columns;
  }

  static missing(columns: string[], datasetName: string): KeyColumnError {
    const list = columns.map(c => `'${c}'`).join(', ');
    return new KeyColumnError(`Key column(s) not found in ${datasetName}: ${list}`, columns);
  }
}

export class KeyCountMismatchError extends MergeToolError {
  readonly leftCount: number;
  readonly rightCount: number;

  constructor(leftCount: number, rightCount: number) {
    super('Select the same number of key columns in both tables.', {
      code: ErrorCode.KEY_COUNT_MISMATCH,
      exitCode: ExitCode.MISUSE,
      severity: 'warning',
    });
    this.name = 'KeyCountMismatchError';
    this.leftCount = leftCount;
    this.rightCount = rightCount;
  }
}

export class ValidationError extends MergeToolError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid options: ${issues.join('; ')}`, {
      code: ErrorCode.INVALID_OPTION,
      exitCode: ExitCode.MISUSE,
    });
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class MergeError extends MergeToolError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: ErrorCode.MERGE_FAILED, exitCode: ExitCode.ERROR, cause });
    this.name = 'MergeError';
  }
}

// --- Utilities ---

export const isMergeToolError = (error: unknown): error is MergeToolError =>
  error instanceof MergeToolError;

export const toUserMessage = (error: unknown): string => {
  if (error instanceof FileLoadError) return `Failed to load files: ${error.message}`;
  if (error instanceof Error) return error.message;
  return String(error);
};

/**
 * Log an error the way the CLI reports it and return the exit code to use.
 */
export const handleError = (error: unknown, logger: Logger): ExitCodeValue => {
  const message = toUserMessage(error);
  if (isMergeToolError(error)) {
    if (error.severity === 'warning') {
      logger.warn(message);
    } else {
      logger.error(message);
    }
    return error.exitCode;
  }
  logger.error(message);
  if (error instanceof Error && error.stack) {
    logger.debug(error.stack);
  }
  return ExitCode.ERROR;
};
