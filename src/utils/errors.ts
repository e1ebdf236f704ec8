/**
 * Error types surfaced by the pipeline.
 *
 * Only source and schema problems are fatal. Row-level defects are absorbed by
 * the cleaning steps and never reach these classes.
 */

export type PipelineErrorCode = 'SOURCE_READ' | 'DATASET_VALIDATION' | 'CONFIG';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.code = code;
  }
}

/**
 * The input source could not be read or has no usable header.
 */
export class SourceReadError extends PipelineError {
  readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super('SOURCE_READ', message, { cause });
    this.name = 'SourceReadError';
    this.path = path;
  }
}

/**
 * One or more required columns are missing from the raw table.
 */
export class DatasetValidationError extends PipelineError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super('DATASET_VALIDATION', `Data validation failed: ${errors.join('; ')}`);
    this.name = 'DatasetValidationError';
    this.errors = errors;
  }
}

export class ConfigError extends PipelineError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], cause?: unknown) {
    super('CONFIG', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, { cause });
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
