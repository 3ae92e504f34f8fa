/**
 * Error taxonomy for the conversion pipeline.
 *
 * Document-level errors (EmptySourceError, UnsupportedDialectError) abort
 * one document; RecordParseError skips one block. Anything else reaching the
 * CLI is an I/O failure and ends the run.
 */

export type ConversionErrorCode =
  | 'EMPTY_SOURCE'
  | 'RECORD_PARSE_FAILURE'
  | 'UNSUPPORTED_DIALECT'
  | 'UNSUPPORTED_FILE_TYPE'
  | 'INVALID_CONFIG';

export class ConversionError extends Error {
  constructor(message: string, public readonly code: ConversionErrorCode) {
    super(message);
    this.name = 'ConversionError';
  }
}

export class EmptySourceError extends ConversionError {
  constructor(public readonly file?: string) {
    super(`No adversary blocks found${file ? ` in ${file}` : ''}`, 'EMPTY_SOURCE');
    this.name = 'EmptySourceError';
  }
}

export class RecordParseError extends ConversionError {
  constructor(
    message: string,
    public readonly blockIndex: number,
    public readonly excerpt: string,
    public readonly page?: number,
  ) {
    super(message, 'RECORD_PARSE_FAILURE');
    this.name = 'RecordParseError';
  }
}

export class UnsupportedDialectError extends ConversionError {
  constructor(public readonly file?: string) {
    super(`Document matches no known adversary format${file ? `: ${file}` : ''}`, 'UNSUPPORTED_DIALECT');
    this.name = 'UnsupportedDialectError';
  }
}

export class UnsupportedFileTypeError extends ConversionError {
  constructor(public readonly file: string) {
    super(`Unsupported file type: ${file} (expected .pdf or .md)`, 'UNSUPPORTED_FILE_TYPE');
    this.name = 'UnsupportedFileTypeError';
  }
}

export class ConfigError extends ConversionError {
  constructor(message: string, public readonly path?: string) {
    super(message, 'INVALID_CONFIG');
    this.name = 'ConfigError';
  }
}

/** Document-level failures that leave the rest of a batch running. */
export function isDocumentError(err: unknown): err is EmptySourceError | UnsupportedDialectError | UnsupportedFileTypeError {
  return (
    err instanceof EmptySourceError ||
    err instanceof UnsupportedDialectError ||
    err instanceof UnsupportedFileTypeError
  );
}
