/**
 * Typed errors raised while turning a source document into a record.
 * Every failure is per-record: the batch loader collects them and moves on.
 */

export type RecordErrorKind =
  | 'malformed-header'
  | 'schema'
  | 'missing-field'
  | 'date-parse'
  | 'source-read';

export abstract class RecordError extends Error {
  abstract readonly kind: RecordErrorKind;

  constructor(
    message: string,
    public readonly source: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The text does not open with `---`, or the header block is never closed.
 */
export class MalformedHeaderError extends RecordError {
  readonly kind = 'malformed-header';

  constructor(source: string, detail: string) {
    super(`Malformed header in ${source}: ${detail}`, source);
  }
}

/**
 * The header block is not valid YAML, or has the wrong shape.
 */
export class SchemaError extends RecordError {
  readonly kind = 'schema';

  constructor(source: string, public readonly detail: string, options?: { cause?: unknown }) {
    super(`Invalid metadata in ${source}: ${detail}`, source, options);
  }
}

export class MissingFieldError extends RecordError {
  readonly kind = 'missing-field';

  constructor(source: string, public readonly field: string) {
    super(`Missing required field '${field}' in ${source}`, source);
  }
}

export class DateParseError extends RecordError {
  readonly kind = 'date-parse';

  constructor(source: string, public readonly field: string, public readonly value: string) {
    super(`Invalid date in ${source}: ${field} '${value}' is not a YYYY-MM-DD date`, source);
  }
}

export class SourceReadError extends RecordError {
  readonly kind = 'source-read';

  constructor(source: string, cause: unknown) {
    super(`Failed to read ${source}: ${cause instanceof Error ? cause.message : String(cause)}`, source, { cause });
  }
}

/**
 * Raised by collaborators when a batch produced no records at all.
 */
export class NoRecordsFoundError extends Error {
  constructor(public readonly inputDir: string) {
    super(`No records found in ${inputDir}`);
    this.name = 'NoRecordsFoundError';
  }
}

export function isRecordError(value: unknown): value is RecordError {
  return value instanceof RecordError;
}
