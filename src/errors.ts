/**
 * Error taxonomy
 *
 * Every failure the engine reports is a MapperError with a stable code.
 * Parsing errors carry every issue found before the failure, so callers can
 * report all of them at once.
 */

import type { ValidationIssue } from './types.js';

export type MapperErrorCode =
  | 'MALFORMED_ROW'
  | 'DUPLICATE_SOURCE'
  | 'MALFORMED_DOCUMENT'
  | 'UNSUPPORTED_WORKBOOK'
  | 'UNKNOWN_FIELD'
  | 'RENAME_COLLISION'
  | 'IO_FAILURE';

export abstract class MapperError extends Error {
  abstract readonly code: MapperErrorCode;
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = [], options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.issues = issues;
  }
}

export class MalformedRowError extends MapperError {
  readonly code = 'MALFORMED_ROW';

  constructor(message: string, readonly rowIndex: number, issues: ValidationIssue[] = []) {
    super(message, issues);
  }
}

export class DuplicateSourceError extends MapperError {
  readonly code = 'DUPLICATE_SOURCE';

  constructor(
    readonly original: string,
    readonly replacements: readonly [string, string],
    readonly rowIndex: number | undefined,
    issues: ValidationIssue[] = []
  ) {
    super(
      `"${original}" is mapped twice: to "${replacements[0]}" and to "${replacements[1]}"`,
      issues
    );
  }
}

export class MalformedDocumentError extends MapperError {
  readonly code = 'MALFORMED_DOCUMENT';

  constructor(message: string, readonly line?: number, readonly column?: number) {
    super(line !== undefined ? `${message} (line ${line}, column ${column ?? 1})` : message);
  }
}

export class UnsupportedWorkbookError extends MapperError {
  readonly code = 'UNSUPPORTED_WORKBOOK';

  constructor(readonly missing: readonly string[], detail?: string) {
    super(detail ?? `Not a Tableau workbook: missing ${missing.map(m => `<${m}>`).join(', ')}`);
  }
}

export class UnknownFieldError extends MapperError {
  readonly code = 'UNKNOWN_FIELD';

  constructor(readonly fields: readonly string[], issues: ValidationIssue[] = []) {
    super(`Mapping names fields not present in the workbook: ${fields.map(f => `"${f}"`).join(', ')}`, issues);
  }
}

export class RenameCollisionError extends MapperError {
  readonly code = 'RENAME_COLLISION';

  constructor(readonly target: string, readonly originals: readonly string[]) {
    super(`Renaming would give ${originals.map(o => `"${o}"`).join(' and ')} the same name "${target}"`);
  }
}

export class IOFailure extends MapperError {
  readonly code = 'IO_FAILURE';

  constructor(readonly path: string, readonly operation: 'read' | 'write', cause: unknown) {
    super(
      `Failed to ${operation} ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      [],
      { cause }
    );
  }
}

export function isMapperError(err: unknown): err is MapperError {
  return err instanceof MapperError;
}
