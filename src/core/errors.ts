// Error types raised by the organizer

export enum OrganizerErrorKind {
  DIRECTORY_CREATION = 'directory_creation',
  FILE_MOVE = 'file_move',
  REPORT_WRITE = 'report_write',
  INVALID_SOURCE_DIRECTORY = 'invalid_source_directory',
}

export interface ErrorContext {
  operation: string;
  sourcePath?: string;
  destinationPath?: string;
  directoryPath?: string;
  fileName?: string;
  category?: string;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

/**
 * Base class for every failure the organizer reports. Keeps the failing
 * operation's context and the underlying error (if any) as `cause`.
 */
export class OrganizerError extends Error {
  readonly kind: OrganizerErrorKind;
  readonly context: ErrorContext;

  constructor(kind: OrganizerErrorKind, message: string, context: ErrorContext, cause?: unknown) {
    super(message, { cause });
    this.name = 'OrganizerError';
    this.kind = kind;
    this.context = context;
  }

  /**
   * Node errno code of the underlying error, e.g. `EACCES`
   */
  get code(): string | undefined {
    return getErrorCode(this.cause);
  }
}

export class DirectoryCreationError extends OrganizerError {
  constructor(message: string, context: ErrorContext, cause?: unknown) {
    super(OrganizerErrorKind.DIRECTORY_CREATION, message, context, cause);
    this.name = 'DirectoryCreationError';
  }
}

export class FileMoveError extends OrganizerError {
  constructor(message: string, context: ErrorContext, cause?: unknown) {
    super(OrganizerErrorKind.FILE_MOVE, message, context, cause);
    this.name = 'FileMoveError';
  }
}

export class ReportWriteError extends OrganizerError {
  constructor(message: string, context: ErrorContext, cause?: unknown) {
    super(OrganizerErrorKind.REPORT_WRITE, message, context, cause);
    this.name = 'ReportWriteError';
  }
}

export class InvalidSourceDirectoryError extends OrganizerError {
  constructor(message: string, context: ErrorContext, cause?: unknown) {
    super(OrganizerErrorKind.INVALID_SOURCE_DIRECTORY, message, context, cause);
    this.name = 'InvalidSourceDirectoryError';
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
