// Core interfaces and types for the file organizer

export type LogLevel = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

export interface Logger {
  error(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

// Configuration validation
export interface ConfigValidationResult {
  isValid: boolean;
  errors: string[];
}

/**
 * A named bucket of file extensions. Extensions are lower-case and keep
 * their leading dot.
 */
export interface Category {
  readonly name: string;
  readonly extensions: readonly string[];
}

export type CategoryTable = readonly Category[];

export type CollisionStrategy = 'timestamp' | 'number';

/**
 * What to do when a single file cannot be moved: stop the whole run, or
 * record the failure and continue with the next file.
 */
export type FileErrorPolicy = 'abort' | 'skip';

export interface OrganizerConfig {
  organizedDirectoryName: string;
  reportFileName: string;
  logFilePath: string;
  logLevel: LogLevel;
  collisionStrategy: CollisionStrategy;
  fileErrorPolicy: FileErrorPolicy;
  categories: CategoryTable;
}

// A regular file found directly inside the source directory
export interface SourceEntry {
  name: string;
  path: string;
  extension: string;
}

export interface FileMoveRecord {
  fileName: string;
  category: string;
  destinationPath: string;
  strategy: 'original' | 'timestamped' | 'numbered';
}

export interface FileFailureRecord {
  fileName: string;
  sourcePath: string;
  error: string;
}

export interface OrganizeResult {
  organizedCount: number;
  totalCount: number;
  moves: FileMoveRecord[];
  failures: FileFailureRecord[];
}

export interface RunSummary extends OrganizeResult {
  sessionId: string;
  sourceDirectory: string;
  organizedRoot: string;
  categoryCounts: Record<string, number>;
  reportPath: string;
  startTime: Date;
  endTime: Date;
  duration: number;
}
