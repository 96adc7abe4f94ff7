// Error categorization, logging and recovery decisions for organizer runs

import { FileErrorPolicy, Logger } from '../types';
import { ErrorContext, FileMoveError, OrganizerError, getErrorCode, getErrorMessage } from './errors';

export enum ErrorCategory {
  PERMISSION = 'permission',
  NOT_FOUND = 'not_found',
  CROSS_DEVICE = 'cross_device',
  PATH_TOO_LONG = 'path_too_long',
  NOT_A_DIRECTORY = 'not_a_directory',
  ALREADY_EXISTS = 'already_exists',
  FILE_SYSTEM = 'file_system',
  VALIDATION = 'validation',
  UNKNOWN = 'unknown',
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export enum RecoveryStrategy {
  SKIP = 'skip',
  ABORT = 'abort',
}

export interface CategorizedError {
  originalError: Error;
  category: ErrorCategory;
  severity: ErrorSeverity;
  recoveryStrategy: RecoveryStrategy;
  context: ErrorContext;
  code?: string;
  message: string;
  userMessage: string;
}

export interface ErrorRecoveryResult {
  action: 'skip' | 'abort';
  message: string;
}

export interface ErrorStatistics {
  totalErrors: number;
  errorsByCategory: Record<ErrorCategory, number>;
  errorsBySeverity: Record<ErrorSeverity, number>;
  skippedErrors: number;
  abortedOperations: number;
}

function emptyCategoryCounts(): Record<ErrorCategory, number> {
  return {
    [ErrorCategory.PERMISSION]: 0,
    [ErrorCategory.NOT_FOUND]: 0,
    [ErrorCategory.CROSS_DEVICE]: 0,
    [ErrorCategory.PATH_TOO_LONG]: 0,
    [ErrorCategory.NOT_A_DIRECTORY]: 0,
    [ErrorCategory.ALREADY_EXISTS]: 0,
    [ErrorCategory.FILE_SYSTEM]: 0,
    [ErrorCategory.VALIDATION]: 0,
    [ErrorCategory.UNKNOWN]: 0,
  };
}

function emptySeverityCounts(): Record<ErrorSeverity, number> {
  return {
    [ErrorSeverity.LOW]: 0,
    [ErrorSeverity.MEDIUM]: 0,
    [ErrorSeverity.HIGH]: 0,
    [ErrorSeverity.CRITICAL]: 0,
  };
}

/**
 * Categorizes and logs every error raised during a run, and decides whether
 * the run may continue past it.
 *
 * Only a {@link FileMoveError} under the `skip` policy lets the run continue;
 * everything else aborts.
 */
export class ErrorHandler {
  private readonly logger: Logger;
  private readonly fileErrorPolicy: FileErrorPolicy;
  private statistics: ErrorStatistics;
  private readonly errorHistory: CategorizedError[] = [];
  private readonly maxHistorySize: number;

  constructor(logger: Logger, fileErrorPolicy: FileErrorPolicy = 'abort', maxHistorySize = 1000) {
    this.logger = logger;
    this.fileErrorPolicy = fileErrorPolicy;
    this.maxHistorySize = maxHistorySize;
    this.statistics = this.createStatistics();
  }

  /**
   * Categorize, record and log an error
   */
  handleError(error: unknown, context: ErrorContext): CategorizedError {
    const original = error instanceof Error ? error : new Error(getErrorMessage(error));
    const categorizedError = this.categorizeError(original, context);

    this.statistics.totalErrors++;
    this.statistics.errorsByCategory[categorizedError.category]++;
    this.statistics.errorsBySeverity[categorizedError.severity]++;

    this.errorHistory.push(categorizedError);
    if (this.errorHistory.length > this.maxHistorySize) {
      this.errorHistory.shift();
    }

    this.logError(categorizedError);

    return categorizedError;
  }

  determineRecovery(categorizedError: CategorizedError): ErrorRecoveryResult {
    if (categorizedError.recoveryStrategy === RecoveryStrategy.SKIP) {
      this.statistics.skippedErrors++;
      return {
        action: 'skip',
        message: `Skipping ${categorizedError.context.fileName ?? 'entry'} due to ${categorizedError.category} error`,
      };
    }

    this.statistics.abortedOperations++;
    return {
      action: 'abort',
      message: `Aborting due to ${categorizedError.severity} ${categorizedError.category} error`,
    };
  }

  getStatistics(): ErrorStatistics {
    return {
      ...this.statistics,
      errorsByCategory: { ...this.statistics.errorsByCategory },
      errorsBySeverity: { ...this.statistics.errorsBySeverity },
    };
  }

  getErrorsByCategory(category: ErrorCategory): CategorizedError[] {
    return this.errorHistory.filter((error) => error.category === category);
  }

  /**
   * Whether this error instance has already been through {@link handleError}
   */
  isHandled(error: unknown): boolean {
    return this.errorHistory.some((entry) => entry.originalError === error);
  }

  getErrorHistory(): CategorizedError[] {
    return [...this.errorHistory];
  }

  clearHistory(): void {
    this.errorHistory.length = 0;
    this.statistics = this.createStatistics();
  }

  private createStatistics(): ErrorStatistics {
    return {
      totalErrors: 0,
      errorsByCategory: emptyCategoryCounts(),
      errorsBySeverity: emptySeverityCounts(),
      skippedErrors: 0,
      abortedOperations: 0,
    };
  }

  private categorizeError(error: Error, context: ErrorContext): CategorizedError {
    const code = getErrorCode(error);

    let category = ErrorCategory.UNKNOWN;
    let severity = ErrorSeverity.HIGH;

    switch (code) {
      case 'EACCES':
      case 'EPERM':
      case 'EROFS':
        category = ErrorCategory.PERMISSION;
        break;
      case 'ENOENT':
        category = ErrorCategory.NOT_FOUND;
        severity = ErrorSeverity.MEDIUM;
        break;
      case 'EXDEV':
        category = ErrorCategory.CROSS_DEVICE;
        break;
      case 'ENAMETOOLONG':
        category = ErrorCategory.PATH_TOO_LONG;
        severity = ErrorSeverity.MEDIUM;
        break;
      case 'ENOTDIR':
        category = ErrorCategory.NOT_A_DIRECTORY;
        break;
      case 'EEXIST':
        category = ErrorCategory.ALREADY_EXISTS;
        break;
      case 'ENOSPC':
      case 'EMFILE':
      case 'EIO':
      case 'EBUSY':
        category = ErrorCategory.FILE_SYSTEM;
        severity = ErrorSeverity.CRITICAL;
        break;
      default:
        if (error instanceof OrganizerError && error.cause === undefined) {
          category = ErrorCategory.VALIDATION;
        }
    }

    const canSkip = error instanceof FileMoveError && this.fileErrorPolicy === 'skip';

    return {
      originalError: error,
      category,
      severity,
      recoveryStrategy: canSkip ? RecoveryStrategy.SKIP : RecoveryStrategy.ABORT,
      context,
      code,
      message: error.message,
      userMessage: this.generateUserMessage(category, context),
    };
  }

  private logError(error: CategorizedError): void {
    const logMessage = `${error.category.toUpperCase()} error in ${error.context.operation}: ${error.message}`;
    const logMeta = {
      category: error.category,
      severity: error.severity,
      recoveryStrategy: error.recoveryStrategy,
      code: error.code,
      context: error.context,
    };

    if (error.recoveryStrategy === RecoveryStrategy.SKIP) {
      this.logger.warn(logMessage, logMeta);
    } else {
      this.logger.error(logMessage, logMeta);
    }
  }

  private generateUserMessage(category: ErrorCategory, context: ErrorContext): string {
    const operation = context.operation.replace(/_/g, ' ');
    const target = context.fileName ? ` for "${context.fileName}"` : '';

    switch (category) {
      case ErrorCategory.PERMISSION:
        return `Permission denied during ${operation}${target}.`;
      case ErrorCategory.NOT_FOUND:
        return `A file or directory disappeared during ${operation}${target}.`;
      case ErrorCategory.CROSS_DEVICE:
        return `Could not move across filesystems during ${operation}${target}.`;
      case ErrorCategory.PATH_TOO_LONG:
        return `Path too long during ${operation}${target}.`;
      case ErrorCategory.NOT_A_DIRECTORY:
      case ErrorCategory.ALREADY_EXISTS:
        return `A file is in the way of a directory during ${operation}${target}.`;
      case ErrorCategory.FILE_SYSTEM:
        return `File system error during ${operation}${target}. Check disk space.`;
      case ErrorCategory.VALIDATION:
        return `Invalid input during ${operation}${target}.`;
      default:
        return `Unexpected error during ${operation}${target}.`;
    }
  }
}
