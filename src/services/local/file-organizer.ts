// Scans a directory and moves each regular file into its category folder

import * as fs from 'fs/promises';
import * as path from 'path';
import {
  FileFailureRecord,
  FileMoveRecord,
  Logger,
  OrganizeResult,
  OrganizerConfig,
  SourceEntry,
} from '../../types';
import { ErrorHandler } from '../../core/error-handler';
import {
  ErrorContext,
  FileMoveError,
  InvalidSourceDirectoryError,
  getErrorMessage,
} from '../../core/errors';
import { CategoryClassifier } from './category-classifier';
import { DirectoryProvisioner } from './directory-provisioner';
import { RenameFileMover } from './file-mover';
import { PathUtils } from './path-utils';
import { FileMover } from './types';

export interface FileOrganizerDependencies {
  classifier?: CategoryClassifier;
  provisioner?: DirectoryProvisioner;
  mover?: FileMover;
  errorHandler?: ErrorHandler;
  now?: () => Date;
}

/**
 * One-shot scan, classify and move pipeline over the direct children of a
 * source directory. Keeps no state between calls.
 */
export class FileOrganizer {
  private readonly config: OrganizerConfig;
  private readonly logger: Logger;
  private readonly classifier: CategoryClassifier;
  private readonly provisioner: DirectoryProvisioner;
  private readonly mover: FileMover;
  private readonly errorHandler: ErrorHandler;
  private readonly now: () => Date;

  constructor(config: OrganizerConfig, logger: Logger, dependencies: FileOrganizerDependencies = {}) {
    this.config = config;
    this.logger = logger;
    this.classifier = dependencies.classifier ?? new CategoryClassifier(config.categories);
    this.provisioner =
      dependencies.provisioner ?? new DirectoryProvisioner(this.classifier, logger);
    this.mover = dependencies.mover ?? new RenameFileMover(logger);
    this.errorHandler =
      dependencies.errorHandler ?? new ErrorHandler(logger, config.fileErrorPolicy);
    this.now = dependencies.now ?? (() => new Date());
  }

  getOrganizedRoot(sourceDir: string): string {
    return path.join(sourceDir, this.config.organizedDirectoryName);
  }

  async organize(sourceDir: string): Promise<OrganizeResult> {
    await this.validateSourceDirectory(sourceDir);

    const organizedRoot = this.getOrganizedRoot(sourceDir);
    let categoryDirectories: Record<string, string>;
    try {
      ({ categoryDirectories } = await this.provisioner.ensureLayout(organizedRoot));
    } catch (error) {
      this.errorHandler.handleError(error, {
        operation: 'create_directories',
        directoryPath: organizedRoot,
        timestamp: new Date(),
      });
      throw error;
    }

    let entries: SourceEntry[];
    try {
      entries = await this.scanSourceDirectory(sourceDir);
    } catch (error) {
      this.errorHandler.handleError(error, {
        operation: 'scan_source_directory',
        directoryPath: sourceDir,
        timestamp: new Date(),
      });
      throw error;
    }

    const moves: FileMoveRecord[] = [];
    const failures: FileFailureRecord[] = [];
    let organizedCount = 0;

    for (const entry of entries) {
      const category = this.classifier.classify(entry.extension);
      const destinationDirectory =
        categoryDirectories[category] ?? path.join(organizedRoot, category);

      try {
        const resolution = await PathUtils.resolveUniquePath(
          destinationDirectory,
          entry.name,
          this.config.collisionStrategy,
          this.now
        );
        if (resolution.strategy !== 'original') {
          this.logger.debug(`Name collision for '${entry.name}', using '${resolution.finalName}'`);
        }

        await this.mover.move(entry.path, resolution.resolvedPath);

        organizedCount++;
        moves.push({
          fileName: entry.name,
          category,
          destinationPath: resolution.resolvedPath,
          strategy: resolution.strategy,
        });
        this.logger.info(`Moved '${entry.name}' to ${category} folder`);
      } catch (error) {
        const context: ErrorContext = {
          operation: 'move_file',
          sourcePath: entry.path,
          fileName: entry.name,
          category,
          timestamp: new Date(),
        };
        const moveError = new FileMoveError(
          `Failed to move '${entry.name}' to ${category}: ${getErrorMessage(error)}`,
          context,
          error
        );

        const recovery = this.errorHandler.determineRecovery(
          this.errorHandler.handleError(moveError, context)
        );
        if (recovery.action === 'abort') {
          throw moveError;
        }

        failures.push({
          fileName: entry.name,
          sourcePath: entry.path,
          error: moveError.message,
        });
      }
    }

    this.logger.info(
      `Organization complete. Processed ${organizedCount} of ${entries.length} files`
    );

    return {
      organizedCount,
      totalCount: entries.length,
      moves,
      failures,
    };
  }

  /**
   * Regular files directly inside `sourceDir`, sorted by name. Directories
   * are skipped and never descended into; the log file is left alone.
   */
  async scanSourceDirectory(sourceDir: string): Promise<SourceEntry[]> {
    const logFileName = path.basename(this.config.logFilePath);
    const dirents = await fs.readdir(sourceDir, { withFileTypes: true });
    const entries: SourceEntry[] = [];

    for (const dirent of dirents) {
      if (dirent.name === logFileName) {
        continue;
      }

      const entryPath = path.join(sourceDir, dirent.name);
      if (!(await PathUtils.isRegularFile(dirent, entryPath))) {
        if (dirent.isSymbolicLink()) {
          this.logger.debug(`Skipping link that is not a regular file: '${dirent.name}'`);
        }
        continue;
      }

      entries.push({
        name: dirent.name,
        path: entryPath,
        extension: PathUtils.getFileExtension(dirent.name),
      });
    }

    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  private async validateSourceDirectory(sourceDir: string): Promise<void> {
    const context: ErrorContext = {
      operation: 'validate_source_directory',
      directoryPath: sourceDir,
      timestamp: new Date(),
    };

    let error: InvalidSourceDirectoryError | undefined;
    try {
      const stats = await fs.stat(sourceDir);
      if (!stats.isDirectory()) {
        error = new InvalidSourceDirectoryError(`Not a directory: ${sourceDir}`, context);
      }
    } catch (cause) {
      error = new InvalidSourceDirectoryError(
        `Source directory does not exist or cannot be read: ${sourceDir}`,
        context,
        cause
      );
    }

    if (error) {
      this.errorHandler.handleError(error, context);
      throw error;
    }
  }
}
