// Creates the organized root and one folder per category

import * as fs from 'fs/promises';
import { Stats } from 'fs';
import * as path from 'path';
import { Logger } from '../../types';
import { DirectoryCreationError, getErrorCode, getErrorMessage } from '../../core/errors';
import { CategoryClassifier } from './category-classifier';
import { DirectoryLayout } from './types';

/**
 * Ensures the destination tree exists. Safe to call repeatedly: existing
 * directories are left as they are, nothing is ever removed.
 */
export class DirectoryProvisioner {
  private readonly classifier: CategoryClassifier;
  private readonly logger: Logger;

  constructor(classifier: CategoryClassifier, logger: Logger) {
    this.classifier = classifier;
    this.logger = logger;
  }

  async ensureLayout(root: string): Promise<DirectoryLayout> {
    const created: string[] = [];
    const categoryDirectories: Record<string, string> = {};

    if (await this.ensureDirectory(root, true)) {
      created.push(root);
    }

    for (const category of this.classifier.getCategoryNames()) {
      const categoryPath = path.join(root, category);
      if (await this.ensureDirectory(categoryPath, false)) {
        created.push(categoryPath);
      }
      categoryDirectories[category] = categoryPath;
    }

    this.logger.info('Directory structure created successfully', {
      root,
      created: created.length,
    });

    return { root, categoryDirectories, created };
  }

  /**
   * Returns true when the directory had to be created
   */
  private async ensureDirectory(directoryPath: string, recursive: boolean): Promise<boolean> {
    const context = {
      operation: 'create_directories',
      directoryPath,
      timestamp: new Date(),
    };

    let stats: Stats | undefined;
    try {
      stats = await fs.stat(directoryPath);
    } catch (error) {
      if (getErrorCode(error) !== 'ENOENT') {
        throw new DirectoryCreationError(
          `Cannot inspect directory ${directoryPath}: ${getErrorMessage(error)}`,
          context,
          error
        );
      }
    }

    if (stats) {
      if (!stats.isDirectory()) {
        throw new DirectoryCreationError(
          `Path exists but is not a directory: ${directoryPath}`,
          context
        );
      }
      return false;
    }

    try {
      this.logger.debug(`Creating directory: ${directoryPath}`);
      await fs.mkdir(directoryPath, { recursive });
      return true;
    } catch (error) {
      throw new DirectoryCreationError(
        `Failed to create directory ${directoryPath}: ${getErrorMessage(error)}`,
        context,
        error
      );
    }
  }
}
