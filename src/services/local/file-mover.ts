import * as fs from 'fs/promises';
import { constants } from 'fs';
import { Logger } from '../../types';
import { getErrorCode } from '../../core/errors';
import { FileMover } from './types';

/**
 * Moves files with a single rename. When source and destination sit on
 * different filesystems (`EXDEV`) it falls back to an exclusive copy and
 * then removes the source; that path is not atomic and can leave both
 * copies behind if the delete fails.
 */
export class RenameFileMover implements FileMover {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async move(sourcePath: string, destinationPath: string): Promise<void> {
    try {
      await fs.rename(sourcePath, destinationPath);
    } catch (error) {
      if (getErrorCode(error) !== 'EXDEV') {
        throw error;
      }

      this.logger.debug(`Cross-device move, copying instead: ${sourcePath} -> ${destinationPath}`);
      await fs.copyFile(sourcePath, destinationPath, constants.COPYFILE_EXCL);
      await fs.unlink(sourcePath);
    }
  }
}
