// Path utilities for extension lookup and collision-free file naming

import * as fs from 'fs/promises';
import { Dirent } from 'fs';
import * as path from 'path';
import { CollisionStrategy } from '../../types';
import { MAX_COLLISION_COUNTER } from '../../core/constants';
import { getErrorCode } from '../../core/errors';
import { ConflictResolutionResult } from './types';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export class PathUtils {
  /**
   * Extension of a file name: the text from its last dot, dot included.
   * A name with no dot, or whose only dot is the leading one (`.bashrc`),
   * has the empty extension.
   */
  static getFileExtension(fileName: string): string {
    return path.extname(fileName);
  }

  /**
   * Split a file name into its stem and extension
   */
  static splitFileName(fileName: string): { stem: string; extension: string } {
    const extension = PathUtils.getFileExtension(fileName);
    return {
      stem: extension ? fileName.slice(0, -extension.length) : fileName,
      extension,
    };
  }

  /**
   * Local time as `YYYYMMDD_HHMMSS`
   */
  static formatCollisionTimestamp(date: Date): string {
    return (
      `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
      `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
    );
  }

  /**
   * Insert `_<suffix>` between the stem and the extension
   */
  static appendSuffix(fileName: string, suffix: string): string {
    const { stem, extension } = PathUtils.splitFileName(fileName);
    return `${stem}_${suffix}${extension}`;
  }

  /**
   * Whether anything (file, directory or dangling link) occupies the path
   */
  static async pathExists(targetPath: string): Promise<boolean> {
    try {
      await fs.lstat(targetPath);
      return true;
    } catch (error) {
      if (getErrorCode(error) === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  /**
   * Whether a directory entry is a regular file. Links count as whatever
   * they point to; a dangling or looping link is not a file.
   */
  static async isRegularFile(dirent: Dirent, entryPath: string): Promise<boolean> {
    if (dirent.isFile()) {
      return true;
    }
    if (!dirent.isSymbolicLink()) {
      return false;
    }

    try {
      return (await fs.stat(entryPath)).isFile();
    } catch (error) {
      const code = getErrorCode(error);
      if (code === 'ENOENT' || code === 'ELOOP') {
        return false;
      }
      throw error;
    }
  }

  /**
   * Pick a destination for `fileName` inside `directoryPath` that does not
   * exist yet. With the timestamp strategy a second collision inside the
   * same second gets an extra counter (`name_<ts>_1.ext`).
   */
  static async resolveUniquePath(
    directoryPath: string,
    fileName: string,
    strategy: CollisionStrategy,
    now: () => Date = () => new Date()
  ): Promise<ConflictResolutionResult> {
    const originalPath = path.join(directoryPath, fileName);
    if (!(await PathUtils.pathExists(originalPath))) {
      return { resolvedPath: originalPath, strategy: 'original', finalName: fileName };
    }

    const base =
      strategy === 'timestamp'
        ? PathUtils.appendSuffix(fileName, PathUtils.formatCollisionTimestamp(now()))
        : fileName;

    if (strategy === 'timestamp') {
      const timestampedPath = path.join(directoryPath, base);
      if (!(await PathUtils.pathExists(timestampedPath))) {
        return { resolvedPath: timestampedPath, strategy: 'timestamped', finalName: base };
      }
    }

    for (let counter = 1; counter <= MAX_COLLISION_COUNTER; counter++) {
      const candidate = PathUtils.appendSuffix(base, String(counter));
      const candidatePath = path.join(directoryPath, candidate);
      if (!(await PathUtils.pathExists(candidatePath))) {
        return {
          resolvedPath: candidatePath,
          strategy: strategy === 'timestamp' ? 'timestamped' : 'numbered',
          finalName: candidate,
        };
      }
    }

    throw new Error(
      `No free name for '${fileName}' in ${directoryPath} after ${MAX_COLLISION_COUNTER} attempts`
    );
  }
}
