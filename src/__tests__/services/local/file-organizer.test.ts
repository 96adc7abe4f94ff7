import * as fs from 'fs/promises';
import * as path from 'path';
import { FileOrganizer } from '../../../services/local/file-organizer';
import { RenameFileMover } from '../../../services/local/file-mover';
import { FileMover } from '../../../services/local/types';
import { OrganizerConfigManager } from '../../../core/config-manager';
import {
  DirectoryCreationError,
  FileMoveError,
  InvalidSourceDirectoryError,
} from '../../../core/errors';
import { OrganizerConfig } from '../../../types';
import {
  FIXED_NOW,
  FIXED_STAMP,
  createMockLogger,
  createTempDir,
  exists,
  removeTempDir,
  writeFiles,
} from '../../helpers/test-utils';

/**
 * Fails for one file name, moves everything else for real
 */
class FailingMover implements FileMover {
  private readonly delegate = new RenameFileMover(createMockLogger());
  private readonly failFor: string;
  private readonly code: string;

  constructor(failFor: string, code = 'EACCES') {
    this.failFor = failFor;
    this.code = code;
  }

  async move(sourcePath: string, destinationPath: string): Promise<void> {
    if (path.basename(sourcePath) === this.failFor) {
      throw Object.assign(new Error(`${this.code}: simulated failure`), { code: this.code });
    }
    await this.delegate.move(sourcePath, destinationPath);
  }
}

describe('FileOrganizer', () => {
  let tempDir: string;
  let sourceDir: string;
  let organizedRoot: string;
  let logger: ReturnType<typeof createMockLogger>;
  let config: OrganizerConfig;

  const createOrganizer = (overrides: Partial<OrganizerConfig> = {}, mover?: FileMover) =>
    new FileOrganizer({ ...config, ...overrides }, logger, { mover, now: () => FIXED_NOW });

  beforeEach(async () => {
    tempDir = await createTempDir();
    sourceDir = path.join(tempDir, 'source');
    organizedRoot = path.join(sourceDir, 'organized_files');
    await fs.mkdir(sourceDir);
    logger = createMockLogger();
    config = OrganizerConfigManager.createDefault();
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  describe('organize', () => {
    it('should move each file into its category folder', async () => {
      await writeFiles(sourceDir, { 'a.txt': 'text', 'b.jpg': 'image', 'c.unknown': 'blob' });

      const result = await createOrganizer().organize(sourceDir);

      expect(result.organizedCount).toBe(3);
      expect(result.totalCount).toBe(3);
      expect(result.failures).toEqual([]);
      expect(await fs.readFile(path.join(organizedRoot, 'documents', 'a.txt'), 'utf8')).toBe('text');
      expect(await fs.readFile(path.join(organizedRoot, 'images', 'b.jpg'), 'utf8')).toBe('image');
      expect(await fs.readFile(path.join(organizedRoot, 'misc', 'c.unknown'), 'utf8')).toBe('blob');
      expect(await exists(path.join(sourceDir, 'a.txt'))).toBe(false);
    });

    it('should record every move in name order', async () => {
      await writeFiles(sourceDir, { 'b.jpg': 'image', 'a.txt': 'text' });

      const result = await createOrganizer().organize(sourceDir);

      expect(result.moves).toEqual([
        {
          fileName: 'a.txt',
          category: 'documents',
          destinationPath: path.join(organizedRoot, 'documents', 'a.txt'),
          strategy: 'original',
        },
        {
          fileName: 'b.jpg',
          category: 'images',
          destinationPath: path.join(organizedRoot, 'images', 'b.jpg'),
          strategy: 'original',
        },
      ]);
    });

    it('should classify extensions without regard to case', async () => {
      await writeFiles(sourceDir, { 'PHOTO.JPG': 'image', 'Notes.TXT': 'text' });

      await createOrganizer().organize(sourceDir);

      expect(await exists(path.join(organizedRoot, 'images', 'PHOTO.JPG'))).toBe(true);
      expect(await exists(path.join(organizedRoot, 'documents', 'Notes.TXT'))).toBe(true);
    });

    it('should send files without an extension to misc', async () => {
      await writeFiles(sourceDir, { README: 'read me', '.env': 'KEY=test-secret' });

      const result = await createOrganizer().organize(sourceDir);

      expect(result.organizedCount).toBe(2);
      expect(await exists(path.join(organizedRoot, 'misc', 'README'))).toBe(true);
      expect(await exists(path.join(organizedRoot, 'misc', '.env'))).toBe(true);
    });

    it('should leave subdirectories untouched', async () => {
      await writeFiles(sourceDir, { 'a.txt': 'text' });
      await fs.mkdir(path.join(sourceDir, 'sub'));
      await fs.writeFile(path.join(sourceDir, 'sub', 'nested.pdf'), 'nested');

      const result = await createOrganizer().organize(sourceDir);

      expect(result.totalCount).toBe(1);
      expect(await fs.readFile(path.join(sourceDir, 'sub', 'nested.pdf'), 'utf8')).toBe('nested');
      expect(await exists(path.join(organizedRoot, 'documents', 'nested.pdf'))).toBe(false);
    });

    it('should not move the log file', async () => {
      await writeFiles(sourceDir, { 'file_organizer.log': 'old log', 'a.txt': 'text' });

      const result = await createOrganizer().organize(sourceDir);

      expect(result.totalCount).toBe(1);
      expect(await fs.readFile(path.join(sourceDir, 'file_organizer.log'), 'utf8')).toBe('old log');
    });

    it('should follow links to files and skip links to directories', async () => {
      const outside = path.join(tempDir, 'outside');
      await fs.mkdir(outside);
      await fs.writeFile(path.join(outside, 'real.pdf'), 'real');
      await fs.symlink(path.join(outside, 'real.pdf'), path.join(sourceDir, 'file-link.pdf'));
      await fs.symlink(outside, path.join(sourceDir, 'dir-link'));
      await fs.symlink(path.join(outside, 'gone.txt'), path.join(sourceDir, 'dangling.txt'));

      const result = await createOrganizer().organize(sourceDir);

      expect(result.totalCount).toBe(1);
      const moved = await fs.lstat(path.join(organizedRoot, 'documents', 'file-link.pdf'));
      expect(moved.isSymbolicLink()).toBe(true);
      expect((await fs.lstat(path.join(sourceDir, 'dir-link'))).isSymbolicLink()).toBe(true);
      expect((await fs.lstat(path.join(sourceDir, 'dangling.txt'))).isSymbolicLink()).toBe(true);
    });

    it('should log each move and the final count', async () => {
      await writeFiles(sourceDir, { 'a.txt': 'text', 'song.mp3': 'audio' });

      await createOrganizer().organize(sourceDir);

      expect(logger.info).toHaveBeenCalledWith("Moved 'a.txt' to documents folder");
      expect(logger.info).toHaveBeenCalledWith("Moved 'song.mp3' to audio folder");
      expect(logger.info).toHaveBeenCalledWith('Organization complete. Processed 2 of 2 files');
    });

    it('should handle an empty directory', async () => {
      const result = await createOrganizer().organize(sourceDir);

      expect(result).toEqual({ organizedCount: 0, totalCount: 0, moves: [], failures: [] });
      expect((await fs.readdir(organizedRoot)).sort()).toEqual([
        'archives',
        'audio',
        'code',
        'documents',
        'images',
        'misc',
        'videos',
      ]);
    });
  });

  describe('collisions', () => {
    it('should never overwrite an existing destination', async () => {
      await fs.mkdir(path.join(organizedRoot, 'documents'), { recursive: true });
      await fs.writeFile(path.join(organizedRoot, 'documents', 'a.txt'), 'original');
      await writeFiles(sourceDir, { 'a.txt': 'incoming' });

      const result = await createOrganizer().organize(sourceDir);

      const documents = (await fs.readdir(path.join(organizedRoot, 'documents'))).sort();
      expect(documents).toEqual(['a.txt', `a_${FIXED_STAMP}.txt`]);
      expect(await fs.readFile(path.join(organizedRoot, 'documents', 'a.txt'), 'utf8')).toBe(
        'original'
      );
      expect(
        await fs.readFile(path.join(organizedRoot, 'documents', `a_${FIXED_STAMP}.txt`), 'utf8')
      ).toBe('incoming');
      expect(result.moves[0].strategy).toBe('timestamped');
      expect(result.organizedCount).toBe(1);
    });

    it('should number colliding names with the number strategy', async () => {
      await fs.mkdir(path.join(organizedRoot, 'code'), { recursive: true });
      await fs.writeFile(path.join(organizedRoot, 'code', 'main.py'), 'print(1)');
      await writeFiles(sourceDir, { 'main.py': 'print(2)' });

      await createOrganizer({ collisionStrategy: 'number' }).organize(sourceDir);

      expect(await fs.readFile(path.join(organizedRoot, 'code', 'main_1.py'), 'utf8')).toBe(
        'print(2)'
      );
      expect(await fs.readFile(path.join(organizedRoot, 'code', 'main.py'), 'utf8')).toBe('print(1)');
    });
  });

  describe('errors', () => {
    it('should reject a missing source directory', async () => {
      const missing = path.join(tempDir, 'does-not-exist');

      await expect(createOrganizer().organize(missing)).rejects.toBeInstanceOf(
        InvalidSourceDirectoryError
      );
      expect(logger.error).toHaveBeenCalled();
    });

    it('should reject a source path that is a file', async () => {
      const file = path.join(tempDir, 'plain.txt');
      await fs.writeFile(file, 'text');

      await expect(createOrganizer().organize(file)).rejects.toThrow(`Not a directory: ${file}`);
    });

    it('should stop when the organized root cannot be created', async () => {
      await writeFiles(sourceDir, { organized_files: 'a file in the way', 'a.txt': 'text' });

      await expect(createOrganizer().organize(sourceDir)).rejects.toBeInstanceOf(
        DirectoryCreationError
      );
      expect(await exists(path.join(sourceDir, 'a.txt'))).toBe(true);
    });

    it('should abort the run on the first failed move by default', async () => {
      await writeFiles(sourceDir, { 'a.txt': 'text', 'b.jpg': 'image', 'c.unknown': 'blob' });

      const error = await createOrganizer({}, new FailingMover('b.jpg'))
        .organize(sourceDir)
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(FileMoveError);
      if (!(error instanceof FileMoveError)) {
        throw new Error('expected a FileMoveError');
      }
      expect(error.message).toBe("Failed to move 'b.jpg' to images: EACCES: simulated failure");
      expect(error.code).toBe('EACCES');
      expect(error.context.fileName).toBe('b.jpg');
      expect(await exists(path.join(organizedRoot, 'documents', 'a.txt'))).toBe(true);
      expect(await exists(path.join(sourceDir, 'b.jpg'))).toBe(true);
      expect(await exists(path.join(sourceDir, 'c.unknown'))).toBe(true);
      expect(logger.error).toHaveBeenCalledWith(
        "PERMISSION error in move_file: Failed to move 'b.jpg' to images: EACCES: simulated failure",
        expect.objectContaining({ recoveryStrategy: 'abort' })
      );
      expect(logger.info).not.toHaveBeenCalledWith(
        expect.stringContaining('Organization complete')
      );
    });

    it('should skip failed moves and continue with the skip policy', async () => {
      await writeFiles(sourceDir, { 'a.txt': 'text', 'b.jpg': 'image', 'c.unknown': 'blob' });

      const result = await createOrganizer(
        { fileErrorPolicy: 'skip' },
        new FailingMover('b.jpg', 'ENOENT')
      ).organize(sourceDir);

      expect(result.organizedCount).toBe(2);
      expect(result.totalCount).toBe(3);
      expect(result.failures).toEqual([
        {
          fileName: 'b.jpg',
          sourcePath: path.join(sourceDir, 'b.jpg'),
          error: "Failed to move 'b.jpg' to images: ENOENT: simulated failure",
        },
      ]);
      expect(await exists(path.join(sourceDir, 'b.jpg'))).toBe(true);
      expect(await exists(path.join(organizedRoot, 'misc', 'c.unknown'))).toBe(true);
      expect(logger.warn).toHaveBeenCalledWith(
        "NOT_FOUND error in move_file: Failed to move 'b.jpg' to images: ENOENT: simulated failure",
        expect.objectContaining({ recoveryStrategy: 'skip' })
      );
      expect(logger.info).toHaveBeenCalledWith('Organization complete. Processed 2 of 3 files');
    });
  });

  describe('scanSourceDirectory', () => {
    it('should list regular files with their extensions', async () => {
      await writeFiles(sourceDir, { 'b.tar.gz': 'archive', 'a.txt': 'text' });
      await fs.mkdir(path.join(sourceDir, 'folder.zip'));

      const entries = await createOrganizer().scanSourceDirectory(sourceDir);

      expect(entries).toEqual([
        { name: 'a.txt', path: path.join(sourceDir, 'a.txt'), extension: '.txt' },
        { name: 'b.tar.gz', path: path.join(sourceDir, 'b.tar.gz'), extension: '.gz' },
      ]);
    });
  });
});
