// Local file management types and interfaces

export interface DirectoryLayout {
  root: string;
  categoryDirectories: Record<string, string>;
  // Directories made by this call; empty when the layout already existed
  created: string[];
}

export interface ConflictResolutionResult {
  resolvedPath: string;
  strategy: 'original' | 'timestamped' | 'numbered';
  finalName: string;
}

/**
 * Moves one file. Implementations must not replace an existing destination.
 */
export interface FileMover {
  move(sourcePath: string, destinationPath: string): Promise<void>;
}
