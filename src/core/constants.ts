// Core constants and configuration defaults

import { CategoryTable } from '../types';

export const MISC_CATEGORY = 'misc';

export const MISC_CATEGORY_LABEL = 'Miscellaneous';

/**
 * Extension table, in lookup order. The first category listing an
 * extension wins.
 */
export const CATEGORY_TABLE: CategoryTable = Object.freeze([
  Object.freeze({
    name: 'documents',
    extensions: Object.freeze(['.pdf', '.doc', '.docx', '.txt', '.rtf', '.odt']),
  }),
  Object.freeze({
    name: 'images',
    extensions: Object.freeze(['.jpg', '.jpeg', '.png', '.gif', '.bmp', '.svg']),
  }),
  Object.freeze({
    name: 'audio',
    extensions: Object.freeze(['.mp3', '.wav', '.flac', '.m4a']),
  }),
  Object.freeze({
    name: 'videos',
    extensions: Object.freeze(['.mp4', '.avi', '.mkv', '.mov']),
  }),
  Object.freeze({
    name: 'archives',
    extensions: Object.freeze(['.zip', '.rar', '.7z', '.tar', '.gz']),
  }),
  Object.freeze({
    name: 'code',
    extensions: Object.freeze(['.py', '.js', '.html', '.css', '.java', '.cpp']),
  }),
]);

export const DEFAULT_ORGANIZER_CONFIG = {
  organizedDirectoryName: 'organized_files',
  reportFileName: 'organization_report.txt',
  logFilePath: 'file_organizer.log',
  logLevel: 'INFO' as const,
  collisionStrategy: 'timestamp' as const,
  fileErrorPolicy: 'abort' as const,
};

export const SUPPORTED_COLLISION_STRATEGIES = Object.freeze(['timestamp', 'number'] as const);
export const SUPPORTED_FILE_ERROR_POLICIES = Object.freeze(['abort', 'skip'] as const);

export const REPORT_TITLE = 'File Organization Report';
export const REPORT_SEPARATOR = '='.repeat(25);

// Upper bound for numbered collision suffixes
export const MAX_COLLISION_COUNTER = 10000;

export const LOG_LEVELS = {
  ERROR: 'ERROR',
  WARN: 'WARN',
  INFO: 'INFO',
  DEBUG: 'DEBUG',
} as const;
