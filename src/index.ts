// Main entry point for the file organizer library

export * from './types';
export * from './core';
export * from './services/local';
export * from './progress';

export { CATEGORY_TABLE, DEFAULT_ORGANIZER_CONFIG, MISC_CATEGORY } from './core/constants';
