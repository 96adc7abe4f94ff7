// Organizer core module
export * from './constants';
export * from './errors';
export * from './logger';
export * from './config-manager';
export * from './error-handler';
export * from './organizer-orchestrator';
