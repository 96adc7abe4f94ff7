export * from './types';
export * from './path-utils';
export * from './category-classifier';
export * from './directory-provisioner';
export * from './file-mover';
export * from './file-organizer';
