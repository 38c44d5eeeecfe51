/**
 * Rig rebuild agencies
 */

export * from './errors';
export * from './issues';
export * from './artifacts';
export * from './config';
export * from './hierarchy';
export * from './deformers';
export * from './connections';
export * from './importer';
export * from './exporter';
export * from './templates';
export * from './build';
