/**
 * Rig Configuration
 * Export all config-related modules
 */

export * from './types';
export * from './placeholders';
export * from './naming';
export * from './validation';
export * from './configStore';
export * from './loader';
