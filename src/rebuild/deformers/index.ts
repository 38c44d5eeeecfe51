/**
 * Deformer Stacks
 * Export all deformer-related modules
 */

export * from './deformerKinds';
export * from './stackTargets';
export * from './stackBuilder';
