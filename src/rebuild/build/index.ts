/**
 * Build session agency
 */

export * from './types';
export * from './buildMachine';
export * from './buildEvents';
export * from './buildService';
