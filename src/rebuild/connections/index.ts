export * from './connectionWirer';
