export * from './importService';
