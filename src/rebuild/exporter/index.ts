export * from './nomenclature';
export * from './exportService';
