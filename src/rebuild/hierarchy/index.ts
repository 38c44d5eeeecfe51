export * from './hierarchyComposer';
