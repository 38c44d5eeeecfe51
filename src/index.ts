export * from './engine/SceneHost.types';
export { SceneGraph } from './engine/SceneGraph';
export { ArtifactStore, resolveAssetDirectory, type ReadResult } from './services/artifactStore';
export * from './rebuild';
export { DEFAULT_FACIAL_RIG } from './presets/facialRig';
