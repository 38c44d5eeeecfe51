export * from './templateScenes';
export * from './controllerCheck';
