export * from './coordinates';
export * from './coordinate-state';
export * from './screenshot-encoder';
