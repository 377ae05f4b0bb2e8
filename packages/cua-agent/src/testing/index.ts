export * from './fake-desktop-backend';
export * from './fake-model-client';
export * from './tool-context';
