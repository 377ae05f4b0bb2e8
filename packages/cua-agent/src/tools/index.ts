export * from './tool.types';
export * from './tool.helpers';
export * from './keys';
export * from './screen.tools';
export * from './input.tools';
export * from './control.tools';
export * from './agent.tools';
