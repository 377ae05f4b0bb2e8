export * from './agent.types';
export * from './agent.constants';
export * from './agent.prompts';
export * from './agent.loop';
