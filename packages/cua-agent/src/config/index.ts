export * from './agent.options';
export * from './env.loader';
