export * from './memory.types';
export * from './summarizer';
export * from './phase-detector';
export * from './task-memory';
