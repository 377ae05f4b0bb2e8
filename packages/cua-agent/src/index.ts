import 'reflect-metadata';

export * from './agent';
export * from './config';
export * from './coordinate-system';
export * from './google';
export * from './logger';
export * from './memory';
export * from './safety';
export * from './tools';
export * from './cua.agent';
export * from './cua.module';
