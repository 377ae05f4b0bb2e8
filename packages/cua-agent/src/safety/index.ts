export * from './audit-log';
export * from './rate-limiter';
export * from './sensitive-detector';
export * from './takeover.controller';
export * from './guardrails';
