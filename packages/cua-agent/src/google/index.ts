export * from './google.constants';
export * from './google.tools';
export * from './google.service';
