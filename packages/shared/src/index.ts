export * from './types';
export * from './env';
export * from './log';
