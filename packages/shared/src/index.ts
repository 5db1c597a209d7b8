export const name = '@patchfix/shared';

export * from './types/events';
export * from './types/llm';
export * from './types/patch';
export * from './types/context';
export * from './logger';
export * from './redaction';
export * from './errors';
export * from './config/schema';
export * from './config/validation';
export * from './fs/io';
