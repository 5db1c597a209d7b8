export const name = '@patchfix/adapters';

export * from './types';
export * from './adapter';
export * from './base-adapter';
export * from './common';
export * from './openai/adapter';
export * from './anthropic/adapter';
export * from './fake/adapter';
