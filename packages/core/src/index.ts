export const name = '@patchfix/core';

export * from './context';
export * from './prompt';
export * from './generator';
export * from './rate/interval-gate';
export * from './cost/tracker';
export * from './validate';
export * from './orchestrator';
export * from './config/loader';
export * from './registry';
export * from './pipeline';
