export * from './types';
export * from './structural';
export * from './command';
export * from './composite';
