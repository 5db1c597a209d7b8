export * from './fragment';
export * from './match';
export * from './compare';
export * from './window';
export * from './builder';
