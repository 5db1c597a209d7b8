export * from './budget';
export * from './extract';
export * from './metadata';
export * from './generator';
