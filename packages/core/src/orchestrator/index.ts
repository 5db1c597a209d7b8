export * from './complexity';
export * from './tree-state';
export * from './reconciler';
export * from './patch-writer';
export * from './inspect';
export * from './series';
