export * from './git';
export * from './root/find-root';
export * from './patch/parser';
export * from './patch/outcome-parser';
export * from './patch/guard';
export * from './patch/rejects';
export * from './patch/snapshot';
export * from './patch/revert';
export * from './patch/applier';
export * from './patch/engine';
