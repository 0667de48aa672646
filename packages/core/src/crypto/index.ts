export * from './utils';
export * from './salted-blob';
export * from './key-derivation';
export * from './encryption';
