export * from './key-list';
export * from './key-recovery';
export * from './keychain';
