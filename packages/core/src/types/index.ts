export * from './crypto';
export * from './keychain';
