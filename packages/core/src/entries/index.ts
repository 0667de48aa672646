export * from './entry-index';
