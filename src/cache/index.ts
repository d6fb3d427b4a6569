export * from './backend';
export * from './cache-key';
export * from './cache-manager';
