/**
 * Domain model exports.
 */

export * from './artifact';
export * from './cache';
export * from './errors';
export * from './events';
export * from './job';
export * from './pipeline';
export * from './target';
