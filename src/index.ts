/**
 * buildgate: matrix build, lint, test, code-generation drift and image
 * gate for one source revision.
 *
 * Public exports for programmatic use. The HTTP server starts from
 * main.ts and the command line from cli.ts.
 */

export { createApp, createAppContext } from './server';
export type { AppContext, AppOverrides } from './server';
export * from './config';
export * from './logger';
export * from './domain';
export * from './matrix';
export * from './cache';
export * from './toolchain';
export * from './artifacts';
export * from './storage';
export * from './engine';
export * from './data-plane';
