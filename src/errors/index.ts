/**
 * Application error exports
 */

export type * from './app-error.js';
export * from './factories.js';
export * from './formatter.js';
