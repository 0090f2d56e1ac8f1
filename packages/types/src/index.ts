/**
 * Shared contracts for the portfolio content backend.
 */

export * from './blog/index.js';
export * from './content/index.js';
export * from './database/index.js';
export * from './logging/index.js';
export * from './messages/index.js';
export * from './module/index.js';
export * from './projects/index.js';
