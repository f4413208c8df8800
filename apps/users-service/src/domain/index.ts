/**
 * Domain Layer
 */

export * from './user/index.js';
