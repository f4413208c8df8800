/**
 * Application Layer
 */

export * from './user/index.js';
