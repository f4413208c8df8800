/**
 * Persistence Layer
 *
 * Tables and repositories of the users service.
 */

// Schema
export * from './schema/index.js';

// Repositories
export * from './repositories/index.js';
