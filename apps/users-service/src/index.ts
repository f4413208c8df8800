/**
 * @quarry/users-service
 *
 * The users resource: entity, table, repository, password hashing, use
 * cases and operations, plus the store maintenance CLI.
 *
 * @example
 * ```typescript
 * const app = await createUsersApp({ store: loadStoreConfig(), logger });
 * await app.migrations.migrate();
 *
 * const created = await app.users.createUser(
 *     { email: 'jo@example.com', username: 'jo', password: 'test-password-1' },
 *     ExecutionContext.create('admin'),
 * );
 * ```
 */

export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/persistence/index.js';
export {
	PasswordService,
	DEFAULT_PASSWORD_HASH_OPTIONS,
	type PasswordError,
	type PasswordHashOptions,
} from './infrastructure/crypto/password-service.js';
export * from './bootstrap/index.js';
export { runCli, configFromEnv, type CliOptions } from './cli.js';
export { loadUsersEnv, UsersEnvSchema, type UsersEnv } from './env.js';
