/**
 * Environment Configuration
 *
 * Settings of the users service itself. Store settings are read by
 * loadStoreConfig() from the same environment.
 */

import { EnvSchemas, parseEnv, z, type Env } from '@quarry/config';

export const UsersEnvSchema = z.object({
	NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

	// Logging
	LOG_LEVEL: EnvSchemas.logLevel(),
	LOG_PRETTY: EnvSchemas.flag(false),

	// Directory of NNNN_name.sql files (default: the service's migrations/)
	MIGRATIONS_DIR: z.string().min(1).optional(),
	// Fail instead of skipping when a migration would break the version chain
	MIGRATIONS_STRICT: EnvSchemas.flag(true),

	// Argon2id cost parameters
	PASSWORD_MEMORY_COST: EnvSchemas.integer(65536, 1024),
	PASSWORD_TIME_COST: EnvSchemas.integer(3, 2),
	PASSWORD_PARALLELISM: EnvSchemas.integer(4, 1),
});

export type UsersEnv = z.infer<typeof UsersEnvSchema>;

export function loadUsersEnv(env: Env = process.env): UsersEnv {
	return parseEnv(UsersEnvSchema, env);
}
