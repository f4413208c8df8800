/**
 * Store Configuration
 *
 * Reads the driver choice and pool sizing from the environment once at
 * start-up.
 */

import { EnvSchemas, EnvValidationError, parseEnv, z, type Env } from '@quarry/config';
import type { PoolOptions } from './pool.js';

export const StoreEnvSchema = z
	.object({
		DATABASE_PROVIDER: z.enum(['postgres', 'embedded']).default('postgres'),
		DATABASE_URL: z.string().min(1).optional(),
		DB_POOL_MIN_SIZE: EnvSchemas.integer(1),
		DB_POOL_MAX_SIZE: EnvSchemas.integer(10, 1),
		DB_POOL_MAX_OVERFLOW: EnvSchemas.integer(5),
		DB_POOL_ACQUIRE_TIMEOUT_MS: EnvSchemas.integer(30_000, 1),
		DB_POOL_HEALTH_CHECK_ON_RELEASE: EnvSchemas.flag(true),
		DB_POOL_SHUTDOWN_GRACE_MS: EnvSchemas.integer(10_000),
		DB_CONNECT_TIMEOUT_SECONDS: EnvSchemas.integer(30, 1),
		DB_DEBUG: EnvSchemas.flag(false),
	})
	.refine((env) => env.DATABASE_PROVIDER !== 'postgres' || env.DATABASE_URL !== undefined, {
		error: 'Required when DATABASE_PROVIDER is postgres',
		path: ['DATABASE_URL'],
	})
	.refine((env) => env.DB_POOL_MIN_SIZE <= env.DB_POOL_MAX_SIZE, {
		error: 'Must not exceed DB_POOL_MAX_SIZE',
		path: ['DB_POOL_MIN_SIZE'],
	});

export interface PostgresStoreConfig {
	readonly provider: 'postgres';
	readonly url: string;
	readonly connectTimeout: number;
	readonly debug: boolean;
	readonly pool: PoolOptions;
}

export interface EmbeddedStoreSettings {
	readonly provider: 'embedded';
	/** PGlite data directory, `memory://` when DATABASE_URL is unset */
	readonly dataDir: string;
	readonly pool: PoolOptions;
}

export type StoreConfig = PostgresStoreConfig | EmbeddedStoreSettings;

/**
 * Load store configuration from environment variables.
 *
 * @throws Error listing every invalid variable
 */
export function loadStoreConfig(env: Env = process.env): StoreConfig {
	const parsed = parseEnv(StoreEnvSchema, env);

	const pool: PoolOptions = {
		minSize: parsed.DB_POOL_MIN_SIZE,
		maxSize: parsed.DB_POOL_MAX_SIZE,
		maxOverflow: parsed.DB_POOL_MAX_OVERFLOW,
		acquireTimeoutMs: parsed.DB_POOL_ACQUIRE_TIMEOUT_MS,
		healthCheckOnRelease: parsed.DB_POOL_HEALTH_CHECK_ON_RELEASE,
		shutdownGraceMs: parsed.DB_POOL_SHUTDOWN_GRACE_MS,
	};

	if (parsed.DATABASE_PROVIDER === 'embedded') {
		return { provider: 'embedded', dataDir: parsed.DATABASE_URL ?? 'memory://', pool };
	}

	if (parsed.DATABASE_URL === undefined) {
		throw new EnvValidationError({ DATABASE_URL: ['Required when DATABASE_PROVIDER is postgres'] });
	}

	return {
		provider: 'postgres',
		url: parsed.DATABASE_URL,
		connectTimeout: parsed.DB_CONNECT_TIMEOUT_SECONDS,
		debug: parsed.DB_DEBUG,
		pool,
	};
}
