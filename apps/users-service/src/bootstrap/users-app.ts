/**
 * Users App
 *
 * Wires the store, the migration tracker and the user operations from
 * configuration. Entry points (the CLI, tests, an HTTP layer) build one
 * UsersApp and close it when they are done.
 */

import { statSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Logger } from '@quarry/logging';
import {
	createStore,
	loadMigrations,
	MigrationTracker,
	type Store,
	type StoreConfig,
} from '@quarry/persistence';

import { createUserOperations, type UserOperations } from '../application/index.js';
import { PasswordService, type PasswordHashOptions } from '../infrastructure/crypto/password-service.js';
import { createUserRepository } from '../infrastructure/persistence/index.js';

/**
 * The nearest `migrations/` directory above `from`. The service runs both
 * from src/bootstrap/ and bundled into dist/, so the depth varies.
 *
 * @throws Error if no parent directory has one
 */
export function findMigrationsDir(from: string | URL = import.meta.url): string {
	const start = dirname(fileURLToPath(from));
	let dir = start;
	for (;;) {
		const candidate = join(dir, 'migrations');
		if (statSync(candidate, { throwIfNoEntry: false })?.isDirectory()) {
			return candidate;
		}
		const parent = dirname(dir);
		if (parent === dir) {
			throw new Error(`No migrations directory above ${start}`);
		}
		dir = parent;
	}
}

export interface UsersAppConfig {
	readonly store: StoreConfig;
	readonly logger: Logger;
	/** Default: the service's own migrations/ directory */
	readonly migrationsDir?: string;
	readonly strictMigrations?: boolean;
	readonly passwordHashing?: Partial<PasswordHashOptions>;
}

export interface UsersApp {
	readonly store: Store;
	readonly migrations: MigrationTracker;
	readonly users: UserOperations;
	close(): Promise<void>;
}

export async function createUsersApp(config: UsersAppConfig): Promise<UsersApp> {
	const { logger } = config;
	const migrationScripts = await loadMigrations(config.migrationsDir ?? findMigrationsDir());
	const store = await createStore(config.store, logger);

	let migrations: MigrationTracker;
	try {
		migrations = new MigrationTracker(store.sessions, migrationScripts, {
			strict: config.strictMigrations ?? true,
			logger,
		});
	} catch (error) {
		await store.close();
		throw error;
	}

	const users = createUserOperations({
		sessions: store.sessions,
		userRepository: createUserRepository(),
		passwordService: new PasswordService(config.passwordHashing),
		logger,
	});

	logger.info({ provider: config.store.provider, migrations: migrationScripts.length }, 'Users app ready');

	return {
		store,
		migrations,
		users,
		close: () => store.close(),
	};
}
