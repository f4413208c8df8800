/**
 * Store
 *
 * Wires a driver, a connection pool and a session manager from a
 * StoreConfig. Applications build one Store at start-up and close it on
 * exit.
 */

import type { Logger } from '@quarry/logging';
import { createPostgresConnectionFactory, type ConnectionFactory, type StoreConnection } from './connection.js';
import type { StoreConfig } from './config.js';
import { createEmbeddedStore } from './embedded.js';
import { ConnectionPool } from './pool.js';
import { SessionManager } from './session-manager.js';

export interface Store {
	readonly pool: ConnectionPool<StoreConnection>;
	readonly sessions: SessionManager;
	/** Drain the pool, then shut the driver down */
	close(): Promise<void>;
}

/**
 * Create and initialize a store.
 *
 * @throws StoreUnavailableError if the first `minSize` connections cannot be opened
 *
 * @example
 * ```typescript
 * const store = await createStore(loadStoreConfig(), logger);
 * process.on('SIGTERM', () => store.close());
 * ```
 */
export async function createStore(config: StoreConfig, logger: Logger): Promise<Store> {
	let factory: ConnectionFactory<StoreConnection>;
	let closeDriver: () => Promise<void> = async () => {};

	if (config.provider === 'embedded') {
		const embedded = await createEmbeddedStore({ dataDir: config.dataDir }, logger);
		factory = embedded.factory;
		closeDriver = () => embedded.close();
	} else {
		factory = createPostgresConnectionFactory(
			{ url: config.url, connectTimeout: config.connectTimeout, debug: config.debug },
			logger,
		);
	}

	const pool = new ConnectionPool(factory, config.pool, logger);
	try {
		await pool.init();
	} catch (error) {
		await pool.shutdown();
		await closeDriver();
		throw error;
	}

	return {
		pool,
		sessions: new SessionManager(pool, logger),
		async close() {
			await pool.shutdown();
			await closeDriver();
		},
	};
}
