/**
 * Embedded Store
 *
 * In-process PostgreSQL (PGlite) for local development and tests. All
 * connections handed out by the store share one PGlite instance, which has a
 * single backend; transactions are therefore serialized through a gate held
 * from BEGIN until COMMIT/ROLLBACK. Waiting for the gate is bounded like a
 * pool acquire: by the session's remaining acquire timeout and its signal.
 * Isolation is stricter than read-committed but the visibility rules callers
 * rely on still hold.
 */

import { PGlite } from '@electric-sql/pglite';
import { drizzle } from 'drizzle-orm/pglite';
import { componentLogger, type Logger } from '@quarry/logging';
import type { BeginOptions, ConnectionFactory, StoreConnection, StoreDatabase } from './connection.js';
import { PoolExhaustedError, StoreUnavailableError } from './errors.js';

interface GateWaiter {
	grant(): void;
}

/**
 * Single-permit gate with FIFO hand-off.
 */
export class TransactionGate {
	private held = false;
	private readonly waiting: GateWaiter[] = [];

	get isHeld(): boolean {
		return this.held;
	}

	get pendingCount(): number {
		return this.waiting.length;
	}

	/**
	 * Take the permit, waiting behind earlier callers.
	 *
	 * @throws PoolExhaustedError if the permit is not granted within `timeoutMs`
	 * @throws the signal's reason if `signal` aborts first
	 */
	async acquire(options: BeginOptions = {}): Promise<void> {
		const { signal, timeoutMs } = options;
		signal?.throwIfAborted();

		if (!this.held) {
			this.held = true;
			return;
		}

		return new Promise<void>((resolve, reject) => {
			let timer: NodeJS.Timeout | undefined;

			const leave = (): void => {
				const index = this.waiting.indexOf(waiter);
				if (index !== -1) this.waiting.splice(index, 1);
				if (timer) clearTimeout(timer);
				signal?.removeEventListener('abort', onAbort);
			};
			const onAbort = (): void => {
				leave();
				reject(signal?.reason);
			};
			const waiter: GateWaiter = {
				grant: () => {
					leave();
					resolve();
				},
			};

			this.waiting.push(waiter);
			signal?.addEventListener('abort', onAbort, { once: true });
			if (timeoutMs !== undefined) {
				timer = setTimeout(() => {
					leave();
					reject(new PoolExhaustedError(timeoutMs, 1));
				}, timeoutMs);
			}
		});
	}

	/**
	 * Release the gate; the next waiter (if any) receives it directly.
	 */
	release(): void {
		const next = this.waiting[0];
		if (next) {
			next.grant();
			return;
		}
		this.held = false;
	}
}

export interface EmbeddedStoreConfig {
	/** PGlite data directory, or `memory://` for an in-memory store */
	readonly dataDir?: string;
}

export interface EmbeddedStore {
	/** Connection factory to hand to a ConnectionPool */
	readonly factory: ConnectionFactory<StoreConnection>;
	/** Shut the embedded database down. Call after the pool has drained. */
	close(): Promise<void>;
}

class EmbeddedConnection implements StoreConnection {
	private inTransaction = false;

	constructor(
		readonly id: number,
		readonly db: StoreDatabase,
		private readonly client: PGlite,
		private readonly gate: TransactionGate,
	) {}

	async begin(options: BeginOptions = {}): Promise<void> {
		await this.gate.acquire(options);
		try {
			await this.client.exec('begin');
			this.inTransaction = true;
		} catch (error) {
			this.gate.release();
			throw error;
		}
	}

	async commit(): Promise<void> {
		await this.finish('commit');
	}

	async rollback(): Promise<void> {
		await this.finish('rollback');
	}

	async runScript(script: string): Promise<void> {
		await this.client.exec(script);
	}

	async ping(): Promise<void> {
		if (this.client.closed) {
			throw new StoreUnavailableError('Embedded store is closed');
		}
		await this.client.query('select 1');
	}

	async close(): Promise<void> {
		if (this.inTransaction) {
			await this.finish('rollback');
		}
	}

	private async finish(statement: 'commit' | 'rollback'): Promise<void> {
		if (!this.inTransaction) {
			throw new Error(`Connection ${this.id} has no open transaction to ${statement}`);
		}
		try {
			await this.client.exec(statement);
		} finally {
			this.inTransaction = false;
			this.gate.release();
		}
	}
}

/**
 * Create an embedded store.
 *
 * @example
 * ```typescript
 * const store = await createEmbeddedStore({ dataDir: 'memory://' }, logger);
 * const pool = new ConnectionPool(store.factory, { maxSize: 4 }, logger);
 * // ...
 * await pool.shutdown();
 * await store.close();
 * ```
 */
export async function createEmbeddedStore(config: EmbeddedStoreConfig, logger: Logger): Promise<EmbeddedStore> {
	const log = componentLogger(logger, 'EmbeddedStore');
	const dataDir = config.dataDir ?? 'memory://';

	const client = new PGlite(dataDir);
	await client.waitReady;
	const db: StoreDatabase = drizzle(client);
	const gate = new TransactionGate();

	log.info({ dataDir }, 'Embedded store ready');

	return {
		factory: {
			async create(id: number): Promise<StoreConnection> {
				if (client.closed) {
					throw new StoreUnavailableError('Embedded store is closed');
				}
				return new EmbeddedConnection(id, db, client, gate);
			},
		},
		async close() {
			if (!client.closed) {
				await client.close();
				log.info('Embedded store closed');
			}
		},
	};
}
