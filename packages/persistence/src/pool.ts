/**
 * Connection Pool
 *
 * Bounded set of store connections shared by every request in the process.
 * Constructed once at start-up, `init()`-ed, and `shutdown()` once at exit;
 * nothing in the package holds a global instance.
 *
 * Capacity is `maxSize + maxOverflow`. Connections opened while the pool
 * already holds `maxSize` are overflow connections: they serve bursts and are
 * closed as soon as they are released with nobody waiting.
 *
 * Bookkeeping (idle list, checked-out set, opening count, waiter queue) is
 * only mutated synchronously between awaits, and a capacity slot is reserved
 * before the factory is awaited, so concurrent callers never see a torn state.
 */

import { componentLogger, type Logger } from '@quarry/logging';
import type { ConnectionFactory, PoolableConnection } from './connection.js';
import {
	ConnectionNotCheckedOutError,
	ConnectionUnhealthyError,
	PoolClosedError,
	PoolExhaustedError,
	StoreUnavailableError,
} from './errors.js';

export interface PoolOptions {
	/** Connections opened by init() and kept open (default: 1) */
	readonly minSize?: number;
	/** Steady-state capacity (default: 10) */
	readonly maxSize?: number;
	/** Extra connections allowed under burst load (default: 5) */
	readonly maxOverflow?: number;
	/** How long acquire() waits for capacity (default: 30000) */
	readonly acquireTimeoutMs?: number;
	/** Ping connections on release and replace broken ones (default: true) */
	readonly healthCheckOnRelease?: boolean;
	/** How long shutdown() waits for checked-out connections (default: 10000) */
	readonly shutdownGraceMs?: number;
}

export type ResolvedPoolOptions = Required<PoolOptions>;

export const DEFAULT_POOL_OPTIONS: ResolvedPoolOptions = {
	minSize: 1,
	maxSize: 10,
	maxOverflow: 5,
	acquireTimeoutMs: 30_000,
	healthCheckOnRelease: true,
	shutdownGraceMs: 10_000,
};

export interface AcquireOptions {
	/** Abandon the wait when this signal aborts */
	readonly signal?: AbortSignal;
}

/**
 * Outcome of the most recent liveness check.
 */
export interface HealthCheckRecord {
	readonly ok: boolean;
	readonly checkedAt: Date;
	/** Connection that was checked, null when none could be opened */
	readonly connectionId: number | null;
	readonly error?: string;
}

export interface PoolStats {
	readonly idle: number;
	readonly checkedOut: number;
	readonly overflow: number;
	readonly waiting: number;
	readonly opening: number;
	readonly total: number;
	readonly maxSize: number;
	readonly maxOverflow: number;
	readonly closed: boolean;
	readonly lastHealthCheck: HealthCheckRecord | null;
}

interface Waiter<TConnection> {
	deliver(connection: TConnection): void;
	fail(error: unknown): void;
}

function resolveOptions(options: PoolOptions): ResolvedPoolOptions {
	const resolved: ResolvedPoolOptions = { ...DEFAULT_POOL_OPTIONS, ...options };

	if (!Number.isInteger(resolved.maxSize) || resolved.maxSize < 1) {
		throw new RangeError(`maxSize must be a positive integer, got ${resolved.maxSize}`);
	}
	if (!Number.isInteger(resolved.minSize) || resolved.minSize < 0 || resolved.minSize > resolved.maxSize) {
		throw new RangeError(`minSize must be between 0 and maxSize (${resolved.maxSize}), got ${resolved.minSize}`);
	}
	if (!Number.isInteger(resolved.maxOverflow) || resolved.maxOverflow < 0) {
		throw new RangeError(`maxOverflow must be a non-negative integer, got ${resolved.maxOverflow}`);
	}
	if (!(resolved.acquireTimeoutMs > 0)) {
		throw new RangeError(`acquireTimeoutMs must be positive, got ${resolved.acquireTimeoutMs}`);
	}
	if (!(resolved.shutdownGraceMs >= 0)) {
		throw new RangeError(`shutdownGraceMs must not be negative, got ${resolved.shutdownGraceMs}`);
	}

	return resolved;
}

function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export class ConnectionPool<TConnection extends PoolableConnection> {
	readonly options: ResolvedPoolOptions;

	private readonly logger: Logger;
	private readonly idle: TConnection[] = [];
	private readonly checkedOut = new Set<TConnection>();
	private readonly overflow = new Set<TConnection>();
	private readonly forceClosed = new WeakSet<TConnection>();
	private readonly waiters: Waiter<TConnection>[] = [];
	private opening = 0;
	private nextId = 1;
	private initialized = false;
	private closing = false;
	private shutdownPromise: Promise<void> | null = null;
	private onDrained: (() => void) | null = null;
	private lastHealthCheck: HealthCheckRecord | null = null;

	constructor(
		private readonly factory: ConnectionFactory<TConnection>,
		options: PoolOptions,
		logger: Logger,
	) {
		this.options = resolveOptions(options);
		this.logger = componentLogger(logger, 'ConnectionPool');
	}

	/**
	 * Maximum number of connections that can exist at once.
	 */
	get capacity(): number {
		return this.options.maxSize + this.options.maxOverflow;
	}

	private get total(): number {
		return this.idle.length + this.checkedOut.size + this.opening;
	}

	/**
	 * Open `minSize` connections. Subsequent calls are no-ops.
	 *
	 * @throws StoreUnavailableError if the store cannot be reached
	 */
	async init(): Promise<void> {
		if (this.initialized) return;
		if (this.closing) throw new PoolClosedError();
		this.initialized = true;

		const missing = Math.max(0, this.options.minSize - this.total);
		const opened = await Promise.all(Array.from({ length: missing }, () => this.openConnection()));
		for (const connection of opened) {
			if (!this.handOff(connection)) {
				this.idle.push(connection);
			}
		}

		this.logger.info(
			{
				minSize: this.options.minSize,
				maxSize: this.options.maxSize,
				maxOverflow: this.options.maxOverflow,
			},
			'Connection pool initialized',
		);
	}

	/**
	 * Check out a connection.
	 *
	 * Returns an idle connection when there is one, opens a new one while
	 * below capacity, and otherwise waits in FIFO order.
	 *
	 * @throws PoolExhaustedError if nothing frees up within `acquireTimeoutMs`
	 * @throws StoreUnavailableError if a new connection cannot be opened
	 * @throws PoolClosedError once shutdown has begun
	 * @throws the signal's reason if `options.signal` aborts first
	 */
	async acquire(options: AcquireOptions = {}): Promise<TConnection> {
		if (this.closing) throw new PoolClosedError();
		options.signal?.throwIfAborted();

		const idle = this.idle.pop();
		if (idle) {
			this.checkedOut.add(idle);
			return idle;
		}

		if (this.total < this.capacity) {
			const connection = await this.openConnection();
			this.checkedOut.add(connection);
			return connection;
		}

		return this.waitForConnection(options.signal);
	}

	/**
	 * Return a checked-out connection.
	 *
	 * With `healthCheckOnRelease`, the connection is pinged first; a broken
	 * connection is closed and replaced rather than recycled.
	 */
	async release(connection: TConnection): Promise<void> {
		if (this.forceClosed.has(connection)) {
			this.logger.warn({ connectionId: connection.id }, 'Connection released after forced close');
			return;
		}
		if (!this.checkedOut.has(connection)) {
			throw new ConnectionNotCheckedOutError(connection.id);
		}

		if (!this.closing && this.options.healthCheckOnRelease) {
			const { ok } = await this.checkHealth(connection);
			if (!ok) {
				this.checkedOut.delete(connection);
				await this.discard(connection);
				this.notifyDrained();
				await this.replenish();
				return;
			}
		}

		await this.returnConnection(connection);
	}

	/**
	 * Actively check the store: acquire a connection, ping it and put it back.
	 * Never throws; the outcome is recorded and returned.
	 */
	async probe(options: AcquireOptions = {}): Promise<HealthCheckRecord> {
		let connection: TConnection;
		try {
			connection = await this.acquire(options);
		} catch (error) {
			return this.recordHealth(null, error);
		}

		const record = await this.checkHealth(connection);
		if (record.ok) {
			await this.returnConnection(connection);
		} else {
			this.checkedOut.delete(connection);
			await this.discard(connection);
			this.notifyDrained();
			await this.replenish();
		}
		return record;
	}

	/**
	 * Snapshot of the pool for readiness/liveness probes.
	 */
	stats(): PoolStats {
		return {
			idle: this.idle.length,
			checkedOut: this.checkedOut.size,
			overflow: this.overflow.size,
			waiting: this.waiters.length,
			opening: this.opening,
			total: this.total,
			maxSize: this.options.maxSize,
			maxOverflow: this.options.maxOverflow,
			closed: this.closing,
			lastHealthCheck: this.lastHealthCheck,
		};
	}

	/**
	 * Drain the pool: fail waiters, close idle connections, give checked-out
	 * connections `shutdownGraceMs` to come back, then force-close the rest.
	 */
	shutdown(): Promise<void> {
		if (!this.shutdownPromise) {
			this.shutdownPromise = this.drain();
		}
		return this.shutdownPromise;
	}

	private async drain(): Promise<void> {
		this.closing = true;
		this.logger.info({ checkedOut: this.checkedOut.size, idle: this.idle.length }, 'Shutting down connection pool');

		for (const waiter of this.waiters.splice(0)) {
			waiter.fail(new PoolClosedError());
		}

		await Promise.all(this.idle.splice(0).map((connection) => this.discard(connection)));

		if (this.checkedOut.size > 0) {
			await new Promise<void>((resolve) => {
				const timer = setTimeout(resolve, this.options.shutdownGraceMs);
				this.onDrained = () => {
					clearTimeout(timer);
					resolve();
				};
			});
			this.onDrained = null;
		}

		const remaining = [...this.checkedOut];
		this.checkedOut.clear();
		if (remaining.length > 0) {
			this.logger.warn(
				{ connectionIds: remaining.map((connection) => connection.id) },
				'Force-closing connections still checked out after grace period',
			);
			for (const connection of remaining) {
				this.forceClosed.add(connection);
			}
			await Promise.all(remaining.map((connection) => this.discard(connection)));
		}

		this.logger.info('Connection pool shut down');
	}

	/**
	 * Open a connection, reserving its capacity slot up front. The caller
	 * decides where the connection goes.
	 */
	private async openConnection(): Promise<TConnection> {
		const isOverflow = this.total >= this.options.maxSize;
		const id = this.nextId++;
		this.opening++;

		let connection: TConnection;
		try {
			connection = await this.factory.create(id);
		} catch (error) {
			this.opening--;
			if (error instanceof StoreUnavailableError) throw error;
			throw new StoreUnavailableError(`Could not open connection ${id}: ${describeError(error)}`, error);
		}
		this.opening--;

		if (this.closing) {
			await this.closeQuietly(connection);
			throw new PoolClosedError();
		}

		if (isOverflow) {
			this.overflow.add(connection);
			this.logger.debug({ connectionId: id, overflow: this.overflow.size }, 'Opened overflow connection');
		}
		return connection;
	}

	private waitForConnection(signal: AbortSignal | undefined): Promise<TConnection> {
		return new Promise<TConnection>((resolve, reject) => {
			const timeoutMs = this.options.acquireTimeoutMs;

			const cleanup = (): void => {
				clearTimeout(timer);
				signal?.removeEventListener('abort', onAbort);
				const index = this.waiters.indexOf(waiter);
				if (index >= 0) {
					this.waiters.splice(index, 1);
				}
			};

			const waiter: Waiter<TConnection> = {
				deliver: (connection) => {
					cleanup();
					resolve(connection);
				},
				fail: (error) => {
					cleanup();
					reject(error);
				},
			};

			const onAbort = (): void => {
				waiter.fail(signal?.reason);
			};

			const timer = setTimeout(() => {
				this.logger.warn({ timeoutMs, capacity: this.capacity, waiting: this.waiters.length }, 'Pool exhausted');
				waiter.fail(new PoolExhaustedError(timeoutMs, this.capacity));
			}, timeoutMs);

			signal?.addEventListener('abort', onAbort, { once: true });
			this.waiters.push(waiter);
		});
	}

	/**
	 * Give a connection to the longest-waiting caller. The connection counts
	 * as checked out from here on.
	 */
	private handOff(connection: TConnection): boolean {
		const waiter = this.waiters[0];
		if (!waiter) return false;

		this.checkedOut.add(connection);
		waiter.deliver(connection);
		return true;
	}

	private async returnConnection(connection: TConnection): Promise<void> {
		if (this.closing) {
			this.checkedOut.delete(connection);
			await this.discard(connection);
			this.notifyDrained();
			return;
		}

		if (this.handOff(connection)) return;

		this.checkedOut.delete(connection);
		if (this.overflow.has(connection)) {
			await this.discard(connection);
			return;
		}
		this.idle.push(connection);
	}

	/**
	 * Open connections for waiting callers, or to get back to `minSize`.
	 * A failure is recorded and logged; the next acquire() will retry and
	 * surface StoreUnavailableError.
	 */
	private async replenish(): Promise<void> {
		while (
			!this.closing &&
			this.total < this.capacity &&
			(this.waiters.length > 0 || this.total < this.options.minSize)
		) {
			let connection: TConnection;
			try {
				connection = await this.openConnection();
			} catch (error) {
				if (error instanceof PoolClosedError) return;
				this.logger.error({ err: error }, 'Could not open replacement connection');
				this.recordHealth(null, error);
				return;
			}

			if (!this.handOff(connection)) {
				this.idle.push(connection);
			}
		}
	}

	private async checkHealth(connection: TConnection): Promise<HealthCheckRecord> {
		try {
			await connection.ping();
			return this.recordHealth(connection.id, null);
		} catch (error) {
			const unhealthy = new ConnectionUnhealthyError(connection.id, error);
			this.logger.warn({ err: unhealthy, connectionId: connection.id }, 'Discarding unhealthy connection');
			return this.recordHealth(connection.id, unhealthy);
		}
	}

	private recordHealth(connectionId: number | null, error: unknown): HealthCheckRecord {
		const record: HealthCheckRecord =
			error === null
				? { ok: true, checkedAt: new Date(), connectionId }
				: { ok: false, checkedAt: new Date(), connectionId, error: describeError(error) };
		this.lastHealthCheck = record;
		return record;
	}

	private async discard(connection: TConnection): Promise<void> {
		this.overflow.delete(connection);
		await this.closeQuietly(connection);
	}

	private async closeQuietly(connection: TConnection): Promise<void> {
		try {
			await connection.close();
		} catch (error) {
			this.logger.warn({ err: error, connectionId: connection.id }, 'Error closing connection');
		}
	}

	private notifyDrained(): void {
		if (this.closing && this.checkedOut.size === 0) {
			this.onDrained?.();
		}
	}
}
