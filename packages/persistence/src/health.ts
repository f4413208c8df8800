/**
 * Store health for readiness/liveness endpoints.
 */

import type { PoolableConnection } from './connection.js';
import type { ConnectionPool, HealthCheckRecord, PoolStats } from './pool.js';

export interface StoreHealthOptions {
	/** Acquire and ping a connection instead of trusting the last result */
	readonly probe?: boolean;
	readonly signal?: AbortSignal;
}

export interface StoreHealthResult {
	healthy: boolean;
	pool: PoolStats;
	issues: string[];
	checkedAt: Date;
}

export async function checkStoreHealth<TConnection extends PoolableConnection>(
	pool: ConnectionPool<TConnection>,
	options: StoreHealthOptions = {},
): Promise<StoreHealthResult> {
	const issues: string[] = [];

	let probe: HealthCheckRecord | null = null;
	if (options.probe) {
		probe = await pool.probe(options.signal ? { signal: options.signal } : {});
	}

	const stats = pool.stats();

	if (stats.closed) {
		issues.push('Connection pool is shut down');
	}
	if (probe && !probe.ok) {
		issues.push(`Store probe failed: ${probe.error ?? 'unknown error'}`);
	} else if (!probe && stats.lastHealthCheck && !stats.lastHealthCheck.ok) {
		issues.push(`Last health check failed: ${stats.lastHealthCheck.error ?? 'unknown error'}`);
	}
	if (stats.waiting > 0 && stats.checkedOut >= stats.maxSize + stats.maxOverflow) {
		issues.push(`Pool saturated: ${stats.waiting} caller(s) waiting for a connection`);
	}

	return {
		healthy: issues.length === 0,
		pool: stats,
		issues,
		checkedAt: new Date(),
	};
}
