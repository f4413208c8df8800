import { describe, it, expect } from 'vitest';
import { checkStoreHealth } from '../health.js';
import { createFakePool } from './fixtures/store.js';

describe('checkStoreHealth', () => {
	it('should report a fresh pool as healthy', async () => {
		const { pool } = createFakePool({ minSize: 1 });
		await pool.init();

		const health = await checkStoreHealth(pool);

		expect(health.healthy).toBe(true);
		expect(health.issues).toEqual([]);
		expect(health.pool).toMatchObject({ idle: 1, total: 1, lastHealthCheck: null });
		expect(health.checkedAt).toBeInstanceOf(Date);
	});

	it('should report a failed health check', async () => {
		const { pool } = createFakePool({ minSize: 1 });
		await pool.init();
		const connection = await pool.acquire();
		connection.healthy = false;
		await pool.release(connection);

		const health = await checkStoreHealth(pool);

		expect(health.healthy).toBe(false);
		expect(health.issues).toEqual(['Last health check failed: Connection 1 failed its health check']);
	});

	it('should probe the store when asked', async () => {
		const { factory, pool } = createFakePool({ minSize: 1 });
		await pool.init();

		expect((await checkStoreHealth(pool, { probe: true })).healthy).toBe(true);

		const [connection] = factory.created;
		if (connection) connection.healthy = false;
		const health = await checkStoreHealth(pool, { probe: true });

		expect(health.healthy).toBe(false);
		expect(health.issues).toEqual(['Store probe failed: Connection 1 failed its health check']);
	});

	it('should report a saturated pool', async () => {
		const { pool } = createFakePool({ maxSize: 1, maxOverflow: 0 });
		const held = await pool.acquire();
		const waiting = pool.acquire();

		const health = await checkStoreHealth(pool);

		expect(health.issues).toEqual(['Pool saturated: 1 caller(s) waiting for a connection']);
		await pool.release(held);
		await pool.release(await waiting);
	});

	it('should report a shut down pool', async () => {
		const { pool } = createFakePool();
		await pool.shutdown();

		const health = await checkStoreHealth(pool);

		expect(health.healthy).toBe(false);
		expect(health.issues).toEqual(['Connection pool is shut down']);
	});
});
