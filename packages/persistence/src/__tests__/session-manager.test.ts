import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { PoolExhaustedError, SessionAlreadyClosedError, SessionRollbackOnlyError } from '../errors.js';
import type { Session } from '../session.js';
import { createTestStore, createWidgetRepository, createWidgetStore, type TestStore } from './fixtures/store.js';

describe('SessionManager', () => {
	let store: TestStore;
	const widgets = createWidgetRepository();

	beforeAll(async () => {
		store = await createWidgetStore();
	});

	afterAll(async () => {
		await store.close();
	});

	beforeEach(async () => {
		await store.sessions.run((session) => session.runScript('truncate widgets restart identity'));
	});

	async function countWidgets(): Promise<number> {
		return store.sessions.run((session) => widgets.count(session));
	}

	it('should commit when the work resolves', async () => {
		const created = await store.sessions.run((session) => widgets.create(session, { sku: 'W-1', name: 'Bolt' }));

		expect(created.id).toBe(1);
		expect(await countWidgets()).toBe(1);
		expect(store.pool.stats().checkedOut).toBe(0);
	});

	it('should roll back and rethrow when the work throws', async () => {
		const failing = store.sessions.run(async (session) => {
			await widgets.create(session, { sku: 'W-1', name: 'Bolt' });
			throw new Error('validation failed downstream');
		});

		await expect(failing).rejects.toThrow('validation failed downstream');
		expect(await countWidgets()).toBe(0);
		expect(store.pool.stats().checkedOut).toBe(0);
	});

	it('should reuse the enclosing session for nested runs', async () => {
		await store.sessions.run(async (outer) => {
			const inner = await store.sessions.run(async (session) => session);

			expect(inner).toBe(outer);
			expect(store.sessions.current()).toBe(outer);
			expect(store.pool.stats().checkedOut).toBe(1);
		});

		expect(store.sessions.current()).toBeNull();
	});

	it('should fail a nested run whose session was already finalized', async () => {
		let escaped: Promise<Session> | undefined;

		await store.sessions.run(async () => {
			escaped = new Promise((resolve, reject) => {
				setTimeout(() => {
					store.sessions.run(async (session) => session).then(resolve, reject);
				}, 20);
			});
		});

		await expect(escaped).rejects.toBeInstanceOf(SessionAlreadyClosedError);
	});

	it('should hand out open sessions that finalize exactly once', async () => {
		const session = await store.sessions.open({ correlationId: 'corr-open' });
		await widgets.create(session, { sku: 'W-1', name: 'Bolt' });
		await session.commit();

		expect(session.correlationId).toBe('corr-open');
		expect(session.pendingWrites).toBe(1);
		await expect(session.commit()).rejects.toBeInstanceOf(SessionAlreadyClosedError);
		expect(await countWidgets()).toBe(1);
	});

	it('should roll back and release when the signal aborts mid-work', async () => {
		const controller = new AbortController();

		const running = store.sessions.run(
			async (session) => {
				await widgets.create(session, { sku: 'W-1', name: 'Bolt' });
				controller.abort(new Error('request cancelled'));
				await new Promise((resolve) => setTimeout(resolve, 20));
				return widgets.create(session, { sku: 'W-2', name: 'Nut' });
			},
			{ signal: controller.signal },
		);

		await expect(running).rejects.toThrow('request cancelled');
		expect(store.pool.stats().checkedOut).toBe(0);

		await new Promise((resolve) => setTimeout(resolve, 40));
		expect(await countWidgets()).toBe(0);
	});

	it('should not open a session for an already aborted signal', async () => {
		await expect(
			store.sessions.run(async () => 'never', { signal: AbortSignal.abort(new Error('gone')) }),
		).rejects.toThrow('gone');
		expect(store.pool.stats().checkedOut).toBe(0);
	});

	it('should roll back a run whose session was marked rollback-only', async () => {
		const running = store.sessions.run(async (session) => {
			await widgets.create(session, { sku: 'W-1', name: 'Bolt' });
			session.markRollbackOnly('NESTED_FAILURE');
			return 'done';
		});

		await expect(running).rejects.toBeInstanceOf(SessionRollbackOnlyError);
		expect(await countWidgets()).toBe(0);
		expect(store.pool.stats().checkedOut).toBe(0);
	});
});

describe('SessionManager on the embedded store', () => {
	it('should bound the wait for the transaction gate by the acquire timeout', async () => {
		const small = await createTestStore({ maxSize: 2, acquireTimeoutMs: 100 });
		const held = await small.sessions.open();

		try {
			const started = Date.now();
			const error = await small.sessions.open().catch((caught: unknown) => caught);
			const elapsed = Date.now() - started;

			expect(error).toBeInstanceOf(PoolExhaustedError);
			expect(error).toMatchObject({ timeoutMs: 100, capacity: 2 });
			expect(elapsed).toBeLessThan(1000);
			expect(small.pool.stats()).toMatchObject({ checkedOut: 1, idle: 1 });
		} finally {
			await held.rollback();
			await small.close();
		}
	});

	it('should stop waiting for the transaction gate when the signal aborts', async () => {
		const small = await createTestStore({ maxSize: 2 });
		const held = await small.sessions.open();
		const controller = new AbortController();

		try {
			const waiting = small.sessions.open({ signal: controller.signal });
			setTimeout(() => controller.abort(new Error('client went away')), 10);

			await expect(waiting).rejects.toThrow('client went away');
			expect(small.pool.stats().checkedOut).toBe(1);
		} finally {
			await held.rollback();
			await small.close();
		}
	});
});
