import { describe, it, expect, vi } from 'vitest';
import { drizzle } from 'drizzle-orm/pg-proxy';
import { createSilentLogger } from '@quarry/logging';
import type { StoreConnection, StoreDatabase } from '../connection.js';
import { SessionAlreadyClosedError, SessionRollbackOnlyError } from '../errors.js';
import { Session } from '../session.js';

function createConnection(overrides: Partial<Pick<StoreConnection, 'commit' | 'rollback'>> = {}) {
	const db: StoreDatabase = drizzle(async () => ({ rows: [] }));
	const connection = {
		id: 7,
		db,
		begin: vi.fn(async () => {}),
		commit: vi.fn(overrides.commit ?? (async () => {})),
		rollback: vi.fn(overrides.rollback ?? (async () => {})),
		runScript: vi.fn(async (_script: string) => {}),
		ping: vi.fn(async () => {}),
		close: vi.fn(async () => {}),
	} satisfies StoreConnection;
	const release = vi.fn(async (_connection: StoreConnection) => {});
	const session = new Session(connection, release, 'corr-1', createSilentLogger());
	return { connection, release, session };
}

describe('Session', () => {
	it('should commit once and release the connection', async () => {
		const { connection, release, session } = createConnection();

		await session.commit();

		expect(connection.commit).toHaveBeenCalledTimes(1);
		expect(release).toHaveBeenCalledWith(connection);
		expect(session.status).toBe('committed');
	});

	it('should refuse a second finalize', async () => {
		const { release, session } = createConnection();
		await session.commit();

		await expect(session.commit()).rejects.toBeInstanceOf(SessionAlreadyClosedError);
		await expect(session.rollback()).rejects.toThrow(`Session ${session.id} is already committed`);
		expect(release).toHaveBeenCalledTimes(1);
	});

	it('should refuse store access after finalize', async () => {
		const { session } = createConnection();
		await session.rollback();

		expect(() => session.db).toThrow(SessionAlreadyClosedError);
		expect(() => session.recordWrite()).toThrow(SessionAlreadyClosedError);
		await expect(session.runScript('select 1')).rejects.toBeInstanceOf(SessionAlreadyClosedError);
	});

	it('should roll back and release when commit fails', async () => {
		const { connection, release, session } = createConnection({
			commit: async () => {
				throw new Error('could not serialize access');
			},
		});

		await expect(session.commit()).rejects.toThrow('could not serialize access');

		expect(connection.rollback).toHaveBeenCalledTimes(1);
		expect(release).toHaveBeenCalledTimes(1);
		expect(session.status).toBe('rolled_back');
	});

	it('should release even when rollback fails', async () => {
		const { release, session } = createConnection({
			rollback: async () => {
				throw new Error('connection lost');
			},
		});

		await expect(session.rollback()).rejects.toThrow('connection lost');

		expect(release).toHaveBeenCalledTimes(1);
		expect(session.status).toBe('rolled_back');
	});

	it('should count recorded writes', () => {
		const { session } = createConnection();

		session.recordWrite();
		session.recordWrite(3);

		expect(session.pendingWrites).toBe(4);
		expect(session.connectionId).toBe(7);
		expect(session.correlationId).toBe('corr-1');
	});

	it('should roll back instead of committing once marked rollback-only', async () => {
		const { connection, release, session } = createConnection();

		session.markRollbackOnly('INVALID_PASSWORD');
		session.markRollbackOnly('later reason');
		const error = await session.commit().catch((caught: unknown) => caught);

		expect(error).toBeInstanceOf(SessionRollbackOnlyError);
		expect(error).toMatchObject({
			code: 'SESSION_ROLLBACK_ONLY',
			message: `Session ${session.id} was rolled back: INVALID_PASSWORD`,
		});
		expect(connection.commit).not.toHaveBeenCalled();
		expect(connection.rollback).toHaveBeenCalledTimes(1);
		expect(release).toHaveBeenCalledTimes(1);
		expect(session.status).toBe('rolled_back');
	});
});
