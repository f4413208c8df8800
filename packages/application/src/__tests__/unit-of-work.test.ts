import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { pgTable, serial, text, unique } from 'drizzle-orm/pg-core';
import { z } from 'zod/v4';
import { ExecutionContext, Result, UseCaseError, isFailure } from '@quarry/domain-core';
import { createSilentLogger } from '@quarry/logging';
import { createRepository, createStore, SessionRollbackOnlyError, type Store } from '@quarry/persistence';
import { createUnitOfWork, toUseCaseError, UnitOfWorkRollback } from '../unit-of-work.js';

const notes = pgTable('notes', { id: serial('id').primaryKey(), title: text('title').notNull() }, (table) => [
	unique('uq_notes_title').on(table.title),
]);

const noteSchema = z.object({ id: z.number().int(), title: z.string() });
type Note = z.infer<typeof noteSchema>;

const noteRepository = createRepository<Note, { title: string }>({
	name: 'Note',
	table: notes,
	schema: noteSchema,
	uniqueConstraints: { uq_notes_title: ['title'] },
});

const CREATE_NOTES = `
	create table notes (
		id serial primary key,
		title text not null,
		constraint uq_notes_title unique (title)
	)
`;

async function openStore(pool: { maxSize: number; acquireTimeoutMs?: number }): Promise<Store> {
	const store = await createStore(
		{ provider: 'embedded', dataDir: 'memory://', pool: { minSize: 0, maxOverflow: 0, ...pool } },
		createSilentLogger(),
	);
	await store.sessions.run((session) => session.runScript(CREATE_NOTES));
	return store;
}

describe('UnitOfWork', () => {
	const ctx = ExecutionContext.create('test-principal');
	let store: Store;

	beforeAll(async () => {
		store = await openStore({ maxSize: 2 });
	});

	afterAll(async () => {
		await store.close();
	});

	beforeEach(async () => {
		await store.sessions.run((session) => session.runScript('truncate notes restart identity'));
	});

	function unitOfWork() {
		return createUnitOfWork({ sessions: store.sessions, logger: createSilentLogger() });
	}

	function countNotes(): Promise<number> {
		return store.sessions.run((session) => noteRepository.count(session));
	}

	it('should commit and return the value as a success', async () => {
		const result = await unitOfWork().run(ctx, (session) => noteRepository.create(session, { title: 'First' }));

		expect(result).toEqual({ _tag: 'success', value: { id: 1, title: 'First' } });
		expect(await countNotes()).toBe(1);
	});

	it('should roll back when the work returns a failure', async () => {
		const result = await unitOfWork().run<Note>(ctx, async (session) => {
			await noteRepository.create(session, { title: 'Draft' });
			return Result.failure(UseCaseError.businessRule('DRAFTS_CLOSED', 'Drafts are closed'));
		});

		expect(result).toEqual({
			_tag: 'failure',
			error: { type: 'business_rule', code: 'DRAFTS_CLOSED', message: 'Drafts are closed', details: {} },
		});
		expect(await countNotes()).toBe(0);
	});

	it('should map a missing entity to not_found', async () => {
		const result = await unitOfWork().run(ctx, (session) => noteRepository.get(session, 7));

		expect(isFailure(result)).toBe(true);
		if (isFailure(result)) {
			expect(result.error).toEqual({
				type: 'not_found',
				code: 'NOT_FOUND',
				message: 'Note 7 not found',
				details: { entity: 'Note', id: 7 },
			});
		}
	});

	it('should map a duplicate to business_rule and roll back earlier writes', async () => {
		await unitOfWork().run(ctx, (session) => noteRepository.create(session, { title: 'Taken' }));

		const result = await unitOfWork().run(ctx, async (session) => {
			await noteRepository.create(session, { title: 'Fresh' });
			return noteRepository.create(session, { title: 'Taken' });
		});

		expect(isFailure(result)).toBe(true);
		if (isFailure(result)) {
			expect(result.error).toMatchObject({
				type: 'business_rule',
				code: 'UNIQUE_CONSTRAINT_VIOLATION',
				message: 'Note with the same title already exists',
				details: { entity: 'Note', constraint: 'uq_notes_title', fields: ['title'] },
			});
		}
		expect(await countNotes()).toBe(1);
	});

	it('should map an invalid query to validation', async () => {
		const unknownField = { title: 'Odd', colour: 'red' };

		const result = await unitOfWork().run(ctx, (session) => noteRepository.create(session, unknownField));

		expect(isFailure(result)).toBe(true);
		if (isFailure(result)) {
			expect(result.error).toMatchObject({ type: 'validation', code: 'INVALID_QUERY' });
		}
	});

	it('should rethrow errors it cannot map after rolling back', async () => {
		const run = unitOfWork().run(ctx, async (session) => {
			await noteRepository.create(session, { title: 'Doomed' });
			throw new Error('boom');
		});

		await expect(run).rejects.toThrow('boom');
		expect(await countNotes()).toBe(0);
	});

	describe('nested in an enclosing session', () => {
		it('should not let the enclosing run commit a failed nested operation', async () => {
			const running = store.sessions.run(() =>
				unitOfWork().run<Note>(ctx, async (session) => {
					await noteRepository.create(session, { title: 'Partial' });
					return Result.failure(UseCaseError.validation('TITLE_REJECTED', 'Title rejected'));
				}),
			);

			const error = await running.catch((caught: unknown) => caught);

			expect(error).toBeInstanceOf(UnitOfWorkRollback);
			expect(error).toMatchObject({ failure: { code: 'TITLE_REJECTED' } });
			expect(await countNotes()).toBe(0);
		});

		it('should return the nested failure from the outermost unit of work', async () => {
			const outer = unitOfWork();
			const inner = unitOfWork();

			const result = await outer.run<Note>(ctx, async (session) => {
				await noteRepository.create(session, { title: 'Outer' });
				await inner.run(ctx, (nested) => noteRepository.get(nested, 99));
				return noteRepository.create(session, { title: 'Never' });
			});

			expect(isFailure(result)).toBe(true);
			if (isFailure(result)) {
				expect(result.error).toMatchObject({ type: 'not_found', message: 'Note 99 not found' });
			}
			expect(await countNotes()).toBe(0);
		});

		it('should roll back even when the enclosing work swallows the nested failure', async () => {
			const running = store.sessions.run(async (session) => {
				await noteRepository.create(session, { title: 'Outer' });
				await unitOfWork()
					.run<Note>(ctx, async () => Result.failure(UseCaseError.businessRule('NOPE', 'Nope')))
					.catch(() => null);
				return 'ignored';
			});

			await expect(running).rejects.toBeInstanceOf(SessionRollbackOnlyError);
			expect(await countNotes()).toBe(0);
		});

		it('should commit a nested success with the enclosing session', async () => {
			const inner = await store.sessions.run(async (session) => {
				await noteRepository.create(session, { title: 'Outer' });
				return unitOfWork().run(ctx, (nested) => noteRepository.create(nested, { title: 'Inner' }));
			});

			expect(Result.isSuccess(inner)).toBe(true);
			expect(await countNotes()).toBe(2);
		});
	});

	it('should report an exhausted pool as unavailable', async () => {
		const small = await openStore({ maxSize: 1, acquireTimeoutMs: 50 });
		const held = await small.pool.acquire();

		try {
			const result = await createUnitOfWork({ sessions: small.sessions, logger: createSilentLogger() }).run(
				ctx,
				(session) => noteRepository.count(session),
			);

			expect(isFailure(result)).toBe(true);
			if (isFailure(result)) {
				expect(result.error).toMatchObject({ type: 'unavailable', code: 'POOL_EXHAUSTED' });
				expect(UseCaseError.httpStatus(result.error)).toBe(503);
			}
		} finally {
			await small.pool.release(held);
			await small.close();
		}
	});
});

describe('toUseCaseError', () => {
	it('should return null for errors outside the store', () => {
		expect(toUseCaseError(new Error('boom'))).toBeNull();
		expect(toUseCaseError('boom')).toBeNull();
	});
});
