import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { InvalidQueryError, NotFoundError, UniqueConstraintViolationError } from '../errors.js';
import { createPagedResult } from '../repository.js';
import type { Session } from '../session.js';
import { createWidgetRepository, createWidgetStore, type NewWidget, type TestStore } from './fixtures/store.js';

describe('Repository', () => {
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

	function inSession<T>(work: (session: Session) => Promise<T>): Promise<T> {
		return store.sessions.run(work);
	}

	async function seed(rows: NewWidget[]): Promise<void> {
		await inSession(async (session) => {
			for (const row of rows) {
				await widgets.create(session, row);
			}
		});
	}

	describe('create and get', () => {
		it('should return the stored row with generated fields', async () => {
			const created = await inSession((session) => widgets.create(session, { sku: 'W-1', name: 'Bolt' }));

			expect(created).toMatchObject({ id: 1, sku: 'W-1', name: 'Bolt', quantity: 0, note: null });
			expect(created.createdAt).toBeInstanceOf(Date);

			const fetched = await inSession((session) => widgets.get(session, created.id));
			expect(fetched).toEqual(created);
			expect(Object.isFrozen(fetched)).toBe(true);
		});

		it('should fail get for a missing id', async () => {
			const error = await inSession((session) => widgets.get(session, 99)).catch((caught: unknown) => caught);

			expect(error).toBeInstanceOf(NotFoundError);
			expect(error).toMatchObject({ entity: 'Widget', id: 99, message: 'Widget 99 not found' });
		});

		it('should return undefined from find for a missing id', async () => {
			await expect(inSession((session) => widgets.find(session, 99))).resolves.toBeUndefined();
		});

		it('should reject fields the table does not have', async () => {
			const unknownField = { sku: 'W-1', name: 'Bolt', colour: 'red' };

			await expect(inSession((session) => widgets.create(session, unknownField))).rejects.toThrow(
				"Widget has no field 'colour'",
			);
		});

		it('should map a duplicate unique field to UniqueConstraintViolationError', async () => {
			await seed([{ sku: 'W-1', name: 'Bolt' }]);

			const error = await inSession((session) => widgets.create(session, { sku: 'W-1', name: 'Other bolt' })).catch(
				(caught: unknown) => caught,
			);

			expect(error).toBeInstanceOf(UniqueConstraintViolationError);
			expect(error).toMatchObject({ entity: 'Widget', constraint: 'uq_widgets_sku', fields: ['sku'] });
		});

		it('should let exactly one of two concurrent duplicate creates succeed', async () => {
			const outcomes = await Promise.allSettled([
				inSession((session) => widgets.create(session, { sku: 'DUP', name: 'First' })),
				inSession((session) => widgets.create(session, { sku: 'DUP', name: 'Second' })),
			]);

			const fulfilled = outcomes.filter((outcome) => outcome.status === 'fulfilled');
			const rejected = outcomes.filter((outcome) => outcome.status === 'rejected');
			expect(fulfilled).toHaveLength(1);
			expect(rejected).toHaveLength(1);
			expect(rejected[0]).toMatchObject({ reason: expect.any(UniqueConstraintViolationError) });
			expect(await inSession((session) => widgets.count(session, { sku: 'DUP' }))).toBe(1);
		});
	});

	describe('update', () => {
		it('should change only the provided fields', async () => {
			await seed([{ sku: 'W-1', name: 'Bolt', quantity: 3, note: 'zinc' }]);

			const updated = await inSession((session) => widgets.update(session, 1, { quantity: 10, name: undefined }));

			expect(updated).toMatchObject({ id: 1, sku: 'W-1', name: 'Bolt', quantity: 10, note: 'zinc' });
		});

		it('should clear a field set to null', async () => {
			await seed([{ sku: 'W-1', name: 'Bolt', note: 'zinc' }]);

			const updated = await inSession((session) => widgets.update(session, 1, { note: null }));

			expect(updated.note).toBeNull();
		});

		it('should return the current row for an empty patch', async () => {
			await seed([{ sku: 'W-1', name: 'Bolt' }]);

			const unchanged = await inSession((session) => widgets.update(session, 1, {}));

			expect(unchanged).toMatchObject({ id: 1, name: 'Bolt' });
		});

		it('should fail for a missing id', async () => {
			await expect(inSession((session) => widgets.update(session, 42, { name: 'Ghost' }))).rejects.toBeInstanceOf(
				NotFoundError,
			);
			await expect(inSession((session) => widgets.update(session, 42, {}))).rejects.toBeInstanceOf(NotFoundError);
		});

		it('should map unique violations', async () => {
			await seed([
				{ sku: 'W-1', name: 'Bolt' },
				{ sku: 'W-2', name: 'Nut' },
			]);

			await expect(inSession((session) => widgets.update(session, 2, { sku: 'W-1' }))).rejects.toBeInstanceOf(
				UniqueConstraintViolationError,
			);
		});

		it('should refuse to change the primary key', async () => {
			await seed([{ sku: 'W-1', name: 'Bolt' }]);
			const patch = { id: 5, name: 'Bolt' };

			await expect(inSession((session) => widgets.update(session, 1, patch))).rejects.toThrow(
				'Widget.id cannot be changed',
			);
		});
	});

	describe('delete', () => {
		it('should report whether a row was removed', async () => {
			await seed([{ sku: 'W-1', name: 'Bolt' }]);

			await expect(inSession((session) => widgets.delete(session, 1))).resolves.toBe(true);
			await expect(inSession((session) => widgets.delete(session, 1))).resolves.toBe(false);
			await expect(inSession((session) => widgets.count(session))).resolves.toBe(0);
		});
	});

	describe('list', () => {
		const rows: NewWidget[] = [
			{ sku: 'A', name: 'Anchor', quantity: 5 },
			{ sku: 'B', name: 'Bracket', quantity: 1, note: 'fragile' },
			{ sku: 'C', name: 'Clamp', quantity: 5 },
			{ sku: 'D', name: 'Dowel', quantity: 8 },
			{ sku: 'E', name: 'Eyelet', quantity: 0, note: 'fragile' },
		];

		it('should return an empty list for an empty store', async () => {
			await expect(inSession((session) => widgets.list(session, { filter: {}, offset: 0, limit: 10 }))).resolves.toEqual(
				[],
			);
		});

		it('should order by primary key by default and apply the window', async () => {
			await seed(rows);

			const page = await inSession((session) => widgets.list(session, { offset: 1, limit: 2 }));

			expect(page.map((widget) => widget.sku)).toEqual(['B', 'C']);
		});

		it('should combine equality and range predicates', async () => {
			await seed(rows);

			const matches = await inSession((session) =>
				widgets.list(session, { filter: { quantity: { gte: 1, lt: 8 }, note: null }, limit: 10 }),
			);

			expect(matches.map((widget) => widget.sku)).toEqual(['A', 'C']);
		});

		it('should support in and ne', async () => {
			await seed(rows);

			const matches = await inSession((session) =>
				widgets.list(session, { filter: { sku: { in: ['A', 'B', 'E'] }, quantity: { ne: 0 } }, limit: 10 }),
			);
			const none = await inSession((session) => widgets.list(session, { filter: { sku: { in: [] } }, limit: 10 }));

			expect(matches.map((widget) => widget.sku)).toEqual(['A', 'B']);
			expect(none).toEqual([]);
		});

		it('should sort by the given key with the primary key as tie-breaker', async () => {
			await seed(rows);

			const sorted = await inSession((session) =>
				widgets.list(session, { sort: [{ field: 'quantity', direction: 'desc' }], limit: 10 }),
			);

			expect(sorted.map((widget) => widget.sku)).toEqual(['D', 'A', 'C', 'B', 'E']);
		});

		it('should cap the limit at maxListLimit', async () => {
			await seed(rows);
			const capped = createWidgetRepository(2);

			const page = await inSession((session) => capped.list(session, { limit: 500 }));

			expect(page).toHaveLength(2);
			expect(capped.maxListLimit).toBe(2);
		});

		it('should reject invalid queries', async () => {
			const unknownField = { filter: { colour: 'red', sku: 'A' }, limit: 10 };
			const unknownOperator = { filter: { quantity: { between: [1, 2], eq: 1 } }, limit: 10 };

			await expect(inSession((session) => widgets.list(session, unknownField))).rejects.toBeInstanceOf(
				InvalidQueryError,
			);
			await expect(inSession((session) => widgets.list(session, { offset: -1, limit: 10 }))).rejects.toThrow(
				'offset must be a non-negative integer, got -1',
			);
			await expect(inSession((session) => widgets.list(session, { limit: 2.5 }))).rejects.toThrow(
				'limit must be a non-negative integer, got 2.5',
			);
			await expect(inSession((session) => widgets.list(session, unknownOperator))).rejects.toThrow(
				"Unknown operator 'between' on Widget.quantity; expected one of eq, ne, gt, gte, lt, lte, in",
			);
		});

		it('should find the first match and count matches', async () => {
			await seed(rows);

			const fragile = await inSession((session) => widgets.findOne(session, { note: 'fragile' }));
			const fragileCount = await inSession((session) => widgets.count(session, { note: 'fragile' }));

			expect(fragile?.sku).toBe('B');
			expect(fragileCount).toBe(2);
		});
	});
});

describe('createPagedResult', () => {
	it('should compute page metadata', () => {
		expect(createPagedResult(['a', 'b'], 1, 2, 5)).toEqual({
			items: ['a', 'b'],
			page: 1,
			pageSize: 2,
			totalItems: 5,
			totalPages: 3,
			hasNext: true,
			hasPrevious: true,
		});
	});

	it('should report no pages for an empty result', () => {
		expect(createPagedResult([], 0, 20, 0)).toMatchObject({ totalPages: 0, hasNext: false, hasPrevious: false });
	});
});
