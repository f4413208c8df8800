/**
 * Generic Repository
 *
 * Typed CRUD over one Drizzle table, built from an EntityDefinition.
 * Repositories hold no state: every operation takes the Session it runs in
 * and never commits. Rows coming back from the store are validated with the
 * entity's zod schema and frozen, so callers only ever see snapshots.
 */

import {
	and,
	asc,
	count as countRows,
	desc,
	eq,
	getTableColumns,
	gt,
	gte,
	inArray,
	isNull,
	lt,
	lte,
	ne,
	sql,
	type SQL,
} from 'drizzle-orm';
import type { PgColumn, PgTable } from 'drizzle-orm/pg-core';
import type { z } from 'zod/v4';
import { findUniqueViolation, InvalidQueryError, NotFoundError, UniqueConstraintViolationError } from './errors.js';
import type { Session } from './session.js';

export type EntityId = number | string;

/**
 * Base shape of every stored entity.
 */
export interface Entity {
	readonly id: EntityId;
}

export const DEFAULT_MAX_LIST_LIMIT = 1000;

/**
 * Everything the generic repository needs to know about an entity type.
 */
export interface EntityDefinition<TEntity extends Entity> {
	/** Entity name used in errors and logs */
	readonly name: string;
	readonly table: PgTable;
	/** Validates and shapes rows read from the store */
	readonly schema: z.ZodType<TEntity>;
	/** Unique constraint name → the fields it covers */
	readonly uniqueConstraints?: Readonly<Record<string, readonly (keyof TEntity & string)[]>>;
	/** Upper bound for list() limits (default: 1000) */
	readonly maxListLimit?: number;
}

export interface FieldOperators<V> {
	readonly eq?: V;
	readonly ne?: V;
	readonly gt?: V;
	readonly gte?: V;
	readonly lt?: V;
	readonly lte?: V;
	readonly in?: readonly V[];
}

/**
 * A bare value means equality (`null` means IS NULL); an operator object
 * combines its operators with AND.
 */
export type FieldPredicate<V> = V | null | FieldOperators<V>;

/**
 * Conjunction of per-field predicates.
 */
export type Filter<TEntity> = { readonly [K in keyof TEntity]?: FieldPredicate<TEntity[K]> };

export interface SortSpec<TEntity> {
	readonly field: keyof TEntity & string;
	readonly direction?: 'asc' | 'desc';
}

export interface ListQuery<TEntity> {
	readonly filter?: Filter<TEntity>;
	/** Sort keys; the primary key is always appended as a tie-breaker */
	readonly sort?: readonly SortSpec<TEntity>[];
	/** Zero-based (default: 0) */
	readonly offset?: number;
	/** Required; values above maxListLimit are capped */
	readonly limit: number;
}

/**
 * Repository over one entity type.
 *
 * @typeParam TEntity - The stored entity
 * @typeParam TCreate - Fields accepted by create()
 * @typeParam TPatch - Fields accepted by update()
 */
export interface Repository<TEntity extends Entity, TCreate extends object, TPatch extends object = Partial<TCreate>> {
	readonly entityName: string;

	/** list() returns at most this many rows */
	readonly maxListLimit: number;

	/**
	 * @throws NotFoundError if no row has this id
	 */
	get(session: Session, id: TEntity['id']): Promise<TEntity>;

	find(session: Session, id: TEntity['id']): Promise<TEntity | undefined>;

	/**
	 * First matching row in primary key order.
	 */
	findOne(session: Session, filter: Filter<TEntity>): Promise<TEntity | undefined>;

	/**
	 * @throws InvalidQueryError for unknown fields or an invalid window
	 */
	list(session: Session, query: ListQuery<TEntity>): Promise<TEntity[]>;

	count(session: Session, filter?: Filter<TEntity>): Promise<number>;

	/**
	 * Insert a row and return it with its generated fields.
	 *
	 * @throws UniqueConstraintViolationError if a unique field collides
	 */
	create(session: Session, fields: TCreate): Promise<TEntity>;

	/**
	 * Merge the provided fields into the row. `undefined` fields are ignored;
	 * an empty patch returns the current row.
	 *
	 * @throws NotFoundError if no row has this id
	 * @throws UniqueConstraintViolationError if a unique field collides
	 */
	update(session: Session, id: TEntity['id'], patch: TPatch): Promise<TEntity>;

	/**
	 * @returns whether a row was removed
	 */
	delete(session: Session, id: TEntity['id']): Promise<boolean>;
}

const OPERATORS = new Set(['eq', 'ne', 'gt', 'gte', 'lt', 'lte', 'in']);

function isOperatorObject(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !(value instanceof Date) && !Array.isArray(value);
}

function primaryKeyColumn(columns: Record<string, PgColumn>, entity: string): PgColumn {
	const column = columns['id'];
	if (!column) {
		throw new Error(`Table for ${entity} has no id column`);
	}
	return column;
}

function isIndex(value: number): boolean {
	return Number.isInteger(value) && value >= 0;
}

/**
 * Create a repository for an entity definition.
 *
 * @example
 * ```typescript
 * const users = createRepository<User, NewUser, UserPatch>({
 *     name: 'User',
 *     table: usersTable,
 *     schema: userSchema,
 *     uniqueConstraints: { uq_users_email: ['email'] },
 * });
 *
 * const page = await users.list(session, { filter: { isActive: true }, limit: 20 });
 * ```
 */
export function createRepository<TEntity extends Entity, TCreate extends object, TPatch extends object = Partial<TCreate>>(
	definition: EntityDefinition<TEntity>,
): Repository<TEntity, TCreate, TPatch> {
	const { name, table, schema } = definition;
	const columns: Record<string, PgColumn> = getTableColumns(table);
	const primaryKey = primaryKeyColumn(columns, name);
	const maxListLimit = definition.maxListLimit ?? DEFAULT_MAX_LIST_LIMIT;
	const uniqueConstraints: Readonly<Record<string, readonly string[]>> = definition.uniqueConstraints ?? {};

	function column(field: string): PgColumn {
		const found = columns[field];
		if (!found) {
			throw new InvalidQueryError(`${name} has no field '${field}'`);
		}
		return found;
	}

	function toEntity(row: unknown): TEntity {
		const entity = schema.parse(row);
		Object.freeze(entity);
		return entity;
	}

	function fieldCondition(target: PgColumn, field: string, predicate: unknown): SQL | undefined {
		if (predicate === null) {
			return isNull(target);
		}
		if (!isOperatorObject(predicate)) {
			return eq(target, predicate);
		}

		const conditions: SQL[] = [];
		for (const [operator, operand] of Object.entries(predicate)) {
			if (operand === undefined) continue;
			switch (operator) {
				case 'eq':
					conditions.push(operand === null ? isNull(target) : eq(target, operand));
					break;
				case 'ne':
					conditions.push(ne(target, operand));
					break;
				case 'gt':
					conditions.push(gt(target, operand));
					break;
				case 'gte':
					conditions.push(gte(target, operand));
					break;
				case 'lt':
					conditions.push(lt(target, operand));
					break;
				case 'lte':
					conditions.push(lte(target, operand));
					break;
				case 'in':
					if (!Array.isArray(operand)) {
						throw new InvalidQueryError(`'in' on ${name}.${field} needs an array`);
					}
					conditions.push(operand.length === 0 ? sql`false` : inArray(target, operand));
					break;
				default:
					throw new InvalidQueryError(
						`Unknown operator '${operator}' on ${name}.${field}; expected one of ${[...OPERATORS].join(', ')}`,
					);
			}
		}
		return and(...conditions);
	}

	function whereClause(filter: Filter<TEntity> | undefined): SQL | undefined {
		if (!filter) return undefined;
		const entries: [string, unknown][] = Object.entries(filter);
		const conditions: SQL[] = [];
		for (const [field, predicate] of entries) {
			if (predicate === undefined) continue;
			const condition = fieldCondition(column(field), field, predicate);
			if (condition) {
				conditions.push(condition);
			}
		}
		return and(...conditions);
	}

	function orderBy(sort: readonly SortSpec<TEntity>[] | undefined): SQL[] {
		const order: SQL[] = [];
		let hasPrimaryKey = false;
		for (const spec of sort ?? []) {
			const target = column(spec.field);
			hasPrimaryKey ||= target === primaryKey;
			order.push(spec.direction === 'desc' ? desc(target) : asc(target));
		}
		if (!hasPrimaryKey) {
			order.push(asc(primaryKey));
		}
		return order;
	}

	/**
	 * Drop undefined fields and reject fields the table does not have.
	 */
	function toValues(fields: object, allowPrimaryKey: boolean): Record<string, unknown> {
		const entries: [string, unknown][] = Object.entries(fields);
		const values: Record<string, unknown> = {};
		for (const [field, value] of entries) {
			if (value === undefined) continue;
			if (column(field) === primaryKey && !allowPrimaryKey) {
				throw new InvalidQueryError(`${name}.${field} cannot be changed`);
			}
			values[field] = value;
		}
		return values;
	}

	/**
	 * Run a write, translating unique violations into the typed error.
	 */
	async function write<R>(statement: () => Promise<R>): Promise<R> {
		try {
			return await statement();
		} catch (error) {
			const violation = findUniqueViolation(error);
			if (!violation) throw error;
			const fields = violation.constraint ? (uniqueConstraints[violation.constraint] ?? []) : [];
			throw new UniqueConstraintViolationError(name, violation.constraint, fields, error);
		}
	}

	async function find(session: Session, id: TEntity['id']): Promise<TEntity | undefined> {
		const rows = await session.db.select().from(table).where(eq(primaryKey, id)).limit(1);
		const row = rows[0];
		return row === undefined ? undefined : toEntity(row);
	}

	async function list(session: Session, query: ListQuery<TEntity>): Promise<TEntity[]> {
		const offset = query.offset ?? 0;
		if (!isIndex(offset)) {
			throw new InvalidQueryError(`offset must be a non-negative integer, got ${offset}`);
		}
		if (!isIndex(query.limit)) {
			throw new InvalidQueryError(`limit must be a non-negative integer, got ${query.limit}`);
		}
		const limit = Math.min(query.limit, maxListLimit);
		const where = whereClause(query.filter);
		const order = orderBy(query.sort);
		if (limit === 0) return [];

		const rows = await session.db
			.select()
			.from(table)
			.where(where)
			.orderBy(...order)
			.limit(limit)
			.offset(offset);
		return rows.map(toEntity);
	}

	return {
		entityName: name,
		maxListLimit,

		async get(session, id) {
			const entity = await find(session, id);
			if (!entity) {
				throw new NotFoundError(name, id);
			}
			return entity;
		},

		find,

		async findOne(session, filter) {
			const [first] = await list(session, { filter, limit: 1 });
			return first;
		},

		list,

		async count(session, filter) {
			const rows = await session.db.select({ total: countRows() }).from(table).where(whereClause(filter));
			return rows[0]?.total ?? 0;
		},

		async create(session, fields) {
			const values = toValues(fields, true);
			const rows = await write(() => session.db.insert(table).values(values).returning());
			session.recordWrite();
			const row = rows[0];
			if (row === undefined) {
				throw new Error(`Insert into ${name} returned no row`);
			}
			return toEntity(row);
		},

		async update(session, id, patch) {
			const values = toValues(patch, false);
			if (Object.keys(values).length === 0) {
				const current = await find(session, id);
				if (!current) {
					throw new NotFoundError(name, id);
				}
				return current;
			}

			const rows = await write(() => session.db.update(table).set(values).where(eq(primaryKey, id)).returning());
			const row = rows[0];
			if (row === undefined) {
				throw new NotFoundError(name, id);
			}
			session.recordWrite();
			return toEntity(row);
		},

		async delete(session, id) {
			const rows = await session.db.delete(table).where(eq(primaryKey, id)).returning({ id: primaryKey });
			if (rows.length > 0) {
				session.recordWrite(rows.length);
			}
			return rows.length > 0;
		},
	};
}

/**
 * Paginated result with metadata.
 */
export interface PagedResult<T> {
	readonly items: T[];
	readonly page: number;
	readonly pageSize: number;
	readonly totalItems: number;
	readonly totalPages: number;
	readonly hasNext: boolean;
	readonly hasPrevious: boolean;
}

/**
 * Create a paginated result from items and counts. Pages are 0-indexed.
 */
export function createPagedResult<T>(items: T[], page: number, pageSize: number, totalItems: number): PagedResult<T> {
	const totalPages = pageSize > 0 ? Math.ceil(totalItems / pageSize) : 0;
	return {
		items,
		page,
		pageSize,
		totalItems,
		totalPages,
		hasNext: page < totalPages - 1,
		hasPrevious: page > 0,
	};
}
