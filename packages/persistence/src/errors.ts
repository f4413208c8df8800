/**
 * Persistence Errors
 *
 * Thrown by the pool, sessions, repositories and the migration tracker.
 * The service layer converts the recoverable ones into UseCaseErrors after
 * rolling back; the rest propagate as defects.
 */

export type PersistenceErrorCode =
	| 'POOL_EXHAUSTED'
	| 'POOL_CLOSED'
	| 'CONNECTION_UNHEALTHY'
	| 'STORE_UNAVAILABLE'
	| 'CONNECTION_NOT_CHECKED_OUT'
	| 'SESSION_ALREADY_CLOSED'
	| 'SESSION_ROLLBACK_ONLY'
	| 'NOT_FOUND'
	| 'UNIQUE_CONSTRAINT_VIOLATION'
	| 'INVALID_QUERY'
	| 'OUT_OF_ORDER_MIGRATION'
	| 'UNKNOWN_MIGRATION';

export abstract class PersistenceError extends Error {
	abstract readonly code: PersistenceErrorCode;

	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}
}

/**
 * No connection became available within the acquire timeout.
 */
export class PoolExhaustedError extends PersistenceError {
	readonly code = 'POOL_EXHAUSTED';

	constructor(
		public readonly timeoutMs: number,
		public readonly capacity: number,
	) {
		super(`No connection available within ${timeoutMs}ms (capacity ${capacity})`);
	}
}

export class PoolClosedError extends PersistenceError {
	readonly code = 'POOL_CLOSED';

	constructor() {
		super('Connection pool is shut down');
	}
}

/**
 * A connection failed its liveness probe. Handled inside the pool, which
 * discards the connection instead of recycling it.
 */
export class ConnectionUnhealthyError extends PersistenceError {
	readonly code = 'CONNECTION_UNHEALTHY';

	constructor(
		public readonly connectionId: number,
		cause: unknown,
	) {
		super(`Connection ${connectionId} failed its health check`, { cause });
	}
}

/**
 * release() was handed a connection this pool did not check out. Always a
 * programming error.
 */
export class ConnectionNotCheckedOutError extends PersistenceError {
	readonly code = 'CONNECTION_NOT_CHECKED_OUT';

	constructor(public readonly connectionId: number) {
		super(`Connection ${connectionId} is not checked out from this pool`);
	}
}

/**
 * The store could not be reached to open a connection.
 */
export class StoreUnavailableError extends PersistenceError {
	readonly code = 'STORE_UNAVAILABLE';

	constructor(message: string, cause?: unknown) {
		super(message, cause === undefined ? undefined : { cause });
	}
}

/**
 * A session was used or finalized after it was committed or rolled back.
 * Always a programming error.
 */
export class SessionAlreadyClosedError extends PersistenceError {
	readonly code = 'SESSION_ALREADY_CLOSED';

	constructor(
		public readonly sessionId: string,
		public readonly state: string,
	) {
		super(`Session ${sessionId} is already ${state}`);
	}
}

/**
 * A nested unit of work failed inside the session, so the session was rolled
 * back instead of committed.
 */
export class SessionRollbackOnlyError extends PersistenceError {
	readonly code = 'SESSION_ROLLBACK_ONLY';

	constructor(
		public readonly sessionId: string,
		public readonly reason: string,
	) {
		super(`Session ${sessionId} was rolled back: ${reason}`);
	}
}

export class NotFoundError extends PersistenceError {
	readonly code = 'NOT_FOUND';

	constructor(
		public readonly entity: string,
		public readonly id: unknown,
	) {
		super(`${entity} ${String(id)} not found`);
	}
}

/**
 * The store rejected a write because it collides with a unique constraint.
 */
export class UniqueConstraintViolationError extends PersistenceError {
	readonly code = 'UNIQUE_CONSTRAINT_VIOLATION';

	constructor(
		public readonly entity: string,
		public readonly constraint: string | null,
		public readonly fields: readonly string[],
		cause?: unknown,
	) {
		super(
			fields.length > 0
				? `${entity} with the same ${fields.join(', ')} already exists`
				: `${entity} violates unique constraint ${constraint ?? '(unnamed)'}`,
			cause === undefined ? undefined : { cause },
		);
	}
}

/**
 * A list/count query named an unknown field or an invalid window.
 */
export class InvalidQueryError extends PersistenceError {
	readonly code = 'INVALID_QUERY';
}

export class OutOfOrderMigrationError extends PersistenceError {
	readonly code = 'OUT_OF_ORDER_MIGRATION';

	constructor(
		public readonly version: number,
		public readonly expected: number,
		public readonly current: number | null,
	) {
		super(`Cannot apply migration ${version}: expected ${expected} (current ${current ?? 'none'})`);
	}
}

export class UnknownMigrationError extends PersistenceError {
	readonly code = 'UNKNOWN_MIGRATION';

	constructor(public readonly version: number) {
		super(`Migration ${version} is not declared`);
	}
}

const UNIQUE_VIOLATION_SQLSTATE = '23505';

export interface UniqueViolationDetails {
	/** Constraint name reported by the store, when available */
	readonly constraint: string | null;
	readonly cause: unknown;
}

/**
 * Find a unique violation (SQLSTATE 23505) in an error or its cause chain.
 * postgres.js reports the constraint as `constraint_name`, PGlite as
 * `constraint`.
 */
export function findUniqueViolation(error: unknown): UniqueViolationDetails | null {
	let current: unknown = error;
	for (let depth = 0; depth < 5 && typeof current === 'object' && current !== null; depth++) {
		if ('code' in current && current.code === UNIQUE_VIOLATION_SQLSTATE) {
			let constraint: string | null = null;
			if ('constraint_name' in current && typeof current.constraint_name === 'string') {
				constraint = current.constraint_name;
			} else if ('constraint' in current && typeof current.constraint === 'string') {
				constraint = current.constraint;
			}
			return { constraint, cause: current };
		}
		current = 'cause' in current ? current.cause : undefined;
	}
	return null;
}
