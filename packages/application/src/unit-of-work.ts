/**
 * Unit of Work
 *
 * Owns the commit boundary of a service operation. The work callback runs in
 * a session; whatever it returns is committed and wrapped in a successful
 * Result. Returning a Result.failure() instead rolls the session back.
 *
 * **This is the only way to create a successful Result.** Result.success()
 * requires a token only the unit of work holds, so a Success always means the
 * operation's writes were committed, or for a nested run, will be committed
 * only together with the enclosing session.
 *
 * Store errors the caller can act on are rolled back and returned as
 * failures:
 *
 * | thrown                                                    | failure        |
 * |-----------------------------------------------------------|----------------|
 * | NotFoundError                                             | not_found      |
 * | UniqueConstraintViolationError                            | business_rule  |
 * | InvalidQueryError                                         | validation     |
 * | PoolExhaustedError, StoreUnavailableError, PoolClosedError | unavailable   |
 *
 * Anything else (including SessionAlreadyClosedError and aborts) is rolled
 * back and rethrown.
 *
 * Called inside an enclosing `sessions.run()` or unit of work, `run()` joins
 * that session and does not convert failures: a returned failure is thrown as
 * UnitOfWorkRollback and store errors are rethrown, after the shared session
 * is marked rollback-only. The outermost unit of work turns them into its
 * failure, and a caller that swallows them still cannot commit. A nested
 * success is committed, or not, with the enclosing session.
 */

import {
	type ExecutionContext,
	type Failure,
	isFailureValue,
	Result,
	RESULT_SUCCESS_TOKEN,
	UseCaseError,
} from '@quarry/domain-core';
import { componentLogger, type Logger } from '@quarry/logging';
import {
	InvalidQueryError,
	NotFoundError,
	PersistenceError,
	PoolClosedError,
	PoolExhaustedError,
	type Session,
	type SessionManager,
	StoreUnavailableError,
	UniqueConstraintViolationError,
} from '@quarry/persistence';

export interface UnitOfWork {
	/**
	 * Run `work` in one transaction.
	 *
	 * @example
	 * ```typescript
	 * return unitOfWork.run(ctx, async (session) => {
	 *     if (await users.findOne(session, { email: command.email })) {
	 *         return Result.failure(UseCaseError.businessRule('EMAIL_EXISTS', 'Email already registered'));
	 *     }
	 *     return users.create(session, fields);
	 * });
	 * ```
	 */
	run<T>(context: ExecutionContext, work: (session: Session) => Promise<T | Failure<T>>): Promise<Result<T>>;
}

export interface UnitOfWorkConfig {
	readonly sessions: SessionManager;
	readonly logger: Logger;
}

/**
 * Carries a returned failure out of the session so it rolls back. Escapes
 * `run()` only when the unit of work is nested in a plain `sessions.run()`.
 */
export class UnitOfWorkRollback extends Error {
	constructor(readonly failure: UseCaseError) {
		super(`Rolled back: ${failure.code} - ${failure.message}`);
		this.name = 'UnitOfWorkRollback';
	}
}

/**
 * Convert a store error into a UseCaseError, or null if it is not one the
 * caller can act on.
 */
export function toUseCaseError(error: unknown): UseCaseError | null {
	if (error instanceof NotFoundError) {
		return UseCaseError.notFound(error.code, error.message, { entity: error.entity, id: error.id });
	}
	if (error instanceof UniqueConstraintViolationError) {
		return UseCaseError.businessRule(error.code, error.message, {
			entity: error.entity,
			constraint: error.constraint,
			fields: error.fields,
		});
	}
	if (error instanceof InvalidQueryError) {
		return UseCaseError.validation(error.code, error.message);
	}
	if (error instanceof PoolExhaustedError || error instanceof StoreUnavailableError || error instanceof PoolClosedError) {
		return UseCaseError.unavailable(error.code, error.message);
	}
	return null;
}

function describeFailure(error: unknown): string {
	if (error instanceof UnitOfWorkRollback) return error.failure.code;
	if (error instanceof PersistenceError) return error.code;
	return error instanceof Error ? error.message : String(error);
}

export function createUnitOfWork(config: UnitOfWorkConfig): UnitOfWork {
	const { sessions } = config;
	const logger = componentLogger(config.logger, 'UnitOfWork');

	function poisonEnclosing(session: Session, error: unknown, context: ExecutionContext): unknown {
		if (session.isOpen) {
			const reason = describeFailure(error);
			session.markRollbackOnly(reason);
			logger.debug(
				{ correlationId: context.correlationId, sessionId: session.id, reason },
				'Nested operation failed, enclosing session marked rollback-only',
			);
		}
		return error;
	}

	return {
		async run<T>(context: ExecutionContext, work: (session: Session) => Promise<T | Failure<T>>): Promise<Result<T>> {
			const enclosing = sessions.current();
			let value: T;
			try {
				value = await sessions.run(async (session) => {
					const outcome = await work(session);
					if (isFailureValue(outcome)) {
						throw new UnitOfWorkRollback(outcome.error);
					}
					return outcome;
				}, context);
			} catch (error) {
				if (enclosing) {
					throw poisonEnclosing(enclosing, error, context);
				}
				if (error instanceof UnitOfWorkRollback) {
					logger.debug(
						{ correlationId: context.correlationId, code: error.failure.code },
						'Operation failed, rolled back',
					);
					return Result.failure(error.failure);
				}

				const mapped = toUseCaseError(error);
				if (!mapped) {
					throw error;
				}
				const bindings = { err: error, correlationId: context.correlationId, code: mapped.code };
				if (mapped.type === 'unavailable') {
					logger.warn(bindings, 'Store unavailable, rolled back');
				} else {
					logger.debug(bindings, 'Store error, rolled back');
				}
				return Result.failure(mapped);
			}

			return Result.success(RESULT_SUCCESS_TOKEN, value);
		},
	};
}
