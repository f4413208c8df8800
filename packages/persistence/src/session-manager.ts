/**
 * Session Manager
 *
 * Opens sessions on pooled connections and scopes them to a callback.
 *
 * `run()` keeps the active session in AsyncLocalStorage, so repositories and
 * services called from inside the callback that call `run()` again join the
 * same transaction instead of checking out a second connection.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { componentLogger, type Logger } from '@quarry/logging';
import { type ExecutionContext, TracingContext } from '@quarry/domain-core';
import type { StoreConnection } from './connection.js';
import { PoolExhaustedError, SessionAlreadyClosedError } from './errors.js';
import type { ConnectionPool } from './pool.js';
import { Session } from './session.js';

/**
 * The parts of an ExecutionContext a session cares about.
 */
export type SessionContext = Partial<Pick<ExecutionContext, 'correlationId' | 'signal'>>;

export class SessionManager {
	private readonly storage = new AsyncLocalStorage<Session>();
	private readonly logger: Logger;

	constructor(
		private readonly pool: ConnectionPool<StoreConnection>,
		logger: Logger,
	) {
		this.logger = componentLogger(logger, 'SessionManager');
	}

	/**
	 * Open a session outside any scope. The caller must commit or roll back.
	 */
	async open(context: SessionContext = {}): Promise<Session> {
		const startedAt = Date.now();
		const signal = context.signal;
		const connection = await this.pool.acquire(signal ? { signal } : {});

		// Drivers that queue transactions wait inside begin(); that wait shares the acquire budget.
		const { acquireTimeoutMs } = this.pool.options;
		const timeoutMs = Math.max(1, acquireTimeoutMs - (Date.now() - startedAt));
		try {
			await connection.begin(signal ? { signal, timeoutMs } : { timeoutMs });
		} catch (error) {
			await this.pool.release(connection);
			if (error instanceof PoolExhaustedError) {
				throw new PoolExhaustedError(acquireTimeoutMs, this.pool.capacity);
			}
			throw error;
		}

		const session = new Session(
			connection,
			(released) => this.pool.release(released),
			context.correlationId ?? TracingContext.getCorrelationId(),
			this.logger,
		);
		this.logger.debug({ sessionId: session.id, connectionId: connection.id }, 'Session opened');
		return session;
	}

	/**
	 * Run `work` in a session: commit when it resolves, roll back and rethrow
	 * when it rejects. Nested calls reuse the enclosing session.
	 *
	 * A session marked rollback-only is rolled back even when `work` resolves,
	 * and the call rejects with SessionRollbackOnlyError.
	 *
	 * When `context.signal` aborts, the session is rolled back and released
	 * straight away and the returned promise rejects with the abort reason.
	 *
	 * @example
	 * ```typescript
	 * const user = await sessions.run(async (session) => {
	 *     const created = await users.create(session, fields);
	 *     await audit.create(session, { userId: created.id, action: 'created' });
	 *     return created;
	 * }, ctx);
	 * ```
	 */
	async run<T>(work: (session: Session) => Promise<T>, context: SessionContext = {}): Promise<T> {
		const ambient = this.storage.getStore();
		if (ambient) {
			if (!ambient.isOpen) {
				throw new SessionAlreadyClosedError(ambient.id, ambient.status);
			}
			return work(ambient);
		}

		const session = await this.open(context);
		const outcome = this.storage.run(session, async () => work(session));
		const settled = this.finalize(session, outcome);

		const signal = context.signal;
		if (!signal) {
			return settled;
		}
		return this.cancellable(session, settled, signal);
	}

	/**
	 * The session of the enclosing `run()`, if any.
	 */
	current(): Session | null {
		return this.storage.getStore() ?? null;
	}

	private async finalize<T>(session: Session, outcome: Promise<T>): Promise<T> {
		let value: T;
		try {
			value = await outcome;
		} catch (error) {
			await this.rollbackQuietly(session);
			throw error;
		}

		if (!session.isOpen) {
			throw new SessionAlreadyClosedError(session.id, session.status);
		}
		await session.commit();
		return value;
	}

	private cancellable<T>(session: Session, settled: Promise<T>, signal: AbortSignal): Promise<T> {
		return new Promise<T>((resolve, reject) => {
			let cancelled = false;

			const onAbort = (): void => {
				// Already committing or rolling back: let that finish.
				if (!session.isOpen) return;

				cancelled = true;
				this.logger.warn({ sessionId: session.id, reason: String(signal.reason) }, 'Session cancelled');
				this.rollbackQuietly(session).then(() => reject(signal.reason), reject);
			};

			signal.addEventListener('abort', onAbort, { once: true });
			if (signal.aborted) {
				onAbort();
			}

			settled.then(
				(value) => {
					signal.removeEventListener('abort', onAbort);
					if (!cancelled) resolve(value);
				},
				(error: unknown) => {
					signal.removeEventListener('abort', onAbort);
					if (cancelled) {
						this.logger.debug({ err: error, sessionId: session.id }, 'Cancelled work settled');
					} else {
						reject(error);
					}
				},
			);
		});
	}

	private async rollbackQuietly(session: Session): Promise<void> {
		if (!session.isOpen) return;
		try {
			await session.rollback();
		} catch (error) {
			this.logger.error({ err: error, sessionId: session.id }, 'Rollback failed');
		}
	}
}
