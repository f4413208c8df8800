/**
 * Session
 *
 * One unit of work against the store: a checked-out connection with an open
 * transaction. Repositories take the session as their first argument and
 * never commit; the owner of the session decides the outcome exactly once.
 */

import { randomUUID } from 'node:crypto';
import type { Logger, SessionLogContext } from '@quarry/logging';
import type { StoreConnection, StoreDatabase } from './connection.js';
import { SessionAlreadyClosedError, SessionRollbackOnlyError } from './errors.js';

export type SessionState = 'open' | 'finalizing' | 'committed' | 'rolled_back';

export class Session {
	readonly id: string = randomUUID();

	private state: SessionState = 'open';
	private writes = 0;
	private rollbackReason: string | null = null;
	private readonly logger: Logger;

	constructor(
		private readonly connection: StoreConnection,
		private readonly releaseConnection: (connection: StoreConnection) => Promise<void>,
		readonly correlationId: string,
		logger: Logger,
	) {
		const bindings: SessionLogContext = {
			sessionId: this.id,
			connectionId: connection.id,
			correlationId,
		};
		this.logger = logger.child(bindings);
	}

	get status(): SessionState {
		return this.state;
	}

	get isOpen(): boolean {
		return this.state === 'open';
	}

	get connectionId(): number {
		return this.connection.id;
	}

	/** Writes recorded since the session was opened */
	get pendingWrites(): number {
		return this.writes;
	}

	/**
	 * Drizzle handle bound to the session's transaction.
	 *
	 * @throws SessionAlreadyClosedError once the session is finalizing or closed
	 */
	get db(): StoreDatabase {
		this.assertOpen();
		return this.connection.db;
	}

	/** Set once a nested unit of work failed; the session can then only roll back */
	get rollbackOnlyReason(): string | null {
		return this.rollbackReason;
	}

	/**
	 * Forbid committing this session. The first reason given is kept.
	 */
	markRollbackOnly(reason: string): void {
		this.assertOpen();
		if (this.rollbackReason === null) {
			this.rollbackReason = reason;
			this.logger.debug({ reason }, 'Session marked rollback-only');
		}
	}

	recordWrite(count = 1): void {
		this.assertOpen();
		this.writes += count;
	}

	/**
	 * Run a raw multi-statement script inside the session's transaction.
	 */
	async runScript(script: string): Promise<void> {
		this.assertOpen();
		await this.connection.runScript(script);
	}

	/**
	 * Commit and release the connection. A failed COMMIT is followed by a
	 * ROLLBACK before the connection goes back and the error is rethrown.
	 *
	 * @throws SessionRollbackOnlyError after rolling back a rollback-only session
	 */
	async commit(): Promise<void> {
		const rollbackReason = this.rollbackReason;
		if (rollbackReason !== null) {
			await this.rollback();
			throw new SessionRollbackOnlyError(this.id, rollbackReason);
		}
		this.beginFinalize();

		try {
			await this.connection.commit();
		} catch (error) {
			this.logger.error({ err: error, pendingWrites: this.writes }, 'Commit failed, rolling back');
			try {
				await this.connection.rollback();
			} catch (rollbackError) {
				this.logger.warn({ err: rollbackError }, 'Rollback after failed commit also failed');
			}
			this.state = 'rolled_back';
			await this.releaseConnection(this.connection);
			throw error;
		}

		this.state = 'committed';
		this.logger.debug({ pendingWrites: this.writes }, 'Session committed');
		await this.releaseConnection(this.connection);
	}

	/**
	 * Discard the session's writes and release the connection.
	 */
	async rollback(): Promise<void> {
		this.beginFinalize();

		try {
			await this.connection.rollback();
		} finally {
			this.state = 'rolled_back';
			this.logger.debug({ discardedWrites: this.writes }, 'Session rolled back');
			await this.releaseConnection(this.connection);
		}
	}

	private beginFinalize(): void {
		this.assertOpen();
		this.state = 'finalizing';
	}

	private assertOpen(): void {
		if (this.state !== 'open') {
			throw new SessionAlreadyClosedError(this.id, this.state);
		}
	}
}
