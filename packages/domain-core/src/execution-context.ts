/**
 * Execution Context
 *
 * Context for one request's work against the store. Carries the tracing IDs
 * and principal for logging, plus the request's cancellation signal: when the
 * signal aborts, the session opened for the request is rolled back and its
 * connection returned to the pool.
 */

import { randomUUID } from 'node:crypto';
import { TracingContext } from './tracing-context.js';

export interface ExecutionContext {
	/** Unique ID for this execution (generated) */
	readonly executionId: string;
	/** ID for distributed tracing (usually from original request) */
	readonly correlationId: string;
	/** ID of whatever caused this execution (if any) */
	readonly causationId: string | null;
	/** ID of the principal performing the action */
	readonly principalId: string;
	/** When the execution was initiated */
	readonly initiatedAt: Date;
	/** Aborts when the request is canceled or times out */
	readonly signal?: AbortSignal;
}

export interface ExecutionContextOptions {
	/** Cancellation signal of the inbound request */
	readonly signal?: AbortSignal;
	/** Abort the execution after this many milliseconds */
	readonly timeoutMs?: number;
	/** Correlation ID from an upstream system; overrides the tracing context */
	readonly correlationId?: string;
}

function generateExecutionId(): string {
	return `exec-${randomUUID()}`;
}

function combineSignals(options: ExecutionContextOptions): AbortSignal | undefined {
	const signals: AbortSignal[] = [];
	if (options.signal) {
		signals.push(options.signal);
	}
	if (options.timeoutMs !== undefined) {
		signals.push(AbortSignal.timeout(options.timeoutMs));
	}
	if (signals.length <= 1) {
		return signals[0];
	}
	return AbortSignal.any(signals);
}

export const ExecutionContext = {
	/**
	 * Create a new execution context for a fresh request.
	 *
	 * Correlation and causation IDs are taken from the TracingContext when one
	 * is active; otherwise the execution ID doubles as the correlation ID.
	 */
	create(principalId: string, options: ExecutionContextOptions = {}): ExecutionContext {
		const executionId = generateExecutionId();
		const tracing = TracingContext.current();
		const signal = combineSignals(options);

		return {
			executionId,
			correlationId: options.correlationId ?? tracing?.correlationId ?? executionId,
			causationId: tracing?.causationId ?? null,
			principalId,
			initiatedAt: new Date(),
			...(signal ? { signal } : {}),
		};
	},

	/**
	 * Context for start-up tooling and background jobs that run outside any
	 * inbound request.
	 */
	system(name: string): ExecutionContext {
		return ExecutionContext.create(`system:${name}`);
	},

	/**
	 * Throw the signal's reason if the execution has been canceled.
	 */
	throwIfAborted(context: ExecutionContext | undefined): void {
		context?.signal?.throwIfAborted();
	},
};
