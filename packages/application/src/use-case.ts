/**
 * Use Case Interface
 *
 * A use case is one business operation. It validates its command, enforces
 * business rules and runs its writes through a UnitOfWork, which is the only
 * place a successful Result can come from.
 */

import type { ExecutionContext, Result } from '@quarry/domain-core';
import type { Command } from './command.js';

export interface UseCase<TCommand extends Command, TResult> {
	/**
	 * @returns the committed value, or a failure after rolling back
	 */
	execute(command: TCommand, context: ExecutionContext): Promise<Result<TResult>>;
}

/**
 * Extract the command type from a use case.
 */
export type UseCaseCommand<T> = T extends UseCase<infer TCommand, unknown> ? TCommand : never;

/**
 * Extract the result type from a use case.
 */
export type UseCaseResult<T> = T extends UseCase<Command, infer TResult> ? TResult : never;
