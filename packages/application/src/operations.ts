/**
 * Operations services
 *
 * An operations service is the single entry point for everything that can be
 * done to one resource: writes delegate to use cases, reads go to the
 * repository directly. HTTP handlers and the CLI only ever talk to it.
 *
 * @example
 * ```typescript
 * const userOperations = createOperationsService()
 *     .write('createUser', createUserUseCase)
 *     .write('deleteUser', deleteUserUseCase)
 *     .read('getUser', (id: number, ctx: ExecutionContext) => getUser(id, ctx))
 *     .build();
 *
 * const result = await userOperations.createUser(command, ctx);
 * ```
 */

import type { ExecutionContext, Result } from '@quarry/domain-core';
import type { Command } from './command.js';
import type { UseCase } from './use-case.js';

/**
 * A write operation of an operations service.
 */
export type WriteOperation<TCommand extends Command, TResult> = (
	command: TCommand,
	context: ExecutionContext,
) => Promise<Result<TResult>>;

/**
 * A read operation of an operations service.
 */
export type ReadOperation<TResult, TParams extends unknown[] = []> = (...params: TParams) => Promise<TResult>;

/**
 * Expose a use case as a write operation.
 */
export function wrapUseCase<TCommand extends Command, TResult>(
	useCase: UseCase<TCommand, TResult>,
): WriteOperation<TCommand, TResult> {
	return (command, context) => useCase.execute(command, context);
}

export function createOperationsService(): OperationsBuilder<object> {
	return new OperationsBuilder({});
}

/**
 * Accumulates named operations; each call returns a new builder whose type
 * includes the added name.
 */
class OperationsBuilder<T extends object> {
	constructor(private readonly operations: T) {}

	write<TName extends string, TCommand extends Command, TResult>(
		name: TName,
		useCase: UseCase<TCommand, TResult>,
	): OperationsBuilder<T & { [K in TName]: WriteOperation<TCommand, TResult> }> {
		return this.with(name, wrapUseCase(useCase));
	}

	read<TName extends string, TResult, TParams extends unknown[]>(
		name: TName,
		operation: ReadOperation<TResult, TParams>,
	): OperationsBuilder<T & { [K in TName]: ReadOperation<TResult, TParams> }> {
		return this.with(name, operation);
	}

	build(): T {
		return this.operations;
	}

	private with<TName extends string, TOperation>(
		name: TName,
		operation: TOperation,
	): OperationsBuilder<T & { [K in TName]: TOperation }> {
		if (Object.hasOwn(this.operations, name)) {
			throw new Error(`Operation '${name}' is already registered`);
		}
		const extended = { ...this.operations, [name]: operation } as T & { [K in TName]: TOperation };
		return new OperationsBuilder(extended);
	}
}

/** The operations object a builder produces. */
export type OperationsType<T extends OperationsBuilder<object>> = T extends OperationsBuilder<infer U> ? U : never;
