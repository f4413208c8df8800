/**
 * Outcome of a service operation.
 *
 * A Result is either a Success carrying the committed value or a Failure
 * carrying a UseCaseError. Failures can be built anywhere. Successes cannot:
 * Result.success() demands RESULT_SUCCESS_TOKEN, which only the unit of work
 * passes, so holding a Success means the writes behind it were committed.
 *
 * ```typescript
 * const result = await users.createUser(command, ctx);
 * if (Result.isFailure(result)) {
 *     return reply.code(UseCaseError.httpStatus(result.error)).send(result.error);
 * }
 * return reply.code(201).send(result.value);
 * ```
 */

import type { UseCaseError } from './errors.js';

/** @internal */
export const RESULT_SUCCESS_TOKEN: unique symbol = Symbol('RESULT_SUCCESS_TOKEN');

/** @internal */
export type ResultSuccessToken = typeof RESULT_SUCCESS_TOKEN;

export interface Success<T> {
	readonly _tag: 'success';
	readonly value: T;
}

export interface Failure<T> {
	readonly _tag: 'failure';
	readonly error: UseCaseError;
	/** Never set; ties the failure to the operation's value type */
	readonly _value?: T;
}

export type Result<T> = Success<T> | Failure<T>;

export function isSuccess<T>(result: Result<T>): result is Success<T> {
	return result._tag === 'success';
}

export function isFailure<T>(result: Result<T>): result is Failure<T> {
	return result._tag === 'failure';
}

/**
 * Narrow the return of a callback that yields either a plain value or a
 * Failure.
 */
export function isFailureValue<T>(value: T | Failure<T>): value is Failure<T> {
	if (typeof value !== 'object' || value === null) {
		return false;
	}
	return '_tag' in value && value._tag === 'failure' && 'error' in value;
}

function fold<T, U>(result: Result<T>, onSuccess: (value: T) => U, onFailure: (error: UseCaseError) => U): U {
	return isSuccess(result) ? onSuccess(result.value) : onFailure(result.error);
}

export const Result = {
	/**
	 * @throws Error unless called with RESULT_SUCCESS_TOKEN
	 * @internal
	 */
	success<T>(token: ResultSuccessToken, value: T): Success<T> {
		if (token !== RESULT_SUCCESS_TOKEN) {
			throw new Error('Result.success() is restricted. Successful results come from UnitOfWork.run().');
		}
		return { _tag: 'success', value };
	},

	failure<T>(error: UseCaseError): Failure<T> {
		return { _tag: 'failure', error };
	},

	isSuccess,
	isFailure,

	/** Transform the value of a success; failures are passed on unchanged. */
	map<T, U>(result: Result<T>, fn: (value: T) => U): Result<U> {
		return fold<T, Result<U>>(
			result,
			(value) => ({ _tag: 'success', value: fn(value) }),
			(error) => ({ _tag: 'failure', error }),
		);
	},

	match: fold,

	/** @throws Error carrying the failure's code and message */
	unwrap<T>(result: Result<T>): T {
		return fold(result, (value) => value, (error) => {
			throw new Error(`Cannot unwrap failure result: ${error.code} - ${error.message}`);
		});
	},

	unwrapOr<T>(result: Result<T>, fallback: T): T {
		return fold(result, (value) => value, () => fallback);
	},
};
