/**
 * Validation Utilities
 *
 * Input checks that run before a use case opens its unit of work. Each one
 * returns a Result so a use case can hand a failure straight back.
 *
 * @example
 * ```typescript
 * const checked = validateAll(
 *     () => validateEmail(command.email),
 *     () => validateFormat(command.username, USERNAME_PATTERN, 'username', 'INVALID_USERNAME'),
 * );
 * if (Result.isFailure(checked)) return Result.failure(checked.error);
 * ```
 */

import { Result, type Success, UseCaseError } from '@quarry/domain-core';
import type { z } from 'zod/v4';

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

/**
 * Fail for null, undefined and blank strings.
 */
export function validateRequired<T>(
	value: T | null | undefined,
	fieldName: string,
	errorCode: string,
	errorMessage?: string,
): Result<T & {}> {
	if (value === null || value === undefined || (typeof value === 'string' && value.trim() === '')) {
		return Result.failure(
			UseCaseError.validation(errorCode, errorMessage ?? `${fieldName} is required`, { field: fieldName }),
		);
	}

	return unsafeSuccess(value);
}

export function validateFormat(
	value: string,
	pattern: RegExp,
	fieldName: string,
	errorCode: string,
	errorMessage?: string,
): Result<string> {
	if (!pattern.test(value)) {
		return Result.failure(
			UseCaseError.validation(errorCode, errorMessage ?? `${fieldName} has invalid format`, {
				field: fieldName,
				pattern: pattern.source,
			}),
		);
	}

	return unsafeSuccess(value);
}

export function validateMaxLength(value: string, maxLength: number, fieldName: string, errorCode: string): Result<string> {
	if (value.length > maxLength) {
		return Result.failure(
			UseCaseError.validation(errorCode, `${fieldName} must be ${maxLength} characters or less`, {
				field: fieldName,
				length: value.length,
				maxLength,
			}),
		);
	}

	return unsafeSuccess(value);
}

export function validateMinLength(value: string, minLength: number, fieldName: string, errorCode: string): Result<string> {
	if (value.length < minLength) {
		return Result.failure(
			UseCaseError.validation(errorCode, `${fieldName} must be at least ${minLength} characters`, {
				field: fieldName,
				length: value.length,
				minLength,
			}),
		);
	}

	return unsafeSuccess(value);
}

/**
 * Basic shape check (something@something.tld), not RFC 5322.
 */
export function validateEmail(email: string, fieldName = 'email', errorCode = 'INVALID_EMAIL'): Result<string> {
	if (!EMAIL_PATTERN.test(email)) {
		return Result.failure(UseCaseError.validation(errorCode, 'Invalid email format', { field: fieldName, email }));
	}

	return unsafeSuccess(email);
}

/**
 * Validate input against a zod schema. The first issue becomes the message;
 * all issues are listed in the details.
 */
export function validateWith<TSchema extends z.ZodType>(
	schema: TSchema,
	input: unknown,
	errorCode: string,
): Result<z.output<TSchema>> {
	const parsed = schema.safeParse(input);

	if (!parsed.success) {
		const issues = parsed.error.issues.map((issue) => ({
			path: issue.path.map(String).join('.'),
			message: issue.message,
		}));
		const [first] = issues;
		const message = first ? `${first.path || 'input'}: ${first.message}` : 'Invalid input';
		return Result.failure(UseCaseError.validation(errorCode, message, { issues }));
	}

	return unsafeSuccess(parsed.data);
}

/**
 * Run validations in order and stop at the first failure.
 */
export function validateAll(...validations: Array<() => Result<unknown>>): Result<void> {
	for (const validation of validations) {
		const result = validation();
		if (Result.isFailure(result)) {
			return Result.failure(result.error);
		}
	}

	return unsafeSuccess(undefined);
}

/**
 * Success for a passed check. Validations run before any write, so the
 * Result.success() restriction does not apply; a use case's own success
 * still comes from UnitOfWork.run().
 */
function unsafeSuccess<T>(value: T): Success<T> {
	return { _tag: 'success', value };
}
