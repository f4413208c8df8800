/**
 * Errors shared by the user use cases.
 *
 * Use cases check email and username before writing, but two concurrent
 * requests can both pass that check; the losing insert then fails on the
 * store constraint. Both paths report the same error codes.
 */

import { Result, UseCaseError } from '@quarry/application';
import type { PasswordError } from '../../infrastructure/crypto/password-service.js';

export function emailExists(email: string): UseCaseError {
	return UseCaseError.businessRule('EMAIL_EXISTS', 'Email is already registered', { email });
}

export function usernameExists(username: string): UseCaseError {
	return UseCaseError.businessRule('USERNAME_EXISTS', 'Username is already taken', { username });
}

/**
 * Rewrite a unique constraint failure from the users table into
 * EMAIL_EXISTS or USERNAME_EXISTS.
 */
export function withLoginConflicts<T>(result: Result<T>, keys: { email?: string; username?: string }): Result<T> {
	if (Result.isSuccess(result) || result.error.code !== 'UNIQUE_CONSTRAINT_VIOLATION') {
		return result;
	}

	switch (result.error.details['constraint']) {
		case 'uq_users_email':
			return Result.failure(emailExists(keys.email ?? ''));
		case 'uq_users_username':
			return Result.failure(usernameExists(keys.username ?? ''));
		default:
			return result;
	}
}

export function passwordFailure(error: PasswordError): UseCaseError {
	return error.type === 'validation'
		? UseCaseError.validation('INVALID_PASSWORD', error.message, { field: error.field })
		: UseCaseError.internal('HASH_FAILED', error.message);
}
