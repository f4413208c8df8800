/**
 * Failures a service operation can report.
 *
 * Every failure has a `type` that decides how it surfaces at the edge (see
 * USE_CASE_ERROR_STATUS), a stable machine-readable `code`, a human message
 * and free-form details. None of them mention the store: store errors are
 * translated by the unit of work before they get here.
 */

/**
 * HTTP status for each failure type.
 */
export const USE_CASE_ERROR_STATUS = {
	validation: 400,
	not_found: 404,
	business_rule: 409,
	concurrency: 409,
	unavailable: 503,
	internal: 500,
} as const;

export type UseCaseErrorType = keyof typeof USE_CASE_ERROR_STATUS;

export interface UseCaseErrorBase {
	readonly type: UseCaseErrorType;
	readonly code: string;
	readonly message: string;
	readonly details: Record<string, unknown>;
}

type ErrorOfType<TType extends UseCaseErrorType> = UseCaseErrorBase & { readonly type: TType };

/** Bad or missing input */
export type ValidationError = ErrorOfType<'validation'>;
export type NotFoundError = ErrorOfType<'not_found'>;
/** The input is well-formed but the current state forbids the operation (duplicate email, inactive user) */
export type BusinessRuleViolation = ErrorOfType<'business_rule'>;
export type ConcurrencyError = ErrorOfType<'concurrency'>;
/** Pool exhausted or store down; the caller may retry */
export type UnavailableError = ErrorOfType<'unavailable'>;
/** The service itself failed (hashing library error); retrying the same input does not help */
export type InternalError = ErrorOfType<'internal'>;

export type UseCaseError =
	| ValidationError
	| NotFoundError
	| BusinessRuleViolation
	| ConcurrencyError
	| UnavailableError
	| InternalError;

function factory<TType extends UseCaseErrorType>(type: TType) {
	return (code: string, message: string, details: Record<string, unknown> = {}): ErrorOfType<TType> => ({
		type,
		code,
		message,
		details,
	});
}

function isErrorType(value: unknown): value is UseCaseErrorType {
	return typeof value === 'string' && Object.hasOwn(USE_CASE_ERROR_STATUS, value);
}

/**
 * @example
 * ```typescript
 * UseCaseError.businessRule('EMAIL_EXISTS', 'Email is already registered', { email });
 * UseCaseError.httpStatus(error); // 409
 * ```
 */
export const UseCaseError = {
	validation: factory('validation'),
	notFound: factory('not_found'),
	businessRule: factory('business_rule'),
	concurrency: factory('concurrency'),
	unavailable: factory('unavailable'),
	internal: factory('internal'),

	httpStatus(error: UseCaseError): number {
		return USE_CASE_ERROR_STATUS[error.type];
	},

	isUseCaseError(value: unknown): value is UseCaseError {
		if (typeof value !== 'object' || value === null) {
			return false;
		}
		return (
			'type' in value &&
			isErrorType(value.type) &&
			'code' in value &&
			typeof value.code === 'string' &&
			'message' in value &&
			typeof value.message === 'string' &&
			'details' in value &&
			typeof value.details === 'object' &&
			value.details !== null
		);
	},
};
