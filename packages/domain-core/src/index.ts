/**
 * @quarry/domain-core
 *
 * Shared types for the service boundary:
 * - Result / UseCaseError for service operation outcomes
 * - ExecutionContext for correlation and cancellation of a request
 * - TracingContext for correlation IDs carried in AsyncLocalStorage
 */

export {
	type UseCaseErrorBase,
	type UseCaseErrorType,
	type ValidationError,
	type NotFoundError,
	type BusinessRuleViolation,
	type ConcurrencyError,
	type UnavailableError,
	type InternalError,
	UseCaseError,
	USE_CASE_ERROR_STATUS,
} from './errors.js';

export {
	type Success,
	type Failure,
	type ResultSuccessToken,
	Result,
	RESULT_SUCCESS_TOKEN,
	isSuccess,
	isFailure,
	isFailureValue,
} from './result.js';

export { type ExecutionContextOptions, ExecutionContext } from './execution-context.js';

export { type TracingContextData, TracingContext } from './tracing-context.js';
