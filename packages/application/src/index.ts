/**
 * @quarry/application
 *
 * Service layer:
 * - UnitOfWork, the commit boundary of every write
 * - Command and UseCase types for write operations
 * - Validation helpers returning Results
 * - Operations services grouping a resource's reads and writes
 */

export { type Command, type PartialCommand, createCommand } from './command.js';

export { type UseCase, type UseCaseCommand, type UseCaseResult } from './use-case.js';

export {
	createUnitOfWork,
	toUseCaseError,
	UnitOfWorkRollback,
	type UnitOfWork,
	type UnitOfWorkConfig,
} from './unit-of-work.js';

export {
	validateRequired,
	validateFormat,
	validateMaxLength,
	validateMinLength,
	validateEmail,
	validateWith,
	validateAll,
} from './validation.js';

export {
	type WriteOperation,
	type ReadOperation,
	type OperationsType,
	wrapUseCase,
	createOperationsService,
} from './operations.js';

// Re-export commonly used types from domain-core for convenience
export {
	Result,
	isSuccess,
	isFailure,
	type Success,
	type Failure,
	UseCaseError,
	ExecutionContext,
} from '@quarry/domain-core';
