/**
 * User use cases and operations.
 */

export * from './create-user/index.js';
export * from './update-user/index.js';
export * from './delete-user/index.js';
export * from './authenticate/index.js';
export { emailExists, usernameExists, withLoginConflicts, passwordFailure } from './errors.js';
export {
	createUserOperations,
	DEFAULT_PAGE_SIZE,
	type ListUsersQuery,
	type UserOperations,
	type UserOperationsDeps,
} from './user-operations.js';
