/**
 * Delete User
 */

export type { DeleteUserCommand } from './command.js';
export { createDeleteUserUseCase, type DeleteUserUseCaseDeps } from './use-case.js';
