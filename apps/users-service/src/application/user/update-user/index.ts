/**
 * Update User
 */

export type { UpdateUserCommand } from './command.js';
export { createUpdateUserUseCase, type UpdateUserUseCaseDeps } from './use-case.js';
