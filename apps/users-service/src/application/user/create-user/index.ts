/**
 * Create User
 */

export type { CreateUserCommand } from './command.js';
export { createCreateUserUseCase, type CreateUserUseCaseDeps } from './use-case.js';
