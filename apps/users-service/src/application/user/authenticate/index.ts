/**
 * Authenticate
 */

export type { AuthenticateCommand } from './command.js';
export { createAuthenticateUseCase, type AuthenticateUseCaseDeps } from './use-case.js';
