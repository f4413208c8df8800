/**
 * Authenticate Use Case
 *
 * Checks an email/password pair. Unknown emails and wrong passwords fail
 * with the same error, after the same Argon2 work. A hash made with
 * outdated cost parameters is replaced on success.
 *
 * No session is held while Argon2 runs: the user is read in one unit of
 * work and the upgraded hash written in another, only if the stored hash
 * is still the one that was verified.
 */

import type { UseCase } from '@quarry/application';
import { Result, ExecutionContext, UseCaseError, type UnitOfWork } from '@quarry/application';
import type { Logger } from '@quarry/logging';

import { toPublicUser, type PublicUser, type User } from '../../../domain/index.js';
import type { PasswordService } from '../../../infrastructure/crypto/password-service.js';
import type { UserRepository } from '../../../infrastructure/persistence/index.js';

import type { AuthenticateCommand } from './command.js';

export interface AuthenticateUseCaseDeps {
	readonly userRepository: UserRepository;
	readonly passwordService: PasswordService;
	readonly unitOfWork: UnitOfWork;
	readonly logger: Logger;
}

const INVALID_CREDENTIALS = UseCaseError.validation('INVALID_CREDENTIALS', 'Incorrect email or password');

export function createAuthenticateUseCase(deps: AuthenticateUseCaseDeps): UseCase<AuthenticateCommand, PublicUser> {
	const { userRepository, passwordService, unitOfWork, logger } = deps;

	/**
	 * Write a hash made with the current parameters. Falls back to the user
	 * as read when hashing or the write fails; the old hash still verifies.
	 */
	async function upgradeHash(user: User, password: string, context: ExecutionContext): Promise<Result<PublicUser> | null> {
		const rehashed = await passwordService.hash(password);
		if (rehashed.isErr()) {
			logger.warn({ userId: user.id, error: rehashed.error }, 'Password rehash failed');
			return null;
		}

		const result = await unitOfWork.run<PublicUser>(context, async (session) => {
			const current = await userRepository.find(session, user.id);
			if (!current || current.hashedPassword !== user.hashedPassword) {
				// Changed or deleted since it was read
				return toPublicUser(current ?? user);
			}
			const updated = await userRepository.update(session, user.id, { hashedPassword: rehashed.value });
			return toPublicUser(updated);
		});

		if (Result.isFailure(result)) {
			logger.warn({ userId: user.id, error: result.error }, 'Password rehash not stored');
			return null;
		}
		return result;
	}

	return {
		async execute(command: AuthenticateCommand, context: ExecutionContext): Promise<Result<PublicUser>> {
			const found = await unitOfWork.run<User | undefined>(context, (session) =>
				userRepository.findByEmail(session, command.email),
			);
			if (Result.isFailure(found)) {
				return Result.failure(found.error);
			}

			const user = found.value;
			const verified = await passwordService.verify(command.password, user?.hashedPassword);
			if (!user || !verified) {
				return Result.failure(INVALID_CREDENTIALS);
			}

			if (!user.isActive) {
				return Result.failure(UseCaseError.businessRule('USER_INACTIVE', 'User is inactive', { userId: user.id }));
			}

			if (passwordService.needsRehash(user.hashedPassword)) {
				const upgraded = await upgradeHash(user, command.password, context);
				if (upgraded) {
					return upgraded;
				}
			}

			return Result.map(found, () => toPublicUser(user));
		},
	};
}
