/**
 * Create User Use Case
 *
 * Registers a new account. Email and username must both be unused.
 */

import type { UseCase } from '@quarry/application';
import {
	validateAll,
	validateEmail,
	validateFormat,
	validateRequired,
	Result,
	ExecutionContext,
	type UnitOfWork,
} from '@quarry/application';

import { toPublicUser, USERNAME_PATTERN, type PublicUser } from '../../../domain/index.js';
import type { PasswordService } from '../../../infrastructure/crypto/password-service.js';
import type { UserRepository } from '../../../infrastructure/persistence/index.js';
import { emailExists, passwordFailure, usernameExists, withLoginConflicts } from '../errors.js';

import type { CreateUserCommand } from './command.js';

export interface CreateUserUseCaseDeps {
	readonly userRepository: UserRepository;
	readonly passwordService: PasswordService;
	readonly unitOfWork: UnitOfWork;
}

export function createCreateUserUseCase(deps: CreateUserUseCaseDeps): UseCase<CreateUserCommand, PublicUser> {
	const { userRepository, passwordService, unitOfWork } = deps;

	return {
		async execute(command: CreateUserCommand, context: ExecutionContext): Promise<Result<PublicUser>> {
			const checked = validateAll(
				() => validateRequired(command.email, 'email', 'EMAIL_REQUIRED'),
				() => validateEmail(command.email),
				() => validateRequired(command.username, 'username', 'USERNAME_REQUIRED'),
				() =>
					validateFormat(
						command.username,
						USERNAME_PATTERN,
						'username',
						'INVALID_USERNAME',
						'Username must be 3-50 letters, digits, dots, dashes or underscores',
					),
			);
			if (Result.isFailure(checked)) {
				return Result.failure(checked.error);
			}

			// Key derivation must not hold a pooled connection.
			const hashed = await passwordService.validateAndHash(command.password);
			if (hashed.isErr()) {
				return Result.failure(passwordFailure(hashed.error));
			}

			const result = await unitOfWork.run<PublicUser>(context, async (session) => {
				if (await userRepository.findByEmail(session, command.email)) {
					return Result.failure(emailExists(command.email));
				}
				if (await userRepository.findByUsername(session, command.username)) {
					return Result.failure(usernameExists(command.username));
				}

				const user = await userRepository.create(session, {
					email: command.email,
					username: command.username,
					hashedPassword: hashed.value,
					fullName: command.fullName ?? null,
					isActive: command.isActive ?? true,
					isSuperuser: command.isSuperuser ?? false,
				});
				return toPublicUser(user);
			});

			return withLoginConflicts(result, command);
		},
	};
}
