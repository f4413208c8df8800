/**
 * Update User Use Case
 */

import type { UseCase } from '@quarry/application';
import {
	validateEmail,
	validateFormat,
	Result,
	ExecutionContext,
	UseCaseError,
	type UnitOfWork,
} from '@quarry/application';

import { toPublicUser, USERNAME_PATTERN, type PublicUser, type UserPatch } from '../../../domain/index.js';
import type { PasswordService } from '../../../infrastructure/crypto/password-service.js';
import type { UserRepository } from '../../../infrastructure/persistence/index.js';
import { emailExists, passwordFailure, usernameExists, withLoginConflicts } from '../errors.js';

import type { UpdateUserCommand } from './command.js';

export interface UpdateUserUseCaseDeps {
	readonly userRepository: UserRepository;
	readonly passwordService: PasswordService;
	readonly unitOfWork: UnitOfWork;
}

export function createUpdateUserUseCase(deps: UpdateUserUseCaseDeps): UseCase<UpdateUserCommand, PublicUser> {
	const { userRepository, passwordService, unitOfWork } = deps;

	return {
		async execute(command: UpdateUserCommand, context: ExecutionContext): Promise<Result<PublicUser>> {
			const { email, username, password } = command;

			if (email !== undefined) {
				const emailResult = validateEmail(email);
				if (Result.isFailure(emailResult)) {
					return Result.failure(emailResult.error);
				}
			}

			if (username !== undefined) {
				const usernameResult = validateFormat(username, USERNAME_PATTERN, 'username', 'INVALID_USERNAME');
				if (Result.isFailure(usernameResult)) {
					return Result.failure(usernameResult.error);
				}
			}

			let hashedPassword: string | undefined;
			if (password !== undefined) {
				const hashed = await passwordService.validateAndHash(password);
				if (hashed.isErr()) {
					return Result.failure(passwordFailure(hashed.error));
				}
				hashedPassword = hashed.value;
			}

			const result = await unitOfWork.run<PublicUser>(context, async (session) => {
				const existing = await userRepository.find(session, command.userId);
				if (!existing) {
					return Result.failure(
						UseCaseError.notFound('USER_NOT_FOUND', `User ${command.userId} not found`, { userId: command.userId }),
					);
				}

				if (email !== undefined && email !== existing.email) {
					const holder = await userRepository.findByEmail(session, email);
					if (holder && holder.id !== existing.id) {
						return Result.failure(emailExists(email));
					}
				}
				if (username !== undefined && username !== existing.username) {
					const holder = await userRepository.findByUsername(session, username);
					if (holder && holder.id !== existing.id) {
						return Result.failure(usernameExists(username));
					}
				}

				const patch: UserPatch = {
					email,
					username,
					hashedPassword,
					fullName: command.fullName,
					isActive: command.isActive,
					isSuperuser: command.isSuperuser,
				};
				const updated = await userRepository.update(session, existing.id, patch);
				return toPublicUser(updated);
			});

			return withLoginConflicts(result, command);
		},
	};
}
