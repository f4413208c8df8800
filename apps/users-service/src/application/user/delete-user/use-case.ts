/**
 * Delete User Use Case
 *
 * Removes the account and returns what it looked like.
 */

import type { UseCase } from '@quarry/application';
import { Result, ExecutionContext, UseCaseError, type UnitOfWork } from '@quarry/application';

import { toPublicUser, type PublicUser } from '../../../domain/index.js';
import type { UserRepository } from '../../../infrastructure/persistence/index.js';

import type { DeleteUserCommand } from './command.js';

export interface DeleteUserUseCaseDeps {
	readonly userRepository: UserRepository;
	readonly unitOfWork: UnitOfWork;
}

export function createDeleteUserUseCase(deps: DeleteUserUseCaseDeps): UseCase<DeleteUserCommand, PublicUser> {
	const { userRepository, unitOfWork } = deps;

	return {
		async execute(command: DeleteUserCommand, context: ExecutionContext): Promise<Result<PublicUser>> {
			return unitOfWork.run<PublicUser>(context, async (session) => {
				const user = await userRepository.find(session, command.userId);
				if (!user) {
					return Result.failure(
						UseCaseError.notFound('USER_NOT_FOUND', `User ${command.userId} not found`, { userId: command.userId }),
					);
				}

				await userRepository.delete(session, user.id);
				return toPublicUser(user);
			});
		},
	};
}
