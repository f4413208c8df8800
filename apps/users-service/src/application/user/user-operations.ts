/**
 * User Operations
 *
 * Every action on users. Writes go through use cases and their unit of
 * work; getUser opens a session of its own, and listUsers validates its
 * paging first and so reports failures as a Result.
 */

import { z } from 'zod/v4';
import {
	createOperationsService,
	createUnitOfWork,
	validateWith,
	Result,
	type ExecutionContext,
} from '@quarry/application';
import { componentLogger, type Logger } from '@quarry/logging';
import { createPagedResult, type Filter, type PagedResult, type SessionManager } from '@quarry/persistence';

import { toPublicUser, type PublicUser, type User } from '../../domain/index.js';
import type { PasswordService } from '../../infrastructure/crypto/password-service.js';
import type { UserRepository } from '../../infrastructure/persistence/index.js';
import { createAuthenticateUseCase } from './authenticate/index.js';
import { createCreateUserUseCase } from './create-user/index.js';
import { createDeleteUserUseCase } from './delete-user/index.js';
import { createUpdateUserUseCase } from './update-user/index.js';

export const DEFAULT_PAGE_SIZE = 20;

export interface ListUsersQuery {
	/** Zero-based (default: 0) */
	readonly page?: number;
	/** Capped at the repository's list limit (default: 20) */
	readonly pageSize?: number;
	readonly isActive?: boolean;
}

const pagingSchema = z.object({
	page: z.number().int({ error: 'must be an integer' }).min(0, { error: 'must not be negative' }).default(0),
	pageSize: z
		.number()
		.int({ error: 'must be an integer' })
		.min(1, { error: 'must be at least 1' })
		.default(DEFAULT_PAGE_SIZE),
});

export interface UserOperationsDeps {
	readonly sessions: SessionManager;
	readonly userRepository: UserRepository;
	readonly passwordService: PasswordService;
	readonly logger: Logger;
}

export function createUserOperations(deps: UserOperationsDeps) {
	const { sessions, userRepository, passwordService } = deps;
	const logger = componentLogger(deps.logger, 'UserOperations');
	const unitOfWork = createUnitOfWork({ sessions, logger });

	async function getUser(userId: number, context: ExecutionContext): Promise<PublicUser | undefined> {
		return sessions.run(async (session) => {
			const user = await userRepository.find(session, userId);
			return user ? toPublicUser(user) : undefined;
		}, context);
	}

	async function listUsers(query: ListUsersQuery, context: ExecutionContext): Promise<Result<PagedResult<PublicUser>>> {
		const paging = validateWith(pagingSchema, { page: query.page, pageSize: query.pageSize }, 'INVALID_PAGE');
		if (Result.isFailure(paging)) {
			return Result.failure(paging.error);
		}

		const { page } = paging.value;
		const pageSize = Math.min(paging.value.pageSize, userRepository.maxListLimit);
		const filter: Filter<User> = query.isActive === undefined ? {} : { isActive: query.isActive };

		return unitOfWork.run<PagedResult<PublicUser>>(context, async (session) => {
			const items = await userRepository.list(session, { filter, offset: page * pageSize, limit: pageSize });
			const total = await userRepository.count(session, filter);
			return createPagedResult(items.map(toPublicUser), page, pageSize, total);
		});
	}

	return createOperationsService()
		.write('createUser', createCreateUserUseCase({ userRepository, passwordService, unitOfWork }))
		.write('updateUser', createUpdateUserUseCase({ userRepository, passwordService, unitOfWork }))
		.write('deleteUser', createDeleteUserUseCase({ userRepository, unitOfWork }))
		.write('authenticate', createAuthenticateUseCase({ userRepository, passwordService, unitOfWork, logger }))
		.read('getUser', getUser)
		.read('listUsers', listUsers)
		.build();
}

export type UserOperations = ReturnType<typeof createUserOperations>;
