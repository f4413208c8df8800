/**
 * User Repository
 *
 * The generic repository over the users table, plus lookups by the two
 * unique login keys.
 */

import { createRepository, type Repository, type Session } from '@quarry/persistence';
import { userSchema, type NewUser, type User, type UserPatch } from '../../../domain/index.js';
import { users } from '../schema/users.js';

export interface UserRepository extends Repository<User, NewUser, UserPatch> {
	findByEmail(session: Session, email: string): Promise<User | undefined>;
	findByUsername(session: Session, username: string): Promise<User | undefined>;
}

/**
 * Unique constraint names from the users migration, keyed to their fields.
 */
export const USER_UNIQUE_CONSTRAINTS = {
	uq_users_email: ['email'],
	uq_users_username: ['username'],
} as const;

export function createUserRepository(options: { maxListLimit?: number } = {}): UserRepository {
	const repository = createRepository<User, NewUser, UserPatch>({
		name: 'User',
		table: users,
		schema: userSchema,
		uniqueConstraints: USER_UNIQUE_CONSTRAINTS,
		...options,
	});

	return {
		...repository,

		findByEmail(session, email) {
			return repository.findOne(session, { email });
		},

		findByUsername(session, username) {
			return repository.findOne(session, { username });
		},
	};
}
