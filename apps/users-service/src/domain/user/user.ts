/**
 * User Entity
 *
 * An account that can sign in. The password hash never leaves the service:
 * callers only ever see a PublicUser.
 */

import { z } from 'zod/v4';
import type { BaseEntity } from '@quarry/persistence';

export const USERNAME_PATTERN = /^[A-Za-z0-9_.-]{3,50}$/;

/**
 * Row shape as read from the users table.
 */
export const userSchema = z.object({
	id: z.number().int().positive(),
	email: z.string(),
	username: z.string(),
	hashedPassword: z.string(),
	fullName: z.string().nullable(),
	isActive: z.boolean(),
	isSuperuser: z.boolean(),
	createdAt: z.date(),
	updatedAt: z.date(),
});

export interface User extends BaseEntity {
	readonly email: string;
	readonly username: string;
	readonly hashedPassword: string;
	readonly fullName: string | null;
	/** Inactive users cannot authenticate */
	readonly isActive: boolean;
	readonly isSuperuser: boolean;
}

/**
 * Fields accepted when inserting a user.
 */
export interface NewUser {
	readonly email: string;
	readonly username: string;
	readonly hashedPassword: string;
	readonly fullName?: string | null;
	readonly isActive?: boolean;
	readonly isSuperuser?: boolean;
}

export type UserPatch = Partial<NewUser>;

export type PublicUser = Omit<User, 'hashedPassword'>;

export function toPublicUser(user: User): PublicUser {
	return {
		id: user.id,
		email: user.email,
		username: user.username,
		fullName: user.fullName,
		isActive: user.isActive,
		isSuperuser: user.isSuperuser,
		createdAt: user.createdAt,
		updatedAt: user.updatedAt,
	};
}
