/**
 * Users Database Schema
 *
 * Mirrors migrations/0001_create_users.sql. The migration is the source of
 * truth for the table; this definition only drives queries.
 */

import { boolean, index, pgTable, unique, varchar } from 'drizzle-orm/pg-core';
import { baseEntityColumns } from '@quarry/persistence';

export const users = pgTable(
	'users',
	{
		...baseEntityColumns,
		email: varchar('email', { length: 255 }).notNull(),
		username: varchar('username', { length: 50 }).notNull(),
		hashedPassword: varchar('hashed_password', { length: 255 }).notNull(),
		fullName: varchar('full_name', { length: 255 }),
		isActive: boolean('is_active').notNull().default(true),
		isSuperuser: boolean('is_superuser').notNull().default(false),
	},
	(table) => [
		unique('uq_users_email').on(table.email),
		unique('uq_users_username').on(table.username),
		index('idx_users_active').on(table.isActive, table.id),
	],
);

export type UserRecord = typeof users.$inferSelect;
