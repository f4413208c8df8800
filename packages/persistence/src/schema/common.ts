/**
 * Common Schema Definitions
 *
 * Shared column definitions used across tables.
 */

import { serial, timestamp } from 'drizzle-orm/pg-core';

/**
 * Standard timestamp column with timezone.
 */
export const timestampColumn = (name: string) => timestamp(name, { withTimezone: true, mode: 'date' });

/**
 * Columns every entity table carries.
 * - id: serial primary key
 * - createdAt: set by the store on insert
 * - updatedAt: set on insert and refreshed by every repository update
 */
export const baseEntityColumns = {
	id: serial('id').primaryKey(),
	createdAt: timestampColumn('created_at').notNull().defaultNow(),
	updatedAt: timestampColumn('updated_at')
		.notNull()
		.defaultNow()
		.$onUpdate(() => new Date()),
};

/**
 * Fields shared by entities stored in a table built on baseEntityColumns.
 */
export interface BaseEntity {
	readonly id: number;
	readonly createdAt: Date;
	readonly updatedAt: Date;
}

/**
 * Input type for creating an entity: generated fields are left out.
 */
export type NewEntity<T extends BaseEntity> = Omit<T, 'id' | 'createdAt' | 'updatedAt'>;
