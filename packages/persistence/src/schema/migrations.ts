/**
 * Migration ledger table.
 *
 * Created on demand by the MigrationTracker, never by a migration script.
 */

import { integer, pgTable, text } from 'drizzle-orm/pg-core';
import { timestampColumn } from './common.js';

export const schemaMigrations = pgTable('schema_migrations', {
	version: integer('version').primaryKey(),
	name: text('name').notNull(),
	appliedAt: timestampColumn('applied_at').notNull().defaultNow(),
});

export type SchemaMigrationRecord = typeof schemaMigrations.$inferSelect;

export const CREATE_SCHEMA_MIGRATIONS = `
create table if not exists schema_migrations (
	version integer primary key,
	name text not null,
	applied_at timestamptz not null default now()
)`;
