/**
 * Migration Tracker
 *
 * Records which numbered schema scripts have run in the `schema_migrations`
 * table and applies the missing ones.
 *
 * Each migration runs in a single session together with its ledger row.
 * PostgreSQL DDL is transactional, so a script that fails midway leaves
 * neither schema changes nor a record behind. Scripts must therefore not
 * issue their own BEGIN/COMMIT.
 */

import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { asc, eq, max } from 'drizzle-orm';
import { componentLogger, type Logger } from '@quarry/logging';
import { OutOfOrderMigrationError, UnknownMigrationError } from './errors.js';
import { CREATE_SCHEMA_MIGRATIONS, schemaMigrations } from './schema/migrations.js';
import type { Session } from './session.js';
import type { SessionContext, SessionManager } from './session-manager.js';

export interface Migration {
	readonly version: number;
	readonly name: string;
	/** SQL applied as-is inside the migration's transaction */
	readonly script: string;
}

export interface MigrationRecord {
	readonly version: number;
	readonly name: string;
	readonly appliedAt: Date;
}

export interface MigrationTrackerOptions {
	/**
	 * Require each migration to be exactly current + 1 (default: true).
	 * Non-strict trackers apply any declared version not yet recorded.
	 */
	readonly strict?: boolean;
	readonly logger: Logger;
}

const MIGRATION_FILE = /^(\d+)_([A-Za-z0-9_-]+)\.sql$/;

/**
 * Read `NNNN_name.sql` files from a directory, ordered by version.
 * Other files are ignored.
 */
export async function loadMigrations(directory: string): Promise<Migration[]> {
	const files = await readdir(directory);
	const migrations: Migration[] = [];

	for (const file of files) {
		const match = MIGRATION_FILE.exec(file);
		if (!match) continue;
		const [, version, name] = match;
		if (version === undefined || name === undefined) continue;

		migrations.push({
			version: Number.parseInt(version, 10),
			name,
			script: await readFile(join(directory, file), 'utf8'),
		});
	}

	return migrations.sort((a, b) => a.version - b.version);
}

export class MigrationTracker {
	private readonly migrations = new Map<number, Migration>();
	private readonly declared: readonly number[];
	private readonly strict: boolean;
	private readonly logger: Logger;

	constructor(
		private readonly sessions: SessionManager,
		migrations: readonly Migration[],
		options: MigrationTrackerOptions,
	) {
		for (const migration of migrations) {
			if (!Number.isInteger(migration.version) || migration.version < 1) {
				throw new RangeError(`Migration version must be a positive integer, got ${migration.version}`);
			}
			if (this.migrations.has(migration.version)) {
				throw new Error(`Migration ${migration.version} is declared more than once`);
			}
			this.migrations.set(migration.version, migration);
		}
		this.declared = [...this.migrations.keys()].sort((a, b) => a - b);
		this.strict = options.strict ?? true;
		this.logger = componentLogger(options.logger, 'MigrationTracker');
	}

	/**
	 * Highest applied version, or null on a fresh store.
	 */
	async current(context?: SessionContext): Promise<number | null> {
		return this.sessions.run(async (session) => {
			await ensureLedger(session);
			return currentVersion(session);
		}, context);
	}

	/**
	 * Every recorded migration, oldest first.
	 */
	async applied(context?: SessionContext): Promise<MigrationRecord[]> {
		return this.sessions.run(async (session) => {
			await ensureLedger(session);
			const rows = await session.db.select().from(schemaMigrations).orderBy(asc(schemaMigrations.version));
			return rows.map((row) => ({ version: row.version, name: row.name, appliedAt: row.appliedAt }));
		}, context);
	}

	/**
	 * Versions from `declared` (all declared migrations by default) that have
	 * not been applied, ascending.
	 */
	async pending(declared: readonly number[] = this.declared, context?: SessionContext): Promise<number[]> {
		const applied = new Set((await this.applied(context)).map((record) => record.version));
		return [...new Set(declared)].filter((version) => !applied.has(version)).sort((a, b) => a - b);
	}

	/**
	 * Apply one migration.
	 *
	 * @returns false if it was already applied (it is never run twice)
	 * @throws UnknownMigrationError if the version is not declared
	 * @throws OutOfOrderMigrationError if a strict chain would be broken
	 */
	async apply(version: number, context?: SessionContext): Promise<boolean> {
		const migration = this.migrations.get(version);
		if (!migration) {
			throw new UnknownMigrationError(version);
		}

		return this.sessions.run(async (session) => {
			await ensureLedger(session);
			// Concurrent appliers queue here until the first one commits.
			await session.runScript('lock table schema_migrations in share row exclusive mode');

			const existing = await session.db
				.select({ version: schemaMigrations.version })
				.from(schemaMigrations)
				.where(eq(schemaMigrations.version, version))
				.limit(1);
			if (existing.length > 0) {
				this.logger.debug({ version }, 'Migration already applied');
				return false;
			}

			const current = await currentVersion(session);
			if (this.strict) {
				const expected = current === null ? (this.declared[0] ?? version) : current + 1;
				if (version !== expected) {
					throw new OutOfOrderMigrationError(version, expected, current);
				}
			}

			this.logger.info({ version, name: migration.name }, 'Applying migration');
			await session.runScript(migration.script);
			await session.db.insert(schemaMigrations).values({ version, name: migration.name });
			session.recordWrite();
			return true;
		}, context);
	}

	/**
	 * Apply every pending migration in order.
	 *
	 * @returns the versions applied by this call
	 */
	async migrate(context?: SessionContext): Promise<number[]> {
		const applied: number[] = [];
		for (const version of await this.pending(this.declared, context)) {
			if (await this.apply(version, context)) {
				applied.push(version);
			}
		}

		if (applied.length > 0) {
			this.logger.info({ applied }, 'Migrations applied');
		} else {
			this.logger.info('Schema is up to date');
		}
		return applied;
	}
}

async function ensureLedger(session: Session): Promise<void> {
	await session.runScript(CREATE_SCHEMA_MIGRATIONS);
}

async function currentVersion(session: Session): Promise<number | null> {
	const [row] = await session.db.select({ version: max(schemaMigrations.version) }).from(schemaMigrations);
	return row?.version ?? null;
}
