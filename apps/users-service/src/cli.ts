/**
 * Store maintenance CLI
 *
 *   quarry-users migrate   Apply pending migrations
 *   quarry-users status    Print the schema version and pending migrations
 *   quarry-users health    Probe the store; exits 1 when unhealthy
 */

import type { Env } from '@quarry/config';
import { ExecutionContext } from '@quarry/domain-core';
import { createLogger, setDefaultLogger } from '@quarry/logging';
import { checkStoreHealth, loadStoreConfig } from '@quarry/persistence';

import { createUsersApp, type UsersApp, type UsersAppConfig } from './bootstrap/index.js';
import { loadUsersEnv } from './env.js';

const USAGE = `Usage: quarry-users <command>

Commands:
  migrate   Apply pending migrations
  status    Print the schema version and pending migrations
  health    Probe the store (exit code 1 when unhealthy)
  help      Show this help message

Environment:
  DATABASE_PROVIDER   postgres (default) or embedded
  DATABASE_URL        PostgreSQL connection string, or the embedded data directory
  MIGRATIONS_DIR      Directory of NNNN_name.sql files
  LOG_LEVEL           trace, debug, info (default), warn, error, fatal, silent`;

type Print = (line: string) => void;

export interface CliOptions {
	readonly env?: Env;
	readonly print?: Print;
	readonly printError?: Print;
}

type CommandHandler = (app: UsersApp, print: Print) => Promise<number>;

const COMMANDS = {
	async migrate(app, print) {
		const applied = await app.migrations.migrate(ExecutionContext.system('migrate'));
		print(applied.length > 0 ? `Applied migrations: ${applied.join(', ')}` : 'Schema is up to date');
		return 0;
	},

	async status(app, print) {
		const context = ExecutionContext.system('status');
		const current = await app.migrations.current(context);
		const pending = await app.migrations.pending(undefined, context);
		print(`Current version: ${current ?? 'none'}`);
		print(`Pending: ${pending.length > 0 ? pending.join(', ') : 'none'}`);
		return 0;
	},

	async health(app, print) {
		const health = await checkStoreHealth(app.store.pool, { probe: true });
		print(`Store: ${health.healthy ? 'healthy' : 'unhealthy'}`);
		for (const issue of health.issues) {
			print(`  - ${issue}`);
		}
		const { total, idle, checkedOut } = health.pool;
		print(`Connections: ${total} open, ${idle} idle, ${checkedOut} checked out, capacity ${app.store.pool.capacity}`);
		return health.healthy ? 0 : 1;
	},
} satisfies Record<string, CommandHandler>;

type CommandName = keyof typeof COMMANDS;

function isCommand(value: string): value is CommandName {
	return Object.hasOwn(COMMANDS, value);
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Build the app configuration from environment variables.
 */
export function configFromEnv(env: Env): UsersAppConfig {
	const usersEnv = loadUsersEnv(env);
	const logger = createLogger({ level: usersEnv.LOG_LEVEL, service: 'users-service', pretty: usersEnv.LOG_PRETTY });
	setDefaultLogger(logger);

	return {
		store: loadStoreConfig(env),
		logger,
		migrationsDir: usersEnv.MIGRATIONS_DIR,
		strictMigrations: usersEnv.MIGRATIONS_STRICT,
		passwordHashing: {
			memoryCost: usersEnv.PASSWORD_MEMORY_COST,
			timeCost: usersEnv.PASSWORD_TIME_COST,
			parallelism: usersEnv.PASSWORD_PARALLELISM,
		},
	};
}

/**
 * Run one CLI command.
 *
 * @returns the process exit code
 */
export async function runCli(args: readonly string[], options: CliOptions = {}): Promise<number> {
	const env = options.env ?? process.env;
	const print = options.print ?? ((line: string) => console.log(line));
	const printError = options.printError ?? ((line: string) => console.error(line));

	const [command] = args;
	if (command === undefined || command === 'help' || command === '--help' || command === '-h') {
		print(USAGE);
		return command === undefined ? 2 : 0;
	}
	if (!isCommand(command)) {
		printError(`Unknown command: ${command}\n`);
		printError(USAGE);
		return 2;
	}

	let app: UsersApp;
	try {
		app = await createUsersApp(configFromEnv(env));
	} catch (error) {
		printError(`Failed to start: ${errorMessage(error)}`);
		return 1;
	}

	try {
		return await COMMANDS[command](app, print);
	} catch (error) {
		printError(`${command} failed: ${errorMessage(error)}`);
		return 1;
	} finally {
		await app.close();
	}
}
