/**
 * @quarry/logging
 *
 * pino loggers for Quarry services. Components do not create loggers: they
 * receive one and bind their own name with componentLogger().
 */

import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Paths censored on every line. Passwords travel in commands; hashes in
 * user rows.
 */
export const REDACTED_PATHS = ['password', 'hashedPassword', '*.password', '*.hashedPassword'];

export interface LoggerConfig {
	level: LogLevel;
	/** Written to every line as `service` */
	service: string;
	/** pino-pretty output, for development only */
	pretty?: boolean;
	/** Extra fields for every line */
	bindings?: Record<string, unknown>;
}

/**
 * Create the root logger of a process.
 *
 * @param destination - where JSON lines go (default: stdout); ignored when pretty
 */
export function createLogger(config: LoggerConfig, destination?: DestinationStream): Logger {
	const options: LoggerOptions = {
		level: config.level,
		base: { service: config.service, ...config.bindings },
		redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
		timestamp: pino.stdTimeFunctions.isoTime,
		formatters: {
			level: (label) => ({ level: label }),
		},
	};

	if (config.pretty) {
		return pino({
			...options,
			transport: {
				target: 'pino-pretty',
				options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname,service' },
			},
		});
	}

	return destination ? pino(options, destination) : pino(options);
}

/**
 * Child logger tagged with `component`.
 */
export function componentLogger(parent: Logger, component: string): Logger {
	return parent.child({ component });
}

export function createSilentLogger(): Logger {
	return pino({ level: 'silent' });
}

let defaultLogger: Logger | null = null;

/**
 * Install the process-wide logger; entry points call this once at start-up.
 */
export function setDefaultLogger(logger: Logger): void {
	defaultLogger = logger;
}

/**
 * The process-wide logger, or an info-level one if none was installed.
 */
export function getLogger(): Logger {
	if (!defaultLogger) {
		defaultLogger = createLogger({ level: 'info', service: 'quarry' });
	}
	return defaultLogger;
}

/**
 * Bindings attached to every line written while a session is open.
 */
export interface SessionLogContext {
	sessionId: string;
	connectionId: number;
	correlationId: string;
	[key: string]: unknown;
}
