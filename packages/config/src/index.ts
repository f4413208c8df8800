/**
 * @quarry/config
 *
 * Environment parsing for Quarry services. Variables are read once at
 * start-up: a `.env` file in the working directory is loaded first, then
 * the environment is validated against a zod schema.
 */

import 'dotenv/config';
import { z } from 'zod/v4';

export { z } from 'zod/v4';

export type Env = Record<string, string | undefined>;

/**
 * Thrown by parseEnv(); `variables` maps each invalid variable to its
 * messages.
 */
export class EnvValidationError extends Error {
	constructor(readonly variables: Readonly<Record<string, readonly string[]>>) {
		const lines = Object.entries(variables).map(([name, messages]) => `  ${name}: ${messages.join(', ')}`);
		super(`Environment validation failed:\n${lines.join('\n')}`);
		this.name = 'EnvValidationError';
	}
}

/**
 * Validate environment variables against a schema.
 *
 * @throws EnvValidationError listing every invalid variable
 *
 * @example
 * ```typescript
 * const env = parseEnv(z.object({ LOG_LEVEL: EnvSchemas.logLevel(), PORT: EnvSchemas.integer(3000, 1) }));
 * ```
 */
export function parseEnv<TSchema extends z.ZodType>(schema: TSchema, env: Env = process.env): z.output<TSchema> {
	const result = schema.safeParse(env);
	if (result.success) {
		return result.data;
	}

	const variables: Record<string, string[]> = {};
	for (const issue of result.error.issues) {
		const [name = '(environment)'] = issue.path.map(String);
		const messages = variables[name] ?? [];
		messages.push(issue.message);
		variables[name] = messages;
	}
	throw new EnvValidationError(variables);
}

/**
 * Building blocks for environment schemas. Every variable arrives as a
 * string, so defaults are written the way a user would set them.
 *
 * Note: in zod v4, .default() on a transformed schema expects the OUTPUT
 * type; .prefault() supplies an INPUT default that is parsed like a set
 * value.
 */
export const EnvSchemas = {
	logLevel: () => z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

	/** `true`/`1` or `false`/`0` */
	flag: (fallback: boolean) =>
		z
			.enum(['true', 'false', '1', '0'])
			.transform((value) => value === 'true' || value === '1')
			.prefault(fallback ? 'true' : 'false'),

	/** Base-10 integer of at least `min` */
	integer: (fallback: number, min = 0) =>
		z
			.string()
			.regex(/^-?\d+$/, { error: 'Expected an integer' })
			.transform((value) => Number.parseInt(value, 10))
			.pipe(z.number().int().min(min))
			.prefault(String(fallback)),
};
