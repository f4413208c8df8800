/**
 * Command Types
 *
 * Commands are the inputs of write operations: plain, immutable data
 * describing what the caller wants done.
 *
 * @example
 * ```typescript
 * interface CreateUserCommand extends Command {
 *     readonly email: string;
 *     readonly username: string;
 *     readonly password: string;
 * }
 * ```
 */

/**
 * Base interface for all commands.
 */
export interface Command {
	/**
	 * Optional operation type identifier, used in logs.
	 */
	readonly _type?: string;
}

/**
 * Command where every field is optional, for partial updates.
 */
export type PartialCommand<T extends Command> = {
	readonly [K in keyof T]?: T[K];
};

/**
 * Tag a command with its operation type.
 */
export function createCommand<T extends Record<string, unknown>>(type: string, data: T): Command & T {
	return { _type: type, ...data };
}
