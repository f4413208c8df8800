/**
 * Argon2id hashing for user passwords.
 *
 * Hashes are stored as PHC strings (`$argon2id$v=19$m=...,t=...,p=...$salt$hash`),
 * so the parameters a hash was made with travel with it and needsRehash()
 * can tell when they fall behind the configured ones.
 *
 * verify() without a stored hash still runs one Argon2 verification, so a
 * login for an unknown account costs as much as one with a wrong password.
 */

import argon2 from 'argon2';
import { type Result, ok, err, ResultAsync } from 'neverthrow';

export interface PasswordHashOptions {
	/** KiB */
	readonly memoryCost: number;
	readonly timeCost: number;
	readonly parallelism: number;
}

/** 64 MiB, 3 passes, 4 lanes */
export const DEFAULT_PASSWORD_HASH_OPTIONS: PasswordHashOptions = {
	memoryCost: 65536,
	timeCost: 3,
	parallelism: 4,
};

const PLACEHOLDER_PASSWORD = 'placeholder-password-0';

const PASSWORD_LENGTH = { min: 8, max: 128 } as const;

/** Checked in order; the first one that fails is reported. */
const PASSWORD_RULES: ReadonlyArray<{ readonly passes: (password: string) => boolean; readonly message: string }> = [
	{
		passes: (password) => password.length >= PASSWORD_LENGTH.min,
		message: `Password must be at least ${PASSWORD_LENGTH.min} characters`,
	},
	{
		passes: (password) => password.length <= PASSWORD_LENGTH.max,
		message: `Password must be at most ${PASSWORD_LENGTH.max} characters`,
	},
	{ passes: (password) => /\p{L}/u.test(password), message: 'Password must contain at least one letter' },
	{ passes: (password) => /\d/.test(password), message: 'Password must contain at least one digit' },
];

export type PasswordError =
	| { type: 'validation'; field: 'password'; message: string }
	| { type: 'hashing_failed'; message: string; cause?: Error | undefined };

export class PasswordService {
	private readonly argonOptions: argon2.Options;
	private placeholderHash: Promise<string> | null = null;

	constructor(options: Partial<PasswordHashOptions> = {}) {
		this.argonOptions = {
			...DEFAULT_PASSWORD_HASH_OPTIONS,
			...options,
			type: argon2.argon2id,
			hashLength: 32,
		};
	}

	hash(password: string): ResultAsync<string, PasswordError> {
		return ResultAsync.fromPromise(argon2.hash(password, this.argonOptions), (error): PasswordError => {
			const cause = error instanceof Error ? error : undefined;
			return { type: 'hashing_failed', message: `Could not hash password: ${cause?.message ?? String(error)}`, cause };
		});
	}

	/**
	 * False for a wrong password and for a stored value that is not an
	 * argon2 hash. Without `storedHash` the password is checked against a
	 * placeholder hash made with the configured parameters, and the result
	 * is always false.
	 */
	async verify(password: string, storedHash: string | undefined): Promise<boolean> {
		if (storedHash === undefined) {
			await this.verify(password, await this.placeholder());
			return false;
		}
		try {
			return await argon2.verify(storedHash, password);
		} catch {
			return false;
		}
	}

	/**
	 * True when `storedHash` was made with other parameters than the
	 * configured ones (or cannot be parsed).
	 */
	needsRehash(storedHash: string): boolean {
		try {
			return argon2.needsRehash(storedHash, this.argonOptions);
		} catch {
			return true;
		}
	}

	private placeholder(): Promise<string> {
		this.placeholderHash ??= argon2.hash(PLACEHOLDER_PASSWORD, this.argonOptions).catch((error: unknown) => {
			this.placeholderHash = null;
			throw error;
		});
		return this.placeholderHash;
	}

	/** 8-128 characters with at least one letter and one digit. */
	validateComplexity(password: string): Result<void, PasswordError> {
		const broken = PASSWORD_RULES.find((rule) => !rule.passes(password));
		if (broken) {
			return err({ type: 'validation', field: 'password', message: broken.message });
		}
		return ok(undefined);
	}

	validateAndHash(password: string): ResultAsync<string, PasswordError> {
		return this.validateComplexity(password).asyncAndThen(() => this.hash(password));
	}
}
