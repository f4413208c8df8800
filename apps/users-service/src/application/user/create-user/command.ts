/**
 * Create User Command
 */

import type { Command } from '@quarry/application';

export interface CreateUserCommand extends Command {
	readonly email: string;
	readonly username: string;
	/** Plain text password (will be hashed) */
	readonly password: string;
	readonly fullName?: string | null;
	readonly isActive?: boolean;
	readonly isSuperuser?: boolean;
}
