/**
 * Update User Command
 *
 * Only the provided fields change.
 */

import type { Command } from '@quarry/application';

export interface UpdateUserCommand extends Command {
	readonly userId: number;
	readonly email?: string;
	readonly username?: string;
	/** New plain text password (will be hashed) */
	readonly password?: string;
	/** `null` clears the name */
	readonly fullName?: string | null;
	readonly isActive?: boolean;
	readonly isSuperuser?: boolean;
}
