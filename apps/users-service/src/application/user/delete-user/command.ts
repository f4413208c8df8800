/**
 * Delete User Command
 */

import type { Command } from '@quarry/application';

export interface DeleteUserCommand extends Command {
	readonly userId: number;
}
