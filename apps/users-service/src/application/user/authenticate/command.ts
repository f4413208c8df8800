/**
 * Authenticate Command
 */

import type { Command } from '@quarry/application';

export interface AuthenticateCommand extends Command {
	readonly email: string;
	readonly password: string;
}
