#!/usr/bin/env node
/**
 * quarry-users entry point
 */

import { runCli } from './cli.js';

process.exitCode = await runCli(process.argv.slice(2));
