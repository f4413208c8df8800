import { describe, it, expect } from 'vitest';
import { runCli } from '../cli.js';
import { CLI_ENV } from './fixtures/app.js';

async function run(args: string[], env: Record<string, string> = CLI_ENV) {
	const output: string[] = [];
	const errors: string[] = [];
	const code = await runCli(args, {
		env,
		print: (line) => output.push(line),
		printError: (line) => errors.push(line),
	});
	return { code, output, errors };
}

describe('runCli', () => {
	it('should apply every migration on a fresh store', async () => {
		const { code, output } = await run(['migrate']);

		expect(code).toBe(0);
		expect(output).toEqual(['Applied migrations: 1, 2']);
	});

	it('should report the schema status', async () => {
		const { code, output } = await run(['status']);

		expect(code).toBe(0);
		expect(output).toEqual(['Current version: none', 'Pending: 1, 2']);
	});

	it('should probe store health', async () => {
		const { code, output } = await run(['health']);

		expect(code).toBe(0);
		expect(output).toEqual(['Store: healthy', 'Connections: 1 open, 1 idle, 0 checked out, capacity 15']);
	});

	it('should print usage for help', async () => {
		const { code, output } = await run(['help']);

		expect(code).toBe(0);
		expect(output[0]?.startsWith('Usage: quarry-users <command>')).toBe(true);
	});

	it('should exit 2 without a command', async () => {
		const { code } = await run([]);

		expect(code).toBe(2);
	});

	it('should exit 2 for an unknown command', async () => {
		const { code, errors } = await run(['frobnicate']);

		expect(code).toBe(2);
		expect(errors[0]).toBe('Unknown command: frobnicate\n');
	});

	it('should exit 1 when the configuration is invalid', async () => {
		const { code, errors } = await run(['status'], { LOG_LEVEL: 'silent' });

		expect(code).toBe(1);
		expect(errors).toEqual([
			'Failed to start: Environment validation failed:\n  DATABASE_URL: Required when DATABASE_PROVIDER is postgres',
		]);
	});
});
