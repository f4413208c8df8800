import { describe, it, expect } from 'vitest';
import { EnvSchemas, EnvValidationError, parseEnv, z } from '../index.js';

describe('parseEnv', () => {
	const schema = z.object({
		LOG_LEVEL: EnvSchemas.logLevel(),
		POOL_SIZE: EnvSchemas.integer(10, 1),
		OVERFLOW: EnvSchemas.integer(0),
		VERBOSE: EnvSchemas.flag(false),
		CHECKS: EnvSchemas.flag(true),
	});

	it('should apply defaults for missing variables', () => {
		expect(parseEnv(schema, {})).toEqual({
			LOG_LEVEL: 'info',
			POOL_SIZE: 10,
			OVERFLOW: 0,
			VERBOSE: false,
			CHECKS: true,
		});
	});

	it('should convert provided values', () => {
		const config = parseEnv(schema, {
			LOG_LEVEL: 'debug',
			POOL_SIZE: '4',
			OVERFLOW: '2',
			VERBOSE: '1',
			CHECKS: 'false',
		});

		expect(config).toEqual({ LOG_LEVEL: 'debug', POOL_SIZE: 4, OVERFLOW: 2, VERBOSE: true, CHECKS: false });
	});

	it('should ignore unrelated variables', () => {
		expect(parseEnv(schema, { HOME: '/root' })).not.toHaveProperty('HOME');
	});

	it('should list every invalid variable', () => {
		const error = (() => {
			try {
				parseEnv(schema, { LOG_LEVEL: 'loud', POOL_SIZE: '0', OVERFLOW: 'lots', VERBOSE: 'yes' });
			} catch (caught) {
				return caught;
			}
			return undefined;
		})();

		expect(error).toBeInstanceOf(EnvValidationError);
		if (error instanceof EnvValidationError) {
			expect(Object.keys(error.variables)).toEqual(['LOG_LEVEL', 'POOL_SIZE', 'OVERFLOW', 'VERBOSE']);
			expect(error.variables['OVERFLOW']).toEqual(['Expected an integer']);
			expect(error.message).toMatch(/^Environment validation failed:\n {2}LOG_LEVEL: .+\n {2}POOL_SIZE: .+/);
		}
	});
});
