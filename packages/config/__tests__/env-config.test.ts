import { describe, test, expect, beforeAll, afterAll } from 'vitest';
import { EnvConfigProvider } from '../src/env-config';

describe('EnvConfigProvider', () => {
	describe('with process.env', () => {
		beforeAll(() => {
			process.env.REMAP_TEST_CONFIG_KEY = 'test-value';
			process.env.REMAP_TEST_EMPTY_KEY = '';
		});

		afterAll(() => {
			delete process.env.REMAP_TEST_CONFIG_KEY;
			delete process.env.REMAP_TEST_EMPTY_KEY;
		});

		test('should return value when key exists', async () => {
			const provider = new EnvConfigProvider();
			expect(await provider.get('REMAP_TEST_CONFIG_KEY')).toBe('test-value');
		});

		test('should return undefined when key does not exist', async () => {
			const provider = new EnvConfigProvider();
			expect(await provider.get('REMAP_NON_EXISTENT_KEY_12345')).toBeUndefined();
		});

		test('should return empty string when key is empty', async () => {
			const provider = new EnvConfigProvider();
			expect(await provider.get('REMAP_TEST_EMPTY_KEY')).toBe('');
		});

		test('should see changes made after construction', async () => {
			const provider = new EnvConfigProvider();
			process.env.REMAP_TEST_CONFIG_KEY = 'changed';
			expect(await provider.get('REMAP_TEST_CONFIG_KEY')).toBe('changed');
			process.env.REMAP_TEST_CONFIG_KEY = 'test-value';
		});
	});

	describe('with a fixed source', () => {
		const provider = new EnvConfigProvider({ LOG_LEVEL: 'debug', EMPTY: '' });

		test('loadKeys should return values for all requested keys', async () => {
			expect(await provider.loadKeys(['LOG_LEVEL', 'EMPTY', 'MISSING'])).toEqual({
				LOG_LEVEL: 'debug',
				EMPTY: '',
				MISSING: undefined
			});
		});

		test('loadKeys should return empty object for empty keys array', async () => {
			expect(await provider.loadKeys([])).toEqual({});
		});
	});
});
