import type { ConfigProvider } from './types';

/**
 * Source of environment-style key/value pairs.
 */
export type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * Configuration provider that reads from environment variables.
 *
 * Reads `process.env` unless another source is given; a plain object works as a
 * fixed source in tests. Values are read on every call, never cached.
 *
 * @example
 * ```ts
 * const config = new EnvConfigProvider();
 * const level = await config.get('LOG_LEVEL');
 *
 * const fixed = new EnvConfigProvider({ MAPPER_NESTED_STRUCTURES: 'false' });
 * ```
 */
export class EnvConfigProvider implements ConfigProvider {
	private readonly env: EnvSource;

	constructor(env: EnvSource = process.env) {
		this.env = env;
	}

	async get(key: string): Promise<string | undefined> {
		return this.env[key];
	}

	async loadKeys(keys: string[]): Promise<Record<string, string | undefined>> {
		const result: Record<string, string | undefined> = {};
		for (const key of keys) {
			result[key] = this.env[key];
		}
		return result;
	}
}
