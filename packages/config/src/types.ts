/**
 * Configuration provider interface.
 *
 * Settings are read through a provider so the source can be swapped:
 * environment variables in development, a secrets store or a fixed map elsewhere.
 *
 * @example
 * ```ts
 * const provider = new EnvConfigProvider();
 * const mapper = await createObjectMapperFromConfig(provider, registry);
 * ```
 */
export interface ConfigProvider {
	/**
	 * Gets a configuration value by key.
	 * @returns The value, or undefined if not found
	 */
	get(key: string): Promise<string | undefined>;

	/**
	 * Loads multiple configuration values at once.
	 * @returns Key-value pairs for the requested keys
	 */
	loadKeys(keys: string[]): Promise<Record<string, string | undefined>>;
}
