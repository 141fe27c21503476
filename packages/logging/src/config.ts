import type { Transport, LoggerOptions } from './types';
import { isLevelName, type LevelName } from './levels';
import { consoleTransport } from './transports/console';
import { filterTransport } from './transports/filter';

/**
 * Minimal ConfigProvider interface for logging configuration.
 * Defined locally so the logging package does not depend on @remap/config.
 */
interface ConfigProvider {
	get(key: string): Promise<string | undefined>;
}

/**
 * Logging configuration read from config provider.
 */
export interface LogConfig {
	/** Log level threshold (debug, info, warn, error). Default: 'info' */
	level: LevelName;
	/** Logger names to include (empty = all) */
	includeNames: string[];
	/** Logger names to exclude */
	excludeNames: string[];
	/** Use JSON format (production) vs pretty format (dev) */
	jsonFormat: boolean;
}

export const DEFAULT_LOG_CONFIG: Readonly<LogConfig> = Object.freeze({
	level: 'info',
	includeNames: [],
	excludeNames: [],
	jsonFormat: false
});

/**
 * Parse comma-separated string into array, filtering empty values.
 */
function parseList(value: string | undefined): string[] {
	if (!value || value.trim() === '') return [];
	return value
		.split(',')
		.map((s) => s.trim())
		.filter(Boolean);
}

/**
 * Read logging configuration from a config provider.
 *
 * Reads these keys:
 * - LOG_LEVEL: debug | info | warn | error (default: info)
 * - LOG_INCLUDE_NAMES: comma-separated logger names to include
 * - LOG_EXCLUDE_NAMES: comma-separated logger names to exclude
 * - LOG_JSON: true | false (default: false)
 */
export async function readLogConfig(config: ConfigProvider): Promise<LogConfig> {
	const level = await config.get('LOG_LEVEL');
	const includeNames = await config.get('LOG_INCLUDE_NAMES');
	const excludeNames = await config.get('LOG_EXCLUDE_NAMES');
	const jsonFormat = await config.get('LOG_JSON');

	return {
		level: level !== undefined && isLevelName(level) ? level : DEFAULT_LOG_CONFIG.level,
		includeNames: parseList(includeNames),
		excludeNames: parseList(excludeNames),
		jsonFormat: jsonFormat === 'true'
	};
}

/**
 * Build logger options from a LogConfig.
 *
 * @example
 * ```ts
 * const logConfig = await readLogConfig(new EnvConfigProvider());
 * Logger.configure(buildLoggerOptions(logConfig));
 * ```
 */
export function buildLoggerOptions(config: LogConfig): LoggerOptions {
	let transport: Transport = consoleTransport({
		json: config.jsonFormat,
		pretty: !config.jsonFormat
	});

	if (config.includeNames.length > 0 || config.excludeNames.length > 0) {
		transport = filterTransport(transport, {
			includeNames: config.includeNames.length > 0 ? config.includeNames : undefined,
			excludeNames: config.excludeNames.length > 0 ? config.excludeNames : undefined
		});
	}

	return {
		level: config.level,
		transports: [transport]
	};
}
