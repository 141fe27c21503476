/**
 * Mapper Configuration
 *
 * Reads mapper and logging settings from a ConfigProvider and builds a configured
 * ObjectMapper.
 *
 * Keys:
 * - MAPPER_NESTED_STRUCTURES: true | false (default: true)
 * - LOG_LEVEL, LOG_INCLUDE_NAMES, LOG_EXCLUDE_NAMES, LOG_JSON (see readLogConfig)
 *
 * @example
 * ```typescript
 * const mapper = await createObjectMapperFromConfig(new EnvConfigProvider(), registry);
 * ```
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import type { ConfigProvider } from '@remap/config';
import { buildLoggerOptions, Logger, readLogConfig } from '@remap/logging';
import { CustomMapperRegistry } from './custom-mapper-registry';
import { ObjectMapper } from './object-mapper';

const LogConfigSchema = Type.Object({
	level: Type.Union([Type.Literal('debug'), Type.Literal('info'), Type.Literal('warn'), Type.Literal('error')]),
	includeNames: Type.Array(Type.String()),
	excludeNames: Type.Array(Type.String()),
	jsonFormat: Type.Boolean()
});

export const MapperConfigSchema = Type.Object({
	nestedStructures: Type.Boolean(),
	log: LogConfigSchema
});

export type MapperConfig = Static<typeof MapperConfigSchema>;

function isBlank(value: string): boolean {
	return value.trim() === '';
}

/**
 * Empty or unset means the default; anything but the two literals is left as text
 * for the schema to reject.
 */
function parseFlag(value: string | undefined, defaultValue: boolean): boolean | string {
	if (value === undefined || isBlank(value)) return defaultValue;
	if (value === 'true') return true;
	if (value === 'false') return false;
	return value;
}

/**
 * Read and validate the mapper configuration. `LOG_LEVEL` is checked as given,
 * so an unknown level is reported instead of falling back to `info`.
 *
 * @throws Error naming the first invalid setting
 */
export async function readMapperConfig(provider: ConfigProvider): Promise<MapperConfig> {
	const raw = await provider.loadKeys(['MAPPER_NESTED_STRUCTURES', 'LOG_LEVEL']);
	const log = await readLogConfig(provider);
	const level = raw.LOG_LEVEL;
	const candidate = {
		nestedStructures: parseFlag(raw.MAPPER_NESTED_STRUCTURES, true),
		log: { ...log, level: level === undefined || isBlank(level) ? log.level : level }
	};

	if (Value.Check(MapperConfigSchema, candidate)) {
		return candidate;
	}

	const [first] = [...Value.Errors(MapperConfigSchema, candidate)];
	const detail = first ? `at "${first.path}": ${first.message}` : 'with unknown error';
	throw new Error(`Invalid mapper config ${detail}`);
}

/**
 * Build an ObjectMapper from configuration. Without a registry, an empty one is created
 * that logs through the configured transports.
 */
export async function createObjectMapperFromConfig(
	provider: ConfigProvider,
	registry?: CustomMapperRegistry
): Promise<ObjectMapper> {
	const config = await readMapperConfig(provider);
	const logger = new Logger('ObjectMapper', buildLoggerOptions(config.log));

	return new ObjectMapper(registry ?? new CustomMapperRegistry(logger.child('CustomMapperRegistry')), {
		nestedStructures: config.nestedStructures,
		logger
	});
}
