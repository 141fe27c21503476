export { Logger, type LogObject, type Transport, type LoggerOptions } from './logger';
export { levels, getLevelName, getLevelNumber, isLevelName, isLevelEnabled, type LevelName, type LevelNumber } from './levels';
export type { LoggerGlobalOptions } from './types';
export { transports, consoleTransport, filterTransport, formatPretty, formatJson } from './transports/index';
export type { ConsoleTransportOptions, FilterOptions } from './transports/index';
export {
	readLogConfig,
	buildLoggerOptions,
	DEFAULT_LOG_CONFIG,
	type LogConfig
} from './config';
