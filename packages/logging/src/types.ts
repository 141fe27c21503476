/**
 * Logging types shared by the logger, levels and transports.
 */

export type LevelName = 'debug' | 'info' | 'warn' | 'error';

/** Pino-compatible level numbers */
export type LevelNumber = 10 | 20 | 30 | 40;

/**
 * Structured log record handed to transports.
 */
export interface LogObject {
	time: number;
	level: LevelNumber;
	msg: string;
	name?: string;
	[key: string]: unknown;
}

/**
 * Destination for log records.
 */
export interface Transport {
	write(obj: LogObject): void;
	flush(): Promise<void>;
	close(): Promise<void>;
}

export interface LoggerOptions {
	level?: LevelName;
	transports?: Transport[];
}

/**
 * Defaults applied to every Logger created without explicit options.
 */
export interface LoggerGlobalOptions {
	level?: LevelName;
	transports?: Transport[];
}
