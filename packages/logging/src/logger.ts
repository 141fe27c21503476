import { levels, getLevelName, isLevelEnabled, type LevelName, type LevelNumber } from './levels';
import { consoleTransport } from './transports/console';
import type { LogObject, Transport, LoggerOptions, LoggerGlobalOptions } from './types';

export type { LogObject, Transport, LoggerOptions, LoggerGlobalOptions };

/**
 * Structured logger with Pino-inspired design.
 *
 * - Produces structured log objects
 * - Writes synchronously to configurable transports
 * - Immutable context via with()
 * - Loggers without explicit options follow the global defaults set by configure()
 */
export class Logger {
	private static globalTransports: Transport[] | null = null;
	private static globalLevel: LevelName = 'info';
	private static fallbackTransport: Transport | null = null;

	private readonly name: string;
	private readonly explicitLevel: LevelName | null;
	private readonly explicitTransports: Transport[] | null;
	private readonly context: Record<string, unknown>;

	constructor(name: string, options: LoggerOptions = {}, context: Record<string, unknown> = {}) {
		this.name = name;
		// Level and transports left unset are resolved at write time, so configure() reaches existing loggers
		this.explicitLevel = options.level ?? null;
		this.explicitTransports = options.transports ?? null;
		this.context = context;
	}

	private get level(): LevelNumber {
		return levels[this.explicitLevel ?? Logger.globalLevel];
	}

	private get transports(): Transport[] {
		return this.explicitTransports ?? Logger.globalTransports ?? [Logger.defaultTransport()];
	}

	/**
	 * Configure global defaults for all Logger instances.
	 * Call this once at startup.
	 */
	static configure(options: LoggerGlobalOptions): void {
		if (options.level) {
			Logger.globalLevel = options.level;
		}
		if (options.transports) {
			Logger.globalTransports = options.transports;
		}
	}

	/**
	 * Reset global configuration to defaults.
	 *
	 * **IMPORTANT**: Tests that call Logger.configure() MUST call Logger.reset()
	 * in afterEach() to prevent test pollution.
	 */
	static reset(): void {
		Logger.globalLevel = 'info';
		Logger.globalTransports = null;
		Logger.fallbackTransport = null;
	}

	/**
	 * Flush and close the global transports.
	 *
	 * Uses Promise.allSettled so that one failing transport does not keep the others open.
	 */
	static async shutdown(): Promise<void> {
		const transports = Logger.globalTransports ?? [];
		await Promise.allSettled(transports.map((transport) => transport.flush()));
		await Promise.allSettled(transports.map((transport) => transport.close()));
	}

	debug(msg: string, data?: Record<string, unknown>): void {
		this.log(levels.debug, msg, data);
	}

	info(msg: string, data?: Record<string, unknown>): void {
		this.log(levels.info, msg, data);
	}

	warn(msg: string, data?: Record<string, unknown>): void {
		this.log(levels.warn, msg, data);
	}

	error(msg: string, data?: Record<string, unknown>): void {
		this.log(levels.error, msg, data);
	}

	/** Whether a debug record would be written; lets callers skip building costly data */
	isDebugEnabled(): boolean {
		return isLevelEnabled(levels.debug, this.level);
	}

	/**
	 * Creates a new logger with additional context (immutable)
	 */
	with(data: Record<string, unknown>): Logger {
		return new Logger(this.name, this.inheritedOptions(), { ...this.context, ...data });
	}

	/**
	 * Creates a child logger with a new name (immutable)
	 * Inherits context, level, and transports from parent
	 */
	child(name: string): Logger {
		return new Logger(name, this.inheritedOptions(), { ...this.context });
	}

	/** Name of the effective level */
	get levelName(): LevelName {
		return getLevelName(this.level);
	}

	private inheritedOptions(): LoggerOptions {
		const options: LoggerOptions = {};
		if (this.explicitLevel) {
			options.level = this.explicitLevel;
		}
		if (this.explicitTransports) {
			options.transports = this.explicitTransports;
		}
		return options;
	}

	private log(level: LevelNumber, msg: string, data?: Record<string, unknown>): void {
		if (!isLevelEnabled(level, this.level)) {
			return;
		}

		const logObj: LogObject = {
			time: Date.now(),
			level,
			msg,
			name: this.name,
			...this.context,
			...data
		};

		for (const transport of this.transports) {
			transport.write(logObj);
		}
	}

	private static defaultTransport(): Transport {
		Logger.fallbackTransport ??= consoleTransport();
		return Logger.fallbackTransport;
	}
}
