/**
 * Logging level utilities.
 */
import type { LevelName, LevelNumber } from './types';

export type { LevelName, LevelNumber };

/**
 * Mapping of log level names to their numeric values
 */
export type LogLevels = Record<LevelName, LevelNumber>;

/**
 * Log level constants (Pino-compatible numbering)
 */
export const levels: LogLevels = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40
};

const levelNames: Record<LevelNumber, LevelName> = {
	10: 'debug',
	20: 'info',
	30: 'warn',
	40: 'error'
};

const LEVEL_NAMES: ReadonlySet<string> = new Set(Object.keys(levels));

export function getLevelName(level: LevelNumber): LevelName {
	return levelNames[level];
}

export function getLevelNumber(name: LevelName): LevelNumber {
	return levels[name];
}

export function isLevelName(value: string): value is LevelName {
	return LEVEL_NAMES.has(value);
}

export function isLevelEnabled(current: LevelNumber, threshold: LevelNumber): boolean {
	return current >= threshold;
}
