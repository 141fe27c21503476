import { inspect } from 'node:util';
import type { Transport, LogObject, LevelNumber } from '../types';

export interface ConsoleTransportOptions {
	pretty?: boolean;
	json?: boolean;
	/** Depth for object inspection (default: 4) */
	depth?: number;
	/** Show colors in pretty mode (default: auto-detect TTY) */
	colors?: boolean;
	/** Line sink (default: console.log) */
	write?: (line: string) => void;
}

const ANSI_COLORS = {
	reset: '\x1b[0m',
	gray: '\x1b[90m',
	red: '\x1b[31m',
	yellow: '\x1b[33m',
	magenta: '\x1b[35m',
	cyan: '\x1b[36m',
	white: '\x1b[37m'
} as const;

type Palette = Record<keyof typeof ANSI_COLORS, string>;

const NO_COLORS: Palette = {
	reset: '',
	gray: '',
	red: '',
	yellow: '',
	magenta: '',
	cyan: '',
	white: ''
};

const levelColors: Record<LevelNumber, keyof Palette> = {
	10: 'magenta', // debug (D)
	20: 'cyan', // info (I)
	30: 'yellow', // warn (W)
	40: 'red' // error (E)
};

const levelChars: Record<LevelNumber, string> = {
	10: 'D',
	20: 'I',
	30: 'W',
	40: 'E'
};

export interface FormatOptions {
	colors: boolean;
	depth: number;
}

function formatTime(timestamp: number): string {
	const date = new Date(timestamp);
	const hours = date.getHours().toString().padStart(2, '0');
	const minutes = date.getMinutes().toString().padStart(2, '0');
	const seconds = date.getSeconds().toString().padStart(2, '0');
	return `${hours}:${minutes}:${seconds}`;
}

function formatValue(value: unknown, options: FormatOptions): string {
	if (value === null || value === undefined) {
		return String(value);
	}
	if (typeof value === 'string') {
		return value;
	}
	if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
		return String(value);
	}
	// Objects, arrays, errors: node:util inspect respects [util.inspect.custom]
	return inspect(value, { colors: options.colors, depth: options.depth });
}

function formatArray(arr: unknown[], options: FormatOptions): string {
	if (arr.length === 0) return '[]';
	const items = arr.map((v) => formatValue(v, options));
	return `[${items.join(', ')}]`;
}

function formatKeyValue(key: string, value: unknown, options: FormatOptions, palette: Palette): string {
	const formattedValue = Array.isArray(value) ? formatArray(value, options) : formatValue(value, options);
	return `${palette.white}${key}:${formattedValue}${palette.reset}`;
}

/**
 * Pretty line: `HH:MM:SS:L:Name message: key:value key:value`,
 * followed by the inspected error when the record carries one.
 */
export function formatPretty(obj: LogObject, options: FormatOptions): string {
	const palette: Palette = options.colors ? ANSI_COLORS : NO_COLORS;
	const time = formatTime(obj.time);
	const levelColor = palette[levelColors[obj.level]];
	const levelChar = levelChars[obj.level];
	const name = obj.name ?? 'Application';
	const isError = obj.level === 40;
	const isWarn = obj.level === 30;

	const { time: _time, level: _level, msg, name: _name, error, err, ...context } = obj;

	const parts = Object.entries(context).map(([key, value]) => formatKeyValue(key, value, options, palette));
	const contextStr = parts.length > 0 ? `: ${parts.join(' ')}` : '';

	const message = isError
		? `${palette.red}${msg}${palette.reset}`
		: isWarn
			? `${palette.yellow}${msg}${palette.reset}`
			: msg;

	let output = `${palette.gray}${time}${palette.reset}:${levelColor}${levelChar}${palette.reset}:${palette.yellow}${name}${palette.reset} ${message}${contextStr}`;

	const errorObj = error ?? err;
	if (errorObj instanceof Error) {
		const errorOutput = inspect(errorObj, { colors: options.colors, depth: options.depth });
		output += '\n' + (isError ? `${palette.red}${errorOutput}${palette.reset}` : errorOutput);
	}

	return output;
}

/**
 * JSON line. Values JSON cannot encode (bigint, circular references) fall back to inspect.
 */
export function formatJson(obj: LogObject): string {
	try {
		return JSON.stringify(obj, (_key, value: unknown) => (typeof value === 'bigint' ? `${value}n` : value));
	} catch (error) {
		if (error instanceof TypeError) {
			return inspect(obj, { colors: false, depth: 4, breakLength: Infinity });
		}
		throw error;
	}
}

function isPrettyMode(options: ConsoleTransportOptions): boolean {
	if (options.pretty !== undefined) return options.pretty;
	if (options.json !== undefined) return !options.json;

	// Pretty in dev, JSON only in production
	return process.env.NODE_ENV !== 'production';
}

function shouldUseColors(options: ConsoleTransportOptions): boolean {
	if (options.colors !== undefined) return options.colors;
	return process.stdout.isTTY ?? false;
}

/**
 * Console transport - outputs to stdout with pretty or JSON formatting.
 *
 * @example
 * ```ts
 * // Auto-detect mode
 * transports.console()
 *
 * // Force pretty with colors
 * transports.console({ pretty: true, colors: true })
 *
 * // JSON for production
 * transports.console({ json: true })
 * ```
 */
export function consoleTransport(options: ConsoleTransportOptions = {}): Transport {
	const pretty = isPrettyMode(options);
	const formatOptions: FormatOptions = {
		colors: shouldUseColors(options),
		depth: options.depth ?? 4
	};
	const write = options.write ?? ((line: string) => console.log(line));

	return {
		write(obj: LogObject): void {
			write(pretty ? formatPretty(obj, formatOptions) : formatJson(obj));
		},

		async flush(): Promise<void> {
			// Console writes are synchronous, nothing to flush
		},

		async close(): Promise<void> {
			// Console has no resources to close
		}
	};
}
