import type { Transport, LogObject } from '../types';

export interface FilterOptions {
	/** Only log these names (empty = all). A trailing `*` matches by prefix. */
	includeNames?: string[];
	/** Never log these names. A trailing `*` matches by prefix. */
	excludeNames?: string[];
}

type NameMatcher = (name: string) => boolean;

function compileMatcher(patterns: string[] | undefined): NameMatcher | null {
	if (!patterns?.length) return null;

	const exact = new Set<string>();
	const prefixes: string[] = [];
	for (const pattern of patterns) {
		if (pattern.endsWith('*')) {
			prefixes.push(pattern.slice(0, -1));
		} else {
			exact.add(pattern);
		}
	}
	return (name) => exact.has(name) || prefixes.some((prefix) => name.startsWith(prefix));
}

/**
 * Filter transport - wraps another transport and filters by logger name.
 * Records without a name always pass.
 *
 * @example
 * ```ts
 * // Only mapping logs
 * filterTransport(consoleTransport(), {
 *   includeNames: ['ObjectMapper', 'CustomMapperRegistry']
 * })
 *
 * // Everything except the registry
 * filterTransport(consoleTransport(), {
 *   excludeNames: ['CustomMapper*']
 * })
 * ```
 */
export function filterTransport(transport: Transport, options: FilterOptions): Transport {
	const include = compileMatcher(options.includeNames);
	const exclude = compileMatcher(options.excludeNames);

	function shouldLog(name?: string): boolean {
		if (!name) return true;
		if (include && !include(name)) return false;
		return !exclude?.(name);
	}

	return {
		write(obj: LogObject): void {
			if (shouldLog(obj.name)) {
				transport.write(obj);
			}
		},

		async flush(): Promise<void> {
			await transport.flush();
		},

		async close(): Promise<void> {
			await transport.close();
		}
	};
}
