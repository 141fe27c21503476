import { consoleTransport } from './console';
import { filterTransport } from './filter';

export { consoleTransport, formatPretty, formatJson, type ConsoleTransportOptions } from './console';
export { filterTransport, type FilterOptions } from './filter';

/**
 * Type for the transports namespace object
 */
interface TransportsNamespace {
	console: typeof consoleTransport;
	filter: typeof filterTransport;
}

/**
 * Built-in transports for the logger.
 */
export const transports: TransportsNamespace = {
	console: consoleTransport,
	filter: filterTransport
};
