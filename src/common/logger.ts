import debug from 'debug';

// Base namespace for the project
const BASE_NAMESPACE = 'sqlscope';

/**
 * Creates a debugger for `sqlscope:<subNamespace>`, e.g. `createLogger('parser:adapter')`.
 * Warnings go through `log.extend('warn')`.
 */
export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}

/**
 * Enable sqlscope debug logging programmatically.
 *
 * @param pattern - Debug pattern to enable (default: 'sqlscope:*')
 *   Examples:
 *   - 'sqlscope:*' - all logs
 *   - 'sqlscope:parser:*' - parsing and tree adaptation
 *   - 'sqlscope:extractor' - qualifier registration and attribution
 * @param logFn - Replaces debug's stderr writer when given
 */
export function enableLogging(
	pattern: string = `${BASE_NAMESPACE}:*`,
	logFn?: (...args: unknown[]) => void
): void {
	if (logFn) {
		debug.log = logFn;
	}
	debug.enable(pattern);
}

/**
 * Disable all sqlscope debug logging.
 */
export function disableLogging(): void {
	debug.disable();
}

/**
 * Check if logging is enabled for a specific namespace.
 *
 * @param namespace - The namespace to check (without the 'sqlscope:' prefix)
 */
export function isLoggingEnabled(namespace: string): boolean {
	return debug.enabled(`${BASE_NAMESPACE}:${namespace}`);
}
