import debug from 'debug';

// Base namespace for the project
const BASE_NAMESPACE = 'join-semantics';

/**
 * Creates a namespaced debug logger instance.
 *
 * Example: createLogger('wire') -> returns a debugger for 'join-semantics:wire'
 *
 * Usage:
 * const log = createLogger('wire');
 * log('Decoded %s', name);
 * const errorLog = log.extend('error'); // Creates 'join-semantics:wire:error'
 *
 * @param subNamespace The specific subsystem namespace (e.g., 'wire', 'options', 'planner')
 */
export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}

/**
 * Enable debug logging programmatically.
 *
 * @param pattern - Debug pattern to enable (default: 'join-semantics:*')
 *   Examples:
 *   - 'join-semantics:*' - everything
 *   - 'join-semantics:wire:*' - encoding and decoding only
 *   - 'join-semantics:*,-join-semantics:options' - all except option changes
 * @param logFn - Optional custom log function. Defaults to console.log.
 *
 * @example
 * ```typescript
 * enableLogging('join-semantics:planner', console.log.bind(console));
 * ```
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
 * Disable all debug logging.
 */
export function disableLogging(): void {
	debug.disable();
}

/**
 * Check if logging is enabled for a specific namespace.
 *
 * @param namespace - The namespace to check (without 'join-semantics:' prefix)
 */
export function isLoggingEnabled(namespace: string): boolean {
	return debug.enabled(`${BASE_NAMESPACE}:${namespace}`);
}
