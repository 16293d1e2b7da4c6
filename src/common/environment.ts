/**
 * Environment variable access
 */

/**
 * @param key The environment variable name
 * @returns The environment variable value or undefined if not set
 */
export function getEnvVar(key: string): string | undefined {
	if (typeof process !== 'undefined' && process.env) {
		return process.env[key];
	}
	return undefined;
}
