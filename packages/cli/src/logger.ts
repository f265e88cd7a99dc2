/**
 * CLI logging utility
 *
 * Centralizes console output for messages around the rendered tables.
 * Tables themselves are streamed to stdout by the encoders.
 */

/**
 * Log to stdout
 */
export function log(message: string): void {
	console.log(message);
}

/**
 * Log to stderr
 */
export function error(message: string): void {
	console.error(message);
}
