/**
 * CLI console output. Commands print through these helpers only; the core
 * package never logs and reports problems through results instead.
 */

/** Quiet mode suppresses all output (used by tests) */
let quietMode = false;

export function setQuietMode(quiet: boolean): void {
	quietMode = quiet;
}

/**
 * Log to stdout
 */
export function log(message: string): void {
	if (quietMode) return;
	console.log(message);
}

/**
 * Log to stderr
 */
export function error(message: string): void {
	if (quietMode) return;
	console.error(message);
}

/**
 * Log JSON to stdout (for --format=json)
 */
export function json(data: unknown): void {
	if (quietMode) return;
	console.log(JSON.stringify(data, null, 2));
}
