/**
 * Command-line arguments for one `tally` subcommand.
 *
 * Accepted forms: `--key=value`, `--key value`, `--flag`, `-f`, positionals, and
 * `--` to end option parsing. A `--key` followed by a value that starts with `-`
 * is read as a flag.
 */

import { isIsoDate } from '@tally/core';

export class CommandLine {
	private constructor(
		readonly command: string,
		private readonly flags: ReadonlySet<string>,
		private readonly values: ReadonlyMap<string, string>,
		readonly positionals: readonly string[],
	) {}

	static parse(argv: readonly string[], command: string): CommandLine {
		const flags = new Set<string>();
		const values = new Map<string, string>();
		const positionals: string[] = [];

		const queue = [...argv];
		let optionsDone = false;
		while (queue.length > 0) {
			const token = queue.shift();
			if (token === undefined) break;

			if (optionsDone || token === '-' || !token.startsWith('-')) {
				positionals.push(token);
			} else if (token === '--') {
				optionsDone = true;
			} else if (token.startsWith('--')) {
				const body = token.slice(2);
				const eq = body.indexOf('=');
				if (eq !== -1) {
					values.set(body.slice(0, eq), body.slice(eq + 1));
				} else if (queue[0] !== undefined && !queue[0].startsWith('-')) {
					values.set(body, queue.shift() ?? '');
				} else {
					flags.add(body);
				}
			} else {
				flags.add(token.slice(1));
			}
		}

		return new CommandLine(command, flags, values, positionals);
	}

	has(flag: string): boolean {
		return this.flags.has(flag);
	}

	value(name: string): string | undefined {
		return this.values.get(name);
	}

	required(name: string): string {
		const value = this.values.get(name);
		if (value === undefined) {
			throw this.usageError(`Missing required option: --${name}`);
		}
		return value;
	}

	positional(index: number): string | undefined {
		return this.positionals[index];
	}

	requiredPositional(index: number, label: string): string {
		const value = this.positionals[index];
		if (value === undefined) {
			throw this.usageError(`Missing ${label}`);
		}
		return value;
	}

	/** A YYYY-MM-DD option; throws on anything that is not a calendar date. */
	date(name: string): string | undefined {
		const value = this.values.get(name);
		if (value !== undefined && !isIsoDate(value)) {
			throw new Error(`Invalid date for --${name}: ${value} (expected YYYY-MM-DD)`);
		}
		return value;
	}

	usageError(message: string): Error {
		return new Error(`${message}\nRun: tally ${this.command} --help`);
	}
}
