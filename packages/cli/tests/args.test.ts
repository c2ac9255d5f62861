import { describe, expect, test } from 'vitest';

import { CommandLine } from '../src/args';

describe('CommandLine.parse', () => {
	test('splits flags, options and positionals', () => {
		const cli = CommandLine.parse(['add', '--name', 'Main bank', '--type=ASSET', '--inactive', '-v'], 'accounts');

		expect(cli.positionals).toEqual(['add']);
		expect(cli.value('name')).toBe('Main bank');
		expect(cli.value('type')).toBe('ASSET');
		expect(cli.has('inactive')).toBe(true);
		expect(cli.has('v')).toBe(true);
		expect(cli.has('name')).toBe(false);
	});

	test('treats everything after -- as positional', () => {
		const cli = CommandLine.parse(['delete', '--', '--odd-id'], 'entry');

		expect(cli.positionals).toEqual(['delete', '--odd-id']);
		expect(cli.has('odd-id')).toBe(false);
	});

	test('reads an option followed by a dash token as a flag', () => {
		const cli = CommandLine.parse(['--all', '--format', 'json', '-'], 'accounts');

		expect(cli.has('all')).toBe(true);
		expect(cli.value('format')).toBe('json');
		expect(cli.positional(0)).toBe('-');
	});

	test('keeps an empty value after =', () => {
		expect(CommandLine.parse(['--db='], 'init').value('db')).toBe('');
	});
});

describe('required values', () => {
	const cli = CommandLine.parse(['show'], 'entry');

	test('point at the command help when missing', () => {
		expect(() => cli.required('name')).toThrow('Missing required option: --name\nRun: tally entry --help');
		expect(() => cli.requiredPositional(1, 'entry uuid')).toThrow('Missing entry uuid\nRun: tally entry --help');
	});

	test('return the value when present', () => {
		expect(cli.requiredPositional(0, 'subcommand')).toBe('show');
		expect(cli.positional(3)).toBeUndefined();
	});

	test('usageError names the command', () => {
		expect(cli.usageError('Unknown entry subcommand: edit').message).toBe('Unknown entry subcommand: edit\nRun: tally entry --help');
	});
});

describe('date options', () => {
	test('accept calendar dates and reject others', () => {
		expect(CommandLine.parse(['--from=2025-01-31'], 'trend').date('from')).toBe('2025-01-31');
		expect(CommandLine.parse([], 'trend').date('from')).toBeUndefined();
		expect(() => CommandLine.parse(['--to=2025-02-30'], 'trend').date('to')).toThrow('Invalid date for --to: 2025-02-30 (expected YYYY-MM-DD)');
	});
});
