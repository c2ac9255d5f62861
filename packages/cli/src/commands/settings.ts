/**
 * settings - Read and change user settings stored in the ledger.
 */

import { getSetting, listSettings, setSetting, SETTING_KEYS } from '@tally/core';

import { CommandLine } from '../args';
import { getReadonlyDb, getWritableDb, withDb } from '../db';
import { log } from '../logger';
import { type Column, parseFormat, printRows } from '../output';

type SettingRow = { key: string; value: string };

const COLUMNS: Column<SettingRow>[] = [
	{ key: 'key', label: 'Key' },
	{ key: 'value', label: 'Value' },
];

const KNOWN_KEYS: readonly string[] = Object.values(SETTING_KEYS);

function normalizeValue(key: string, value: string): string {
	if (key !== SETTING_KEYS.domesticCurrency) {
		return value;
	}
	const code = value.trim().toUpperCase();
	if (!/^[A-Z]{3}$/.test(code)) {
		throw new Error(`Invalid currency code: ${value}`);
	}
	return code;
}

async function runSet(cli: CommandLine): Promise<void> {
	const key = cli.requiredPositional(1, 'setting key');
	const value = cli.requiredPositional(2, 'setting value');
	if (!KNOWN_KEYS.includes(key)) {
		throw new Error(`Unknown setting: ${key}. Use: ${KNOWN_KEYS.join(', ')}`);
	}

	const stored = normalizeValue(key, value);
	await withDb(getWritableDb(cli), (db) => setSetting(db, key, stored));
	log(`${key} = ${stored}`);
}

async function runGet(cli: CommandLine): Promise<void> {
	const key = cli.requiredPositional(1, 'setting key');
	const value = await withDb(getReadonlyDb(cli), (db) => getSetting(db, key));
	if (value === null) {
		throw new Error(`Setting not found: ${key}`);
	}
	log(value);
}

export async function runSettings(args: string[]): Promise<void> {
	const cli = CommandLine.parse(args, 'settings');
	const sub = cli.positional(0) ?? 'list';

	switch (sub) {
		case 'list': {
			const rows = await withDb(getReadonlyDb(cli), (db) => listSettings(db));
			printRows(rows, COLUMNS, parseFormat(cli.value('format')));
			return;
		}
		case 'get':
			return runGet(cli);
		case 'set':
			return runSet(cli);
		default:
			throw cli.usageError(`Unknown settings subcommand: ${sub}`);
	}
}
