/**
 * Database connection utilities for CLI.
 *
 * Path resolution priority: --db flag > DB_PATH env > config paths.database > cwd
 * Read-only commands use create: false to prevent empty DB creation.
 */

import { resolve } from 'node:path';

import { type LedgerDb, openDatabase } from '@tally/core';
import { getConfig, isConfigInitialized, resolveConfigRelative } from '@tally/core/config';

import type { CommandLine } from './args';

const DEFAULT_DB_PATH = 'data/tally.db';

export function resolveDbPath(cli?: CommandLine): string {
	const fromArg = cli?.value('db');
	if (fromArg) return resolve(fromArg);

	const fromEnv = process.env['DB_PATH'];
	if (fromEnv) return resolve(fromEnv);

	if (isConfigInitialized()) {
		return resolveConfigRelative(getConfig().paths.database);
	}

	return resolve(process.cwd(), DEFAULT_DB_PATH);
}

function settingDefaults() {
	if (!isConfigInitialized()) {
		return {};
	}
	const { ledger } = getConfig();
	return { domesticCurrency: ledger.domestic_currency, userName: ledger.user_name };
}

/**
 * Open database in read-only mode, for report commands.
 */
export function getReadonlyDb(cli?: CommandLine): LedgerDb {
	return openDatabase({ path: resolveDbPath(cli), readonly: true, create: false, migrate: true, defaults: settingDefaults() });
}

/**
 * Open database in writable mode, for init, import and edits.
 */
export function getWritableDb(cli?: CommandLine): LedgerDb {
	return openDatabase({ path: resolveDbPath(cli), readonly: false, create: true, migrate: true, defaults: settingDefaults() });
}

/**
 * Run `fn` against a connection and close it afterwards.
 */
export async function withDb<T>(db: LedgerDb, fn: (db: LedgerDb) => T | Promise<T>): Promise<T> {
	try {
		return await fn(db);
	} finally {
		db.close();
	}
}
