import { randomUUID } from 'node:crypto';

import { type LedgerDb, MEMORY_PATH, openDatabase } from '../src/db/connection';
import type { SettingDefaults } from '../src/db/seed';
import { saveEntryFullReplace } from '../src/ledger/entries';
import type { DebitCredit, EntryLineInput, EntryType, SavedEntry } from '../src/types/ledger';
import { unwrap } from '../src/types/result';

export const CASH = '0000000001';
export const CARD = '1000000001';
export const CAPITAL = '3000000000';
export const FOOD = '5000000001';
export const CLOTHING = '5000000002';
export const TRANSPORT = '5000000004';
export const HOUSEHOLD = '5000000007';

export function createTestDb(defaults: SettingDefaults = {}): LedgerDb {
	return openDatabase({ path: MEMORY_PATH, migrate: true, defaults });
}

export function line(accountCode: string, dc: DebitCredit, amountDomestic: number, itemText: string | null = null): EntryLineInput {
	return { accountCode, dc, amountDomestic, currencyOriginal: 'GBP', amountOriginal: amountDomestic, itemText };
}

export type PostOptions = {
	entryUuid?: string;
	entryType?: EntryType;
	title?: string | null;
};

/** Insert a new entry and return its id; throws when the entry is rejected. */
export function postEntry(db: LedgerDb, accountingDate: string, lines: EntryLineInput[], options: PostOptions = {}): SavedEntry {
	return unwrap(
		saveEntryFullReplace(db, {
			entryUuid: options.entryUuid ?? randomUUID(),
			accountingDate,
			entryType: options.entryType ?? 'EXPENSE',
			entryTitle: options.title ?? null,
			entryText: null,
			lines,
			isNew: true,
		}),
	);
}
