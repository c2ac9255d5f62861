/**
 * Sample entries for a fresh ledger: two expenses (one paid abroad) and a card
 * repayment, dated relative to today.
 */

import { randomUUID } from 'node:crypto';

import type { LedgerDb } from '../db/connection';
import { countEntries, saveEntryFullReplace } from '../ledger/entries';
import { getDomesticCurrency } from '../ledger/settings';
import type { SaveEntryRequest } from '../types/ledger';
import { ok, type Result } from '../types/result';
import { addDays, todayIso } from '../utils/datetime';

export type SampleDataOptions = {
	today?: string;
};

function sampleEntries(today: string, domestic: string): Omit<SaveEntryRequest, 'entryUuid' | 'isNew'>[] {
	return [
		{
			accountingDate: addDays(today, -2),
			entryType: 'EXPENSE',
			entryTitle: 'Tesco',
			entryText: 'Groceries',
			lines: [
				{ accountCode: '5000000001', dc: 'D', amountDomestic: 18.5, currencyOriginal: domestic, amountOriginal: 18.5 },
				{ accountCode: '5000000007', dc: 'D', amountDomestic: 6.2, currencyOriginal: domestic, amountOriginal: 6.2 },
				{ accountCode: '0000000001', dc: 'C', amountDomestic: 24.7, currencyOriginal: domestic, amountOriginal: 24.7 },
			],
		},
		{
			accountingDate: addDays(today, -1),
			entryType: 'EXPENSE',
			entryTitle: 'Amazon US',
			entryText: 'Foreign purchase',
			lines: [
				{ accountCode: '5000000002', dc: 'D', amountDomestic: 30, currencyOriginal: 'USD', amountOriginal: 38 },
				{ accountCode: '0000000001', dc: 'C', amountDomestic: 30, currencyOriginal: 'USD', amountOriginal: 38 },
			],
		},
		{
			accountingDate: today,
			entryType: 'GENERAL',
			entryTitle: 'Card Payment',
			entryText: 'Pay credit card',
			lines: [
				{ accountCode: '1000000001', dc: 'D', amountDomestic: 50, currencyOriginal: domestic, amountOriginal: 50, itemText: 'Credit card decrease' },
				{ accountCode: '0000000001', dc: 'C', amountDomestic: 50, currencyOriginal: domestic, amountOriginal: 50, itemText: 'Cash decrease' },
			],
		},
	];
}

/** Posts the sample entries when the ledger is empty; returns how many were added. */
export function seedSampleData(db: LedgerDb, options: SampleDataOptions = {}): Result<number> {
	if (countEntries(db) > 0) {
		return ok(0);
	}

	const entries = sampleEntries(options.today ?? todayIso(), getDomesticCurrency(db));
	for (const entry of entries) {
		const saved = saveEntryFullReplace(db, { ...entry, entryUuid: randomUUID(), isNew: true });
		if (!saved.ok) {
			return saved;
		}
	}
	return ok(entries.length);
}
