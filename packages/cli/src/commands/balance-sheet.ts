/**
 * balance-sheet - All-time balances of active asset and liability accounts.
 */

import { type BalanceSheetRow, getBalanceSheetSnapshot, getDomesticCurrency, summarizeBalanceSheet } from '@tally/core';

import { CommandLine } from '../args';
import { getReadonlyDb, withDb } from '../db';
import { formatMoney } from '../format';
import { json } from '../logger';
import { type Column, parseFormat, printRows } from '../output';

const COLUMNS: Column<BalanceSheetRow>[] = [
	{ key: 'accountType', label: 'Type' },
	{ key: 'accountCode', label: 'Code' },
	{ key: 'accountName', label: 'Account', kind: 'text', width: 40 },
	{ key: 'balance', label: 'Balance', kind: 'money' },
];

export async function runBalanceSheet(args: string[]): Promise<void> {
	const cli = CommandLine.parse(args, 'balance-sheet');
	const format = parseFormat(cli.value('format'));

	const { rows, currency } = await withDb(getReadonlyDb(cli), (db) => ({
		rows: getBalanceSheetSnapshot(db),
		currency: getDomesticCurrency(db),
	}));
	const totals = summarizeBalanceSheet(rows);

	if (format === 'json') {
		json({ currency, accounts: rows, totals });
		return;
	}

	printRows(rows, COLUMNS, format, [
		`Assets:      ${formatMoney(totals.assetTotal, currency)}`,
		`Liabilities: ${formatMoney(totals.liabilityTotal, currency)}`,
		`Net assets:  ${formatMoney(totals.netAssets, currency)}`,
	]);
}
