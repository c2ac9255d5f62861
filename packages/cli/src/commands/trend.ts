/**
 * trend - Expense and net-asset series by day or month.
 */

import {
	type AssetsTrendPoint,
	type ExpenseTrendPoint,
	type Granularity,
	getAssetsTrend,
	getExpenseTrend,
	isGranularity,
	suggestGranularity,
	type TrendOptions,
} from '@tally/core';

import { CommandLine } from '../args';
import { getReadonlyDb, withDb } from '../db';
import { type Column, parseFormat, printRows } from '../output';

const EXPENSE_COLUMNS: Column<ExpenseTrendPoint>[] = [
	{ key: 'label', label: 'Period' },
	{ key: 'accountCode', label: 'Code' },
	{ key: 'accountName', label: 'Category', kind: 'text', width: 40 },
	{ key: 'amountDomestic', label: 'Amount', kind: 'money' },
];

const ASSETS_COLUMNS: Column<AssetsTrendPoint>[] = [
	{ key: 'label', label: 'Period' },
	{ key: 'assetBalance', label: 'Assets', kind: 'money' },
	{ key: 'liabilityBalance', label: 'Liabilities', kind: 'money' },
	{ key: 'netAssets', label: 'Net', kind: 'money' },
];

function resolveGranularity(cli: CommandLine, from: string | undefined, to: string | undefined): Granularity {
	const explicit = cli.value('granularity');
	if (explicit !== undefined) {
		if (!isGranularity(explicit)) {
			throw new Error(`Invalid granularity: ${explicit}. Use: day, month`);
		}
		return explicit;
	}
	return from && to ? suggestGranularity(from, to) : 'month';
}

export async function runTrend(args: string[]): Promise<void> {
	const cli = CommandLine.parse(args, 'trend');
	const format = parseFormat(cli.value('format'));
	const kind = cli.positional(0) ?? 'expense';
	const from = cli.date('from');
	const to = cli.date('to');
	const options: TrendOptions = { granularity: resolveGranularity(cli, from, to), from, to };

	switch (kind) {
		case 'expense': {
			const rows = await withDb(getReadonlyDb(cli), (db) => getExpenseTrend(db, options));
			printRows(rows, EXPENSE_COLUMNS, format);
			return;
		}
		case 'assets': {
			const rows = await withDb(getReadonlyDb(cli), (db) => getAssetsTrend(db, options));
			printRows(rows, ASSETS_COLUMNS, format);
			return;
		}
		default:
			throw new Error(`Unknown trend kind: ${kind}. Use: expense, assets`);
	}
}
