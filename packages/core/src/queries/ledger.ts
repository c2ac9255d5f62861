import type { LedgerDb } from '../db/connection';
import { type AccountType, assertNever, type Granularity, toAccountType } from '../types/ledger';
import { daysBetween } from '../utils/datetime';
import { balanceSheetIcon, expenseIcon } from './icons';

// ============================================
// JOURNAL LISTS
// ============================================

export type JournalListRow = {
	accountingDate: string;
	entryUuid: string;
	entryTitle: string | null;
	amountDomestic: number;
	iconKey: string;
};

export type JournalListOptions = {
	accountCode?: string;
	accountType?: AccountType;
};

type JournalLineRow = {
	accounting_date: string;
	entry_uuid: string;
	entry_title: string | null;
	account_code: string;
	account_type: string;
	amount_domestic: number;
	line_no: number;
};

/**
 * Lines of entries posted to active accounts, newest date first. Expense lists key
 * their icon on the category code; every other list on the account kind.
 */
export function listJournalLines(db: LedgerDb, options: JournalListOptions = {}): JournalListRow[] {
	const conditions = ['a.is_active = 1'];
	const params: string[] = [];

	if (options.accountCode) {
		conditions.push('i.account_code = ?');
		params.push(options.accountCode);
	}
	if (options.accountType) {
		conditions.push('a.account_type = ?');
		params.push(options.accountType);
	}

	const rows = db
		.prepare<string[], JournalLineRow>(
			`
			SELECT e.accounting_date, e.entry_uuid, e.entry_title, i.account_code, a.account_type, i.amount_domestic, i.line_no
			FROM gl_entry_item i
			INNER JOIN gl_entry e ON e.entry_uuid = i.entry_uuid
			INNER JOIN gl_account a ON a.account_code = i.account_code
			WHERE ${conditions.join(' AND ')}
			ORDER BY e.accounting_date DESC, e.entry_uuid DESC, i.line_no ASC
			`,
		)
		.all(...params);

	const expenseMode = options.accountType === 'EXPENSE';
	return rows.map((row) => ({
		accountingDate: row.accounting_date,
		entryUuid: row.entry_uuid,
		entryTitle: row.entry_title,
		amountDomestic: row.amount_domestic,
		iconKey: expenseMode ? expenseIcon(row.account_code) : balanceSheetIcon(row.account_code, toAccountType(row.account_type)),
	}));
}

export function listExpenseList(db: LedgerDb): JournalListRow[] {
	return listJournalLines(db, { accountType: 'EXPENSE' });
}

export function listAccountTransactions(db: LedgerDb, accountCode: string): JournalListRow[] {
	return listJournalLines(db, { accountCode });
}

export type JournalDateSection = {
	date: string;
	rows: JournalListRow[];
};

/** Consecutive rows sharing an accounting date, in list order. */
export function groupJournalByDate(rows: readonly JournalListRow[]): JournalDateSection[] {
	const sections: JournalDateSection[] = [];
	for (const row of rows) {
		const current = sections.at(-1);
		if (current && current.date === row.accountingDate) {
			current.rows.push(row);
		} else {
			sections.push({ date: row.accountingDate, rows: [row] });
		}
	}
	return sections;
}

// ============================================
// BALANCE SHEET
// ============================================

export type BalanceSheetRow = {
	accountType: AccountType;
	accountCode: string;
	accountName: string;
	balance: number;
	iconKey: string;
};

type BalanceSheetQueryRow = {
	account_type: string;
	account_code: string;
	account_name: string;
	balance: number;
};

/** All-time D-C balance of every active asset and liability account, unused ones at 0. */
export function getBalanceSheetSnapshot(db: LedgerDb): BalanceSheetRow[] {
	const rows = db
		.prepare<[], BalanceSheetQueryRow>(
			`
			SELECT
				a.account_type,
				a.account_code,
				a.account_name,
				COALESCE(SUM(CASE WHEN i.dc = 'D' THEN i.amount_domestic ELSE -i.amount_domestic END), 0) AS balance
			FROM gl_account a
			LEFT JOIN gl_entry_item i ON i.account_code = a.account_code
			WHERE a.is_active = 1
				AND a.account_type IN ('ASSET', 'LIAB')
			GROUP BY a.account_type, a.account_code, a.account_name
			ORDER BY
				CASE a.account_type WHEN 'ASSET' THEN 1 WHEN 'LIAB' THEN 2 ELSE 9 END,
				a.account_code
			`,
		)
		.all();

	return rows.map((row) => {
		const accountType = toAccountType(row.account_type);
		return {
			accountType,
			accountCode: row.account_code,
			accountName: row.account_name,
			balance: row.balance,
			iconKey: balanceSheetIcon(row.account_code, accountType),
		};
	});
}

export type BalanceSheetSummary = {
	assetTotal: number;
	liabilityTotal: number;
	netAssets: number;
};

export function summarizeBalanceSheet(rows: readonly BalanceSheetRow[]): BalanceSheetSummary {
	let assetTotal = 0;
	let liabilityTotal = 0;
	for (const row of rows) {
		switch (row.accountType) {
			case 'ASSET':
				assetTotal += row.balance;
				break;
			case 'LIAB':
				liabilityTotal += row.balance;
				break;
			case 'EQUITY':
			case 'INCOME':
			case 'EXPENSE':
				break;
			default:
				assertNever(row.accountType);
		}
	}
	return { assetTotal, liabilityTotal, netAssets: assetTotal - liabilityTotal };
}

// ============================================
// TRENDS
// ============================================

export type TrendOptions = {
	granularity: Granularity;
	from?: string;
	to?: string;
};

export type ExpenseTrendPoint = {
	label: string;
	accountCode: string;
	accountName: string;
	amountDomestic: number;
};

export type AssetsTrendPoint = {
	label: string;
	assetBalance: number;
	liabilityBalance: number;
	netAssets: number;
};

export type OpeningBalances = {
	asset: number;
	liability: number;
};

function labelExpression(granularity: Granularity): string {
	switch (granularity) {
		case 'day':
			return 'e.accounting_date';
		case 'month':
			return 'substr(e.accounting_date, 1, 7)';
		default:
			return assertNever(granularity);
	}
}

function dateWindow(options: TrendOptions): { clause: string; params: string[] } {
	const conditions: string[] = [];
	const params: string[] = [];
	if (options.from) {
		conditions.push('e.accounting_date >= ?');
		params.push(options.from);
	}
	if (options.to) {
		conditions.push('e.accounting_date <= ?');
		params.push(options.to);
	}
	return { clause: conditions.map((condition) => `AND ${condition}`).join(' '), params };
}

type ExpenseTrendRow = {
	label: string;
	account_code: string;
	account_name: string;
	amount_domestic: number;
};

/** Net expense per category per bucket; the window is inclusive at both ends. */
export function getExpenseTrend(db: LedgerDb, options: TrendOptions): ExpenseTrendPoint[] {
	const window = dateWindow(options);
	const rows = db
		.prepare<string[], ExpenseTrendRow>(
			`
			SELECT
				${labelExpression(options.granularity)} AS label,
				i.account_code,
				a.account_name,
				SUM(CASE WHEN i.dc = 'D' THEN i.amount_domestic ELSE -i.amount_domestic END) AS amount_domestic
			FROM gl_entry_item i
			INNER JOIN gl_entry e ON e.entry_uuid = i.entry_uuid
			INNER JOIN gl_account a ON a.account_code = i.account_code
			WHERE a.is_active = 1
				AND a.account_type = 'EXPENSE'
				${window.clause}
			GROUP BY label, i.account_code, a.account_name
			ORDER BY label ASC, i.account_code ASC
			`,
		)
		.all(...window.params);

	return rows.map((row) => ({
		label: row.label,
		accountCode: row.account_code,
		accountName: row.account_name,
		amountDomestic: row.amount_domestic,
	}));
}

type TypeDeltaRow = {
	account_type: string;
	delta: number | null;
};

function applyDelta(totals: OpeningBalances, row: TypeDeltaRow): void {
	const type = toAccountType(row.account_type);
	const delta = row.delta ?? 0;
	switch (type) {
		case 'ASSET':
			totals.asset += delta;
			break;
		case 'LIAB':
			totals.liability += delta;
			break;
		case 'EQUITY':
		case 'INCOME':
		case 'EXPENSE':
			break;
		default:
			assertNever(type);
	}
}

/** Signed asset and liability totals of everything dated strictly before `from`. */
export function getOpeningBalances(db: LedgerDb, from?: string): OpeningBalances {
	const totals: OpeningBalances = { asset: 0, liability: 0 };
	if (!from) {
		return totals;
	}

	const rows = db
		.prepare<[string], TypeDeltaRow>(
			`
			SELECT
				a.account_type,
				SUM(CASE WHEN i.dc = 'D' THEN i.amount_domestic ELSE -i.amount_domestic END) AS delta
			FROM gl_entry_item i
			INNER JOIN gl_entry e ON e.entry_uuid = i.entry_uuid
			INNER JOIN gl_account a ON a.account_code = i.account_code
			WHERE a.is_active = 1
				AND a.account_type IN ('ASSET', 'LIAB')
				AND e.accounting_date < ?
			GROUP BY a.account_type
			`,
		)
		.all(from);

	for (const row of rows) {
		applyDelta(totals, row);
	}
	return totals;
}

type AssetsTrendRow = TypeDeltaRow & { label: string };

/**
 * Running asset and liability balances per bucket, starting from the opening
 * balances before the window. Buckets without activity are not emitted.
 */
export function getAssetsTrend(db: LedgerDb, options: TrendOptions): AssetsTrendPoint[] {
	const window = dateWindow(options);
	const rows = db
		.prepare<string[], AssetsTrendRow>(
			`
			SELECT
				${labelExpression(options.granularity)} AS label,
				a.account_type,
				SUM(CASE WHEN i.dc = 'D' THEN i.amount_domestic ELSE -i.amount_domestic END) AS delta
			FROM gl_entry_item i
			INNER JOIN gl_entry e ON e.entry_uuid = i.entry_uuid
			INNER JOIN gl_account a ON a.account_code = i.account_code
			WHERE a.is_active = 1
				AND a.account_type IN ('ASSET', 'LIAB')
				${window.clause}
			GROUP BY label, a.account_type
			ORDER BY label ASC, a.account_type ASC
			`,
		)
		.all(...window.params);

	const buckets = new Map<string, OpeningBalances>();
	for (const row of rows) {
		let bucket = buckets.get(row.label);
		if (!bucket) {
			bucket = { asset: 0, liability: 0 };
			buckets.set(row.label, bucket);
		}
		applyDelta(bucket, row);
	}

	const running = getOpeningBalances(db, options.from);
	const points: AssetsTrendPoint[] = [];
	for (const label of [...buckets.keys()].sort()) {
		const bucket = buckets.get(label);
		if (!bucket) {
			continue;
		}
		running.asset += bucket.asset;
		running.liability += bucket.liability;
		points.push({
			label,
			assetBalance: running.asset,
			liabilityBalance: running.liability,
			netAssets: running.asset - running.liability,
		});
	}
	return points;
}

const MONTHLY_THRESHOLD_DAYS = 45;

export function suggestGranularity(from: string, to: string): Granularity {
	return daysBetween(from, to) > MONTHLY_THRESHOLD_DAYS ? 'month' : 'day';
}
