import type { LedgerDb } from '../db/connection';
import { type Account, type AccountType, assertNever, PAYMENT_ACCOUNT_TYPES, toAccountType, USER_MANAGED_ACCOUNT_TYPES } from '../types/ledger';
import { describeError, fail, ok, type Result } from '../types/result';

type AccountRow = {
	account_code: string;
	account_name: string;
	account_type: string;
	is_pl: number;
	is_active: number;
	is_user_managed: number;
};

const ACCOUNT_COLUMNS = 'account_code, account_name, account_type, is_pl, is_active, is_user_managed';

function toAccount(row: AccountRow): Account {
	return {
		code: row.account_code,
		name: row.account_name,
		type: toAccountType(row.account_type),
		isPl: row.is_pl === 1,
		isActive: row.is_active === 1,
		isUserManaged: row.is_user_managed === 1,
	};
}

function placeholders(count: number): string {
	return Array.from({ length: count }, () => '?').join(', ');
}

export type AccountFilter = {
	activeOnly?: boolean;
	types?: readonly AccountType[];
};

export function listAccounts(db: LedgerDb, filter: AccountFilter = {}): Account[] {
	const conditions: string[] = [];
	const params: string[] = [];

	if (filter.activeOnly) {
		conditions.push('is_active = 1');
	}
	if (filter.types) {
		if (filter.types.length === 0) {
			return [];
		}
		conditions.push(`account_type IN (${placeholders(filter.types.length)})`);
		params.push(...filter.types);
	}

	const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
	const rows = db.prepare<string[], AccountRow>(`SELECT ${ACCOUNT_COLUMNS} FROM gl_account ${where} ORDER BY account_code`).all(...params);
	return rows.map(toAccount);
}

export function listExpenseCategories(db: LedgerDb): Account[] {
	return listAccounts(db, { activeOnly: true, types: ['EXPENSE'] });
}

export function listAssetAccounts(db: LedgerDb): Account[] {
	return listAccounts(db, { activeOnly: true, types: ['ASSET'] });
}

/** Cash and bank accounts (ASSET) plus cards (LIAB). */
export function listPaymentAccounts(db: LedgerDb): Account[] {
	return listAccounts(db, { activeOnly: true, types: PAYMENT_ACCOUNT_TYPES });
}

/** Every postable account, for general entries. */
export function listActiveAccounts(db: LedgerDb): Account[] {
	return listAccounts(db, { activeOnly: true });
}

export function getAccount(db: LedgerDb, code: string): Account | null {
	const row = db.prepare<[string], AccountRow>(`SELECT ${ACCOUNT_COLUMNS} FROM gl_account WHERE account_code = ?`).get(code);
	return row ? toAccount(row) : null;
}

export function getUserManagedAccount(db: LedgerDb, code: string): Account | null {
	const row = db
		.prepare<[string], AccountRow>(
			`SELECT ${ACCOUNT_COLUMNS} FROM gl_account
			WHERE account_code = ? AND is_user_managed = 1 AND account_type IN ('ASSET', 'LIAB')`,
		)
		.get(code);
	return row ? toAccount(row) : null;
}

/** Active assets, then active liabilities, then inactive accounts; by name within each group. */
export function listUserManagedAccounts(db: LedgerDb): Account[] {
	const rows = db
		.prepare<[], AccountRow>(
			`
			SELECT ${ACCOUNT_COLUMNS}
			FROM gl_account
			WHERE is_user_managed = 1 AND account_type IN ('ASSET', 'LIAB')
			ORDER BY
				CASE WHEN is_active = 0 THEN 3 WHEN account_type = 'ASSET' THEN 1 ELSE 2 END,
				account_name
			`,
		)
		.all();
	return rows.map(toAccount);
}

/**
 * Resolve a display name to exactly one account. Matching is case-insensitive and
 * limited to `allowedTypes`; no match, an inactive match (when `activeRequired`) or
 * an ambiguous match all yield null.
 */
export function findAccountByName(db: LedgerDb, name: string, allowedTypes: readonly AccountType[], activeRequired = true): Account | null {
	const trimmed = name.trim();
	if (trimmed.length === 0 || allowedTypes.length === 0) {
		return null;
	}

	const activeClause = activeRequired ? 'AND is_active = 1' : '';
	const rows = db
		.prepare<string[], AccountRow>(
			`
			SELECT ${ACCOUNT_COLUMNS}
			FROM gl_account
			WHERE account_name = ? COLLATE NOCASE
				AND account_type IN (${placeholders(allowedTypes.length)})
				${activeClause}
			LIMIT 2
			`,
		)
		.all(trimmed, ...allowedTypes);

	const [match] = rows;
	if (!match || rows.length > 1) {
		return null;
	}
	return toAccount(match);
}

export function findPaymentAccountByName(db: LedgerDb, name: string): Account | null {
	return findAccountByName(db, name, PAYMENT_ACCOUNT_TYPES);
}

type CodeRange = { pattern: string; floor: number };

function userManagedRange(type: AccountType): CodeRange | null {
	switch (type) {
		case 'ASSET':
			return { pattern: '1?????????', floor: 1_000_000_000 };
		case 'LIAB':
			return { pattern: '2?????????', floor: 2_000_000_000 };
		case 'EQUITY':
		case 'INCOME':
		case 'EXPENSE':
			return null;
		default:
			return assertNever(type);
	}
}

const RANGE_SIZE = 1_000_000_000;

/**
 * Next free code in the range reserved for `type`. The scan matches on the code
 * prefix rather than the stored type, so a row typed differently but living in the
 * range (the seeded card in 1x, for one) still counts.
 */
export function nextUserManagedCode(db: LedgerDb, type: AccountType): Result<string> {
	const range = userManagedRange(type);
	if (!range) {
		return fail('validation', `account type must be ASSET or LIAB: ${type}`, { field: 'account_type', value: type });
	}

	const row = db
		.prepare<[string], { max_code: number | null }>('SELECT MAX(CAST(account_code AS INTEGER)) AS max_code FROM gl_account WHERE account_code GLOB ?')
		.get(range.pattern);
	const next = Math.max(row?.max_code ?? range.floor, range.floor) + 1;
	if (next >= range.floor + RANGE_SIZE) {
		return fail('validation', `no free account codes left for ${type}`, { field: 'account_code', value: type });
	}
	return ok(next.toString().padStart(10, '0'));
}

function isNameTaken(db: LedgerDb, name: string, exceptCode?: string): boolean {
	const row = db
		.prepare<[string, string], { account_code: string }>('SELECT account_code FROM gl_account WHERE account_name = ? COLLATE NOCASE AND account_code <> ? LIMIT 1')
		.get(name, exceptCode ?? '');
	return row !== undefined;
}

function isUserManagedType(type: AccountType): boolean {
	return USER_MANAGED_ACCOUNT_TYPES.some((candidate) => candidate === type);
}

export function createUserManagedAccount(db: LedgerDb, name: string, type: AccountType, active = true): Result<Account> {
	const trimmed = name.trim();
	if (trimmed.length === 0) {
		return fail('validation', 'account name must not be empty', { field: 'account_name' });
	}
	if (!isUserManagedType(type)) {
		return fail('validation', `account type must be ASSET or LIAB: ${type}`, { field: 'account_type', value: type });
	}

	const insert = db.prepare<[string, string, string, number]>(
		`INSERT INTO gl_account (account_code, account_name, account_type, is_pl, is_active, is_user_managed)
		VALUES (?, ?, ?, 0, ?, 1)`,
	);

	try {
		return db.transaction((): Result<Account> => {
			if (isNameTaken(db, trimmed)) {
				return fail('validation', `account name already exists: ${trimmed}`, { field: 'account_name', value: trimmed });
			}
			const code = nextUserManagedCode(db, type);
			if (!code.ok) {
				return code;
			}
			insert.run(code.value, trimmed, type, active ? 1 : 0);
			return ok({ code: code.value, name: trimmed, type, isPl: false, isActive: active, isUserManaged: true });
		})();
	} catch (error) {
		return fail('validation', `failed to create account ${trimmed}: ${describeError(error)}`, { field: 'account_name', value: trimmed }, error);
	}
}

/** Rename or toggle a user-managed ASSET/LIAB account. System accounts are never matched. */
export function updateUserManagedAccount(db: LedgerDb, code: string, name: string, active: boolean): Result<Account> {
	const trimmed = name.trim();
	if (trimmed.length === 0) {
		return fail('validation', 'account name must not be empty', { field: 'account_name', accountCode: code });
	}

	const update = db.prepare<[string, number, string]>(
		`UPDATE gl_account SET account_name = ?, is_active = ?
		WHERE account_code = ? AND is_user_managed = 1 AND account_type IN ('ASSET', 'LIAB')`,
	);

	try {
		return db.transaction((): Result<Account> => {
			const existing = getUserManagedAccount(db, code);
			if (!existing) {
				return fail('not_found', `user-managed account not found: ${code}`, { accountCode: code });
			}
			if (isNameTaken(db, trimmed, code)) {
				return fail('validation', `account name already exists: ${trimmed}`, { field: 'account_name', value: trimmed, accountCode: code });
			}
			update.run(trimmed, active ? 1 : 0, code);
			return ok({ ...existing, name: trimmed, isActive: active });
		})();
	} catch (error) {
		return fail('validation', `failed to update account ${code}: ${describeError(error)}`, { accountCode: code }, error);
	}
}
