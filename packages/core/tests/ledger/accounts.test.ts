import { describe, expect, test } from 'vitest';

import {
	createUserManagedAccount,
	findAccountByName,
	findPaymentAccountByName,
	getAccount,
	listAssetAccounts,
	listExpenseCategories,
	listPaymentAccounts,
	listUserManagedAccounts,
	nextUserManagedCode,
	updateUserManagedAccount,
} from '../../src/ledger/accounts';
import type { Account } from '../../src/types/ledger';
import { unwrap } from '../../src/types/result';
import { CARD, CASH, createTestDb, FOOD } from '../helpers';

describe('account lists', () => {
	test('filters by type and active flag', () => {
		const db = createTestDb();
		unwrap(createUserManagedAccount(db, 'Closed bank', 'ASSET', false));

		expect(listExpenseCategories(db)).toHaveLength(11);
		expect(listAssetAccounts(db).map((a) => a.code)).toEqual([CASH]);
		expect(listPaymentAccounts(db).map((a) => a.code)).toEqual([CASH, CARD]);
	});

	test('user-managed accounts list active assets, then liabilities, then inactive', () => {
		const db = createTestDb();
		unwrap(createUserManagedAccount(db, 'Zeta bank', 'ASSET'));
		unwrap(createUserManagedAccount(db, 'Alpha bank', 'ASSET'));
		unwrap(createUserManagedAccount(db, 'Old card', 'LIAB', false));

		expect(listUserManagedAccounts(db).map((a) => a.name)).toEqual(['Alpha bank', 'Zeta bank', 'Dummy Credit card', 'Old card']);
	});
});

describe('findAccountByName', () => {
	test('matches case-insensitively within the allowed types', () => {
		const db = createTestDb();

		expect(findAccountByName(db, '  food AND dining ', ['EXPENSE'])?.code).toBe(FOOD);
		expect(findAccountByName(db, 'Food and dining', ['ASSET', 'LIAB'])).toBeNull();
		expect(findPaymentAccountByName(db, 'dummy credit card')?.code).toBe(CARD);
	});

	test('returns null for blank names', () => {
		const db = createTestDb();

		expect(findAccountByName(db, '   ', ['ASSET'])).toBeNull();
		expect(findAccountByName(db, 'Cash', [])).toBeNull();
	});

	test('skips inactive accounts unless asked not to', () => {
		const db = createTestDb();
		const closed = unwrap(createUserManagedAccount(db, 'Closed bank', 'ASSET', false));

		expect(findPaymentAccountByName(db, 'Closed bank')).toBeNull();
		expect(findAccountByName(db, 'closed bank', ['ASSET'], false)?.code).toBe(closed.code);
	});

	test('treats a name matching two accounts as unresolved', () => {
		const db = createTestDb();
		db.prepare("INSERT INTO gl_account VALUES ('1000000009', 'CASH', 'ASSET', 0, 1, 1)").run();

		expect(findAccountByName(db, 'cash', ['ASSET'])).toBeNull();
	});
});

describe('nextUserManagedCode', () => {
	test('allocates above the seeded card in the asset range', () => {
		const db = createTestDb();

		expect(unwrap(nextUserManagedCode(db, 'ASSET'))).toBe('1000000002');
		expect(unwrap(nextUserManagedCode(db, 'LIAB'))).toBe('2000000001');
	});

	test('rejects types outside ASSET and LIAB', () => {
		const db = createTestDb();
		const result = nextUserManagedCode(db, 'EQUITY');

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.kind).toBe('validation');
			expect(result.error.message).toBe('account type must be ASSET or LIAB: EQUITY');
		}
	});
});

describe('createUserManagedAccount', () => {
	test('assigns unique codes inside each type range', () => {
		const db = createTestDb();
		const created: Account[] = [];
		for (const [name, type] of [
			['Main bank', 'ASSET'],
			['Visa', 'LIAB'],
			['Savings', 'ASSET'],
			['Mastercard', 'LIAB'],
			['Brokerage', 'ASSET'],
		] as const) {
			created.push(unwrap(createUserManagedAccount(db, name, type)));
		}

		expect(created.map((a) => a.code)).toEqual(['1000000002', '2000000001', '1000000003', '2000000002', '1000000004']);
		expect(new Set(created.map((a) => a.code)).size).toBe(5);
		for (const account of created) {
			expect(account.code).toMatch(account.type === 'ASSET' ? /^1\d{9}$/ : /^2\d{9}$/);
			expect(getAccount(db, account.code)).toEqual(account);
		}
	});

	test('rejects duplicate names regardless of case', () => {
		const db = createTestDb();
		const result = createUserManagedAccount(db, 'cash', 'ASSET');

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.kind).toBe('validation');
			expect(result.error.message).toBe('account name already exists: cash');
		}
	});

	test('rejects empty names and non payment types', () => {
		const db = createTestDb();

		const empty = createUserManagedAccount(db, '  ', 'ASSET');
		expect(empty.ok ? null : empty.error.message).toBe('account name must not be empty');

		const expense = createUserManagedAccount(db, 'Groceries', 'EXPENSE');
		expect(expense.ok ? null : expense.error.message).toBe('account type must be ASSET or LIAB: EXPENSE');
	});
});

describe('updateUserManagedAccount', () => {
	test('renames and deactivates a user account', () => {
		const db = createTestDb();
		const bank = unwrap(createUserManagedAccount(db, 'Main bank', 'ASSET'));

		const updated = unwrap(updateUserManagedAccount(db, bank.code, 'Joint bank', false));

		expect(updated).toEqual({ ...bank, name: 'Joint bank', isActive: false });
		expect(getAccount(db, bank.code)).toEqual(updated);
	});

	test('never touches system accounts', () => {
		const db = createTestDb();
		const result = updateUserManagedAccount(db, CASH, 'Wallet', true);

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.kind).toBe('not_found');
			expect(result.error.message).toBe('user-managed account not found: 0000000001');
		}
		expect(getAccount(db, CASH)?.name).toBe('Cash');
		expect(updateUserManagedAccount(db, FOOD, 'Meals', true).ok).toBe(false);
	});

	test('rejects a name taken by another account', () => {
		const db = createTestDb();
		const result = updateUserManagedAccount(db, CARD, 'Capital', true);

		expect(result.ok ? null : result.error.kind).toBe('validation');
	});

	test('keeps the current name when only the active flag changes', () => {
		const db = createTestDb();

		expect(unwrap(updateUserManagedAccount(db, CARD, 'Dummy Credit card', false)).isActive).toBe(false);
	});
});
