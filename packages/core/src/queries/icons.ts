import { type AccountType, assertNever } from '../types/ledger';

export const CASH_ACCOUNT_CODE = '0000000001';

export const EXPENSE_ICON_BY_CODE: Readonly<Record<string, string>> = {
	'5000000000': 'uncategorized',
	'5000000001': 'food',
	'5000000002': 'clothing',
	'5000000003': 'entertainment',
	'5000000004': 'transport',
	'5000000005': 'housing',
	'5000000006': 'utilities',
	'5000000007': 'household',
	'5000000008': 'healthcare',
	'5000000009': 'taxes',
	'5000000010': 'other',
};

export const DEFAULT_EXPENSE_ICON = 'receipt';

export function expenseIcon(accountCode: string): string {
	return EXPENSE_ICON_BY_CODE[accountCode] ?? DEFAULT_EXPENSE_ICON;
}

export function balanceSheetIcon(accountCode: string, accountType: AccountType): string {
	if (accountCode === CASH_ACCOUNT_CODE) {
		return 'cash';
	}
	switch (accountType) {
		case 'ASSET':
			return 'bank';
		case 'LIAB':
			return 'card';
		case 'EQUITY':
		case 'INCOME':
		case 'EXPENSE':
			return 'dot';
		default:
			return assertNever(accountType);
	}
}
