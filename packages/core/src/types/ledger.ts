export const ACCOUNT_TYPES = ['ASSET', 'LIAB', 'EQUITY', 'INCOME', 'EXPENSE'] as const;

export type AccountType = (typeof ACCOUNT_TYPES)[number];

export function isAccountType(value: string): value is AccountType {
	return (ACCOUNT_TYPES as readonly string[]).includes(value);
}

/** Account types a user may create at runtime. */
export const USER_MANAGED_ACCOUNT_TYPES = ['ASSET', 'LIAB'] as const;

export type UserManagedAccountType = (typeof USER_MANAGED_ACCOUNT_TYPES)[number];

export function isUserManagedAccountType(value: string): value is UserManagedAccountType {
	return (USER_MANAGED_ACCOUNT_TYPES as readonly string[]).includes(value);
}

export const PAYMENT_ACCOUNT_TYPES: readonly AccountType[] = USER_MANAGED_ACCOUNT_TYPES;

export const DEBIT_CREDIT = ['D', 'C'] as const;

export type DebitCredit = (typeof DEBIT_CREDIT)[number];

export function isDebitCredit(value: string): value is DebitCredit {
	return (DEBIT_CREDIT as readonly string[]).includes(value);
}

export const ENTRY_TYPES = ['EXPENSE', 'GENERAL'] as const;

export type EntryType = (typeof ENTRY_TYPES)[number];

export function isEntryType(value: string): value is EntryType {
	return (ENTRY_TYPES as readonly string[]).includes(value);
}

export const GRANULARITIES = ['day', 'month'] as const;

export type Granularity = (typeof GRANULARITIES)[number];

export function isGranularity(value: string): value is Granularity {
	return (GRANULARITIES as readonly string[]).includes(value);
}

/**
 * Profit/loss accounts reset each period; balance-sheet accounts carry forward.
 */
export function isProfitAndLoss(type: AccountType): boolean {
	switch (type) {
		case 'INCOME':
		case 'EXPENSE':
			return true;
		case 'ASSET':
		case 'LIAB':
		case 'EQUITY':
			return false;
		default:
			return assertNever(type);
	}
}

export function assertNever(value: never): never {
	throw new Error(`Unhandled variant: ${String(value)}`);
}

export type Account = {
	code: string;
	name: string;
	type: AccountType;
	isPl: boolean;
	isActive: boolean;
	isUserManaged: boolean;
};

export type EntryHeader = {
	entryUuid: string;
	modificationDate: string;
	accountingDate: string;
	entryType: EntryType;
	entryTitle: string | null;
	entryText: string | null;
};

export type EntryLine = {
	entryUuid: string;
	lineNo: number;
	accountCode: string;
	accountName: string;
	accountType: AccountType;
	accountIsPl: boolean;
	dc: DebitCredit;
	amountDomestic: number;
	currencyOriginal: string;
	amountOriginal: number | null;
	itemText: string | null;
};

export type Entry = EntryHeader & {
	lines: EntryLine[];
};

export type EntryLineInput = {
	accountCode: string;
	dc: DebitCredit;
	amountDomestic: number;
	currencyOriginal: string;
	amountOriginal: number | null;
	itemText?: string | null;
};

export type SaveEntryRequest = {
	entryUuid: string;
	accountingDate: string;
	entryType: EntryType;
	entryTitle: string | null;
	entryText: string | null;
	lines: EntryLineInput[];
	isNew: boolean;
};

export type SavedEntry = {
	entryUuid: string;
	modificationDate: string;
	lineCount: number;
};

function parseTag<T extends string>(value: string, guard: (v: string) => v is T, label: string): T {
	if (!guard(value)) {
		throw new Error(`Unknown ${label}: ${value}`);
	}
	return value;
}

/** Narrow a stored column value; the schema CHECK constraints keep these closed. */
export function toAccountType(value: string): AccountType {
	return parseTag(value, isAccountType, 'account type');
}

export function toDebitCredit(value: string): DebitCredit {
	return parseTag(value, isDebitCredit, 'dc');
}

export function toEntryType(value: string): EntryType {
	return parseTag(value, isEntryType, 'entry type');
}
