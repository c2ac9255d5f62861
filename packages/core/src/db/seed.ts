import type { AccountType } from '../types/ledger';

export type ChartAccountSeed = {
	code: string;
	name: string;
	type: AccountType;
	isPl: boolean;
	isUserManaged: boolean;
};

const STATIC_SEEDS: ChartAccountSeed[] = [
	{ code: '0000000001', name: 'Cash', type: 'ASSET', isPl: false, isUserManaged: false },
	// Placeholder card so a fresh ledger has a liability to pay with.
	{ code: '1000000001', name: 'Dummy Credit card', type: 'LIAB', isPl: false, isUserManaged: true },
	{ code: '3000000000', name: 'Capital', type: 'EQUITY', isPl: false, isUserManaged: false },
	{ code: '4000000000', name: 'Income', type: 'INCOME', isPl: true, isUserManaged: false },
	{ code: '5000000000', name: 'Uncategorized', type: 'EXPENSE', isPl: true, isUserManaged: false },
	{ code: '5000000001', name: 'Food and dining', type: 'EXPENSE', isPl: true, isUserManaged: false },
	{ code: '5000000002', name: 'Clothing and personal care', type: 'EXPENSE', isPl: true, isUserManaged: false },
	{ code: '5000000003', name: 'Entertainment and leisure', type: 'EXPENSE', isPl: true, isUserManaged: false },
	{ code: '5000000004', name: 'Transportation', type: 'EXPENSE', isPl: true, isUserManaged: false },
	{ code: '5000000005', name: 'Housing', type: 'EXPENSE', isPl: true, isUserManaged: false },
	{ code: '5000000006', name: 'Utilities and communications', type: 'EXPENSE', isPl: true, isUserManaged: false },
	{ code: '5000000007', name: 'Household supplies', type: 'EXPENSE', isPl: true, isUserManaged: false },
	{ code: '5000000008', name: 'Healthcare', type: 'EXPENSE', isPl: true, isUserManaged: false },
	{ code: '5000000009', name: 'Taxes and social security', type: 'EXPENSE', isPl: true, isUserManaged: false },
	{ code: '5000000010', name: 'Other expenses', type: 'EXPENSE', isPl: true, isUserManaged: false },
];

export function getChartOfAccountsSeeds(): ChartAccountSeed[] {
	return STATIC_SEEDS;
}

export const SETTING_KEYS = {
	userName: 'USER_NAME',
	domesticCurrency: 'CURRENCY_DOMESTIC',
} as const;

export const DEFAULT_DOMESTIC_CURRENCY = 'GBP';

export type SettingDefaults = {
	domesticCurrency?: string;
	userName?: string;
};

export function getDefaultSettings(defaults: SettingDefaults = {}): Array<[string, string]> {
	return [
		[SETTING_KEYS.userName, defaults.userName ?? ''],
		[SETTING_KEYS.domesticCurrency, defaults.domesticCurrency ?? DEFAULT_DOMESTIC_CURRENCY],
	];
}
