import type { DebitCredit, EntryLineInput } from '../types/ledger';
import { fail, ok, type Result } from '../types/result';
import { isZeroAmount } from '../utils/amount';

export type ExpenseCategoryLine = {
	accountCode: string;
	amountDomestic: number;
	amountOriginal?: number | null;
	itemText?: string | null;
};

export type ComposeExpenseInput = {
	categoryLines: readonly ExpenseCategoryLine[];
	paymentAccountCode: string | null;
	/** Blank means the domestic currency. */
	currency: string;
	domesticCurrency: string;
};

/**
 * Build the lines of an expense entry: one debit per non-zero category row and a
 * single credit to the payment account for the totals.
 */
export function composeExpenseLines(input: ComposeExpenseInput): Result<EntryLineInput[]> {
	const currency = input.currency.trim().toUpperCase() || input.domesticCurrency;
	const isForeign = currency !== input.domesticCurrency;

	const lines: EntryLineInput[] = [];
	let totalDomestic = 0;
	let totalOriginal = 0;

	for (const [offset, row] of input.categoryLines.entries()) {
		// Negative rows are refunds; only exact zeros are dropped.
		if (isZeroAmount(row.amountDomestic)) {
			continue;
		}

		let amountOriginal = row.amountDomestic;
		if (isForeign) {
			amountOriginal = row.amountOriginal ?? 0;
			if (isZeroAmount(amountOriginal)) {
				return fail('validation', `line ${offset + 1}: original amount is required for foreign currency and cannot be zero`, {
					field: 'amount_original',
					index: offset + 1,
				});
			}
		}

		lines.push({
			accountCode: row.accountCode,
			dc: 'D',
			amountDomestic: row.amountDomestic,
			currencyOriginal: currency,
			amountOriginal,
			itemText: row.itemText ?? null,
		});
		totalDomestic += row.amountDomestic;
		totalOriginal += amountOriginal;
	}

	if (lines.length === 0) {
		return fail('validation', 'add at least one expense line with a non-zero amount', { field: 'lines' });
	}
	if (!input.paymentAccountCode) {
		return fail('validation', 'payment account is required', { field: 'payment_account' });
	}

	lines.push({
		accountCode: input.paymentAccountCode,
		dc: 'C',
		amountDomestic: totalDomestic,
		currencyOriginal: currency,
		amountOriginal: totalOriginal,
		itemText: null,
	});
	return ok(lines);
}

export type GeneralLine = {
	accountCode: string;
	dc: DebitCredit;
	amountDomestic: number;
	currency: string;
	amountOriginal?: number | null;
	itemText?: string | null;
};

export type ComposeGeneralInput = {
	lines: readonly GeneralLine[];
	domesticCurrency: string;
};

export function composeGeneralLines(input: ComposeGeneralInput): Result<EntryLineInput[]> {
	const lines: EntryLineInput[] = [];

	for (const [offset, row] of input.lines.entries()) {
		if (isZeroAmount(row.amountDomestic)) {
			continue;
		}

		const currency = row.currency.trim().toUpperCase() || input.domesticCurrency;
		const original = row.amountOriginal ?? 0;
		let amountOriginal = original;
		if (currency === input.domesticCurrency) {
			amountOriginal = isZeroAmount(original) ? row.amountDomestic : original;
		} else if (isZeroAmount(original)) {
			return fail('validation', `line ${offset + 1}: original amount is required for foreign currency lines and cannot be zero`, {
				field: 'amount_original',
				index: offset + 1,
			});
		}

		lines.push({
			accountCode: row.accountCode,
			dc: row.dc,
			amountDomestic: row.amountDomestic,
			currencyOriginal: currency,
			amountOriginal,
			itemText: row.itemText?.trim() || null,
		});
	}

	if (lines.length === 0) {
		return fail('validation', 'add at least one line with a non-zero amount', { field: 'lines' });
	}
	return ok(lines);
}
