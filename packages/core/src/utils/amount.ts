import { assertNever, type DebitCredit } from '../types/ledger';

/** Largest signed debit/credit difference still accepted as balanced. */
export const BALANCE_TOLERANCE = 1e-6;

/** Amounts below this magnitude count as zero. */
export const ZERO_TOLERANCE = 1e-9;

export function signedAmount(dc: DebitCredit, amount: number): number {
	switch (dc) {
		case 'D':
			return amount;
		case 'C':
			return -amount;
		default:
			return assertNever(dc);
	}
}

export function entryBalance(lines: ReadonlyArray<{ dc: DebitCredit; amountDomestic: number }>): number {
	let balance = 0;
	for (const line of lines) {
		balance += signedAmount(line.dc, line.amountDomestic);
	}
	return balance;
}

export function isBalanced(balance: number): boolean {
	return Math.abs(balance) <= BALANCE_TOLERANCE;
}

export function isZeroAmount(amount: number): boolean {
	return Math.abs(amount) < ZERO_TOLERANCE;
}

export function formatDiff(diff: number): string {
	return diff.toFixed(6);
}

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Accepts finite numbers and decimal strings (sign and exponent allowed).
 * Returns null for anything else, including values within ZERO_TOLERANCE of zero.
 */
export function parseNonZeroAmount(raw: unknown): number | null {
	let value: number;
	if (typeof raw === 'number') {
		value = raw;
	} else if (typeof raw === 'string') {
		const cleaned = raw.trim();
		if (!DECIMAL_PATTERN.test(cleaned)) {
			return null;
		}
		value = Number(cleaned);
	} else {
		return null;
	}

	if (!Number.isFinite(value) || isZeroAmount(value)) {
		return null;
	}
	return value;
}
