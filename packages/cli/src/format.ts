/**
 * Formatters for amounts and dates.
 * Amounts are domestic-currency values as stored; display rounds to two decimals.
 */

// Cached formatter - created once, reused for all calls
const amountFormatter = new Intl.NumberFormat('en-GB', {
	minimumFractionDigits: 2,
	maximumFractionDigits: 2,
});

/**
 * Examples: 1234.5 -> "1,234.50", -500 -> "-500.00"
 */
export function formatAmount(amount: number | null | undefined): string {
	if (amount === null || amount === undefined) return '-';

	const formatted = amountFormatter.format(Math.abs(amount));
	return amount < 0 && formatted !== '0.00' ? `-${formatted}` : formatted;
}

/**
 * Examples: (24.7, "GBP") -> "GBP 24.70", (-3, "USD") -> "-USD 3.00"
 */
export function formatMoney(amount: number | null | undefined, currency: string): string {
	if (amount === null || amount === undefined) return '-';

	const formatted = formatAmount(amount);
	return formatted.startsWith('-') ? `-${currency} ${formatted.slice(1)}` : `${currency} ${formatted}`;
}

/** Table cell formatter for numeric columns. */
export function amountCell(value: unknown): string {
	return typeof value === 'number' ? formatAmount(value) : '-';
}

export function textCell(value: unknown): string {
	if (value === null || value === undefined || value === '') return '-';
	return String(value);
}

export function flagCell(value: unknown): string {
	return value === true ? 'yes' : 'no';
}

/**
 * Format a count with optional singular/plural.
 */
export function formatCount(count: number, singular: string, plural?: string): string {
	const label = count === 1 ? singular : (plural ?? `${singular}s`);
	return `${count} ${label}`;
}
