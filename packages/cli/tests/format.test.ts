import { describe, expect, test } from 'vitest';

import { amountCell, flagCell, formatAmount, formatCount, formatMoney, textCell } from '../src/format';
import { type Column, formatCell, parseFormat, renderTsv } from '../src/output';

describe('formatAmount', () => {
	test('groups thousands and keeps two decimals', () => {
		expect(formatAmount(1234.5)).toBe('1,234.50');
		expect(formatAmount(-500)).toBe('-500.00');
		expect(formatAmount(-0.001)).toBe('0.00');
		expect(formatAmount(null)).toBe('-');
	});

	test('prefixes the currency', () => {
		expect(formatMoney(24.7, 'GBP')).toBe('GBP 24.70');
		expect(formatMoney(-3, 'USD')).toBe('-USD 3.00');
		expect(formatMoney(undefined, 'GBP')).toBe('-');
	});
});

describe('cells', () => {
	test('render placeholders for missing values', () => {
		expect(amountCell('x')).toBe('-');
		expect(amountCell(2)).toBe('2.00');
		expect(textCell('')).toBe('-');
		expect(textCell('Cash')).toBe('Cash');
		expect(flagCell(true)).toBe('yes');
		expect(flagCell(1)).toBe('no');
		expect(formatCount(1, 'entry', 'entries')).toBe('1 entry');
		expect(formatCount(2, 'account')).toBe('2 accounts');
	});
});

describe('renderTsv', () => {
	type Row = { date: string; title: string | null; amount: number };
	const columns: Column<Row>[] = [
		{ key: 'date', label: 'Date' },
		{ key: 'title', label: 'Title', kind: 'text' },
		{ key: 'amount', label: 'Amount', kind: 'money' },
	];

	test('writes a header and one line per row', () => {
		const rows: Row[] = [
			{ date: '2025-01-10', title: 'Corner\tshop', amount: 18.5 },
			{ date: '2025-01-12', title: null, amount: 5 },
		];

		expect(renderTsv(rows, columns)).toBe('Date\tTitle\tAmount\n2025-01-10\tCorner shop\t18.50\n2025-01-12\t-\t5.00');
		expect(renderTsv([], columns)).toBe('');
	});

	test('clips long text cells to the column width', () => {
		const title: Column<Row> = { key: 'title', label: 'Title', kind: 'text', width: 8 };

		expect(formatCell(title, 'Weekly groceries')).toBe('Weekl...');
		expect(formatCell(title, 'Bakery')).toBe('Bakery');
		expect(formatCell<Row>({ key: 'date', label: 'Date' }, null)).toBe('');
		expect(formatCell<Row>({ key: 'date', label: 'Date', kind: 'flag' }, true)).toBe('yes');
	});

	test('parses output formats', () => {
		expect(parseFormat('json')).toBe('json');
		expect(parseFormat('tsv')).toBe('tsv');
		expect(parseFormat('csv')).toBe('table');
		expect(parseFormat(undefined)).toBe('table');
	});
});
