import type { JournalDateSection } from '@tally/core';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { setQuietMode } from '../src/logger';
import { type Column, printJournal, printRows, renderTable } from '../src/output';

type Row = { code: string; name: string; balance: number };

const COLUMNS: Column<Row>[] = [
	{ key: 'code', label: 'Code' },
	{ key: 'name', label: 'Account', kind: 'text' },
	{ key: 'balance', label: 'Balance', kind: 'money' },
];

const ROWS: Row[] = [
	{ code: '0000000001', name: 'Cash', balance: 18.5 },
	{ code: '1000000001', name: 'Card', balance: -1200 },
];

const SECTIONS: JournalDateSection[] = [
	{
		date: '2025-01-12',
		rows: [{ accountingDate: '2025-01-12', entryUuid: 'entry-b', entryTitle: 'Bakery', amountDomestic: 4.2, iconKey: 'food' }],
	},
	{
		date: '2025-01-10',
		rows: [{ accountingDate: '2025-01-10', entryUuid: 'entry-a', entryTitle: null, amountDomestic: 30, iconKey: 'clothing' }],
	},
];

let printed: string[] = [];

beforeEach(() => {
	printed = [];
	vi.spyOn(console, 'log').mockImplementation((message: unknown) => {
		printed.push(String(message));
	});
});

afterEach(() => {
	setQuietMode(false);
	vi.restoreAllMocks();
});

describe('renderTable', () => {
	test('reports an empty result', () => {
		expect(renderTable([], COLUMNS)).toBe('No results.');
	});

	test('formats money cells and upper-cases headers', () => {
		const table = renderTable(ROWS, COLUMNS);

		expect(table).toContain('BALANCE');
		expect(table).toContain('18.50');
		expect(table).toContain('-1,200.00');
	});
});

describe('printRows', () => {
	test('prints JSON rows as they are', () => {
		printRows(ROWS, COLUMNS, 'json', ['Total: 1']);

		expect(printed).toEqual([JSON.stringify(ROWS, null, 2)]);
	});

	test('leaves the footer out of TSV', () => {
		printRows(ROWS, COLUMNS, 'tsv', ['Total: 1']);

		expect(printed).toEqual(['Code\tAccount\tBalance\n0000000001\tCash\t18.50\n1000000001\tCard\t-1,200.00']);
	});

	test('prints the footer after a table', () => {
		printRows(ROWS, COLUMNS, 'table', ['Assets: GBP 18.50', 'Net: GBP 18.50']);

		expect(printed).toHaveLength(2);
		expect(printed[1]).toBe('\nAssets: GBP 18.50\nNet: GBP 18.50');
	});

	test('prints nothing in quiet mode', () => {
		setQuietMode(true);
		printRows(ROWS, COLUMNS, 'table', ['Total: 1']);

		expect(printed).toEqual([]);
	});
});

describe('printJournal', () => {
	test('prints the date sections as JSON', () => {
		printJournal(SECTIONS, 'json');

		expect(printed).toEqual([JSON.stringify(SECTIONS, null, 2)]);
	});

	test('flattens the sections into TSV rows', () => {
		printJournal(SECTIONS, 'tsv');

		expect(printed).toEqual(['Date\tKind\tTitle\tAmount\tEntry\n2025-01-12\tfood\tBakery\t4.20\tentry-b\n2025-01-10\tclothing\t-\t30.00\tentry-a']);
	});

	test('prints a date heading before each section table', () => {
		printJournal(SECTIONS, 'table');

		expect(printed).toHaveLength(4);
		expect(printed[0]).toBe('2025-01-12');
		expect(printed[1]).toContain('Bakery');
		expect(printed[1]).not.toContain('DATE');
		expect(printed[2]).toBe('2025-01-10');
		expect(printed[3]).toContain('30.00');
	});

	test('reports an empty journal', () => {
		printJournal([], 'table');

		expect(printed).toEqual(['No results.']);
	});
});
