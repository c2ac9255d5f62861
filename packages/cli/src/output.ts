/**
 * Rendering of command results as a table, JSON or TSV.
 */

import { assertNever, type JournalDateSection, type JournalListRow } from '@tally/core';
import { Table } from 'console-table-printer';

import { amountCell, flagCell, textCell } from './format';
import { json, log } from './logger';

export const OUTPUT_FORMATS = ['table', 'json', 'tsv'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function parseFormat(value: string | undefined): OutputFormat {
	return OUTPUT_FORMATS.find((format) => format === value) ?? 'table';
}

/**
 * `money` cells are right-aligned amounts, `text` cells show `-` when empty and
 * are cut at `width`, `flag` cells read yes/no. Anything else prints as is.
 */
export type CellKind = 'plain' | 'text' | 'money' | 'flag';

export type Column<T> = {
	key: keyof T & string;
	label: string;
	kind?: CellKind;
	width?: number;
};

function clip(value: string, width: number | undefined): string {
	if (width === undefined || value.length <= width) return value;
	return width <= 3 ? value.slice(0, width) : `${value.slice(0, width - 3)}...`;
}

export function formatCell<T>(column: Column<T>, value: unknown): string {
	const kind = column.kind ?? 'plain';
	switch (kind) {
		case 'plain':
			return value === null || value === undefined ? '' : String(value);
		case 'text':
			return clip(textCell(value), column.width);
		case 'money':
			return amountCell(value);
		case 'flag':
			return flagCell(value);
		default:
			return assertNever(kind);
	}
}

function alignment(kind: CellKind | undefined): 'left' | 'right' {
	return kind === 'money' ? 'right' : 'left';
}

const BLANK_RULE = { left: '', mid: '', right: '', other: '' };

export function renderTable<T extends Record<string, unknown>>(rows: readonly T[], columns: readonly Column<T>[]): string {
	if (rows.length === 0) {
		return 'No results.';
	}

	const printer = new Table({
		style: { headerTop: BLANK_RULE, headerBottom: BLANK_RULE, tableBottom: BLANK_RULE, rowSeparator: BLANK_RULE, vertical: '' },
		columns: columns.map((column) => ({
			name: column.key,
			title: column.label.toUpperCase(),
			alignment: alignment(column.kind),
		})),
	});
	for (const row of rows) {
		printer.addRow(Object.fromEntries(columns.map((column) => [column.key, formatCell(column, row[column.key])])));
	}
	return printer.render();
}

/** Header line plus one line per row; tabs and newlines inside cells become spaces. */
export function renderTsv<T extends Record<string, unknown>>(rows: readonly T[], columns: readonly Column<T>[]): string {
	if (rows.length === 0) {
		return '';
	}
	const lines = [columns.map((column) => column.label)];
	for (const row of rows) {
		lines.push(columns.map((column) => formatCell(column, row[column.key]).replace(/[\t\n]/g, ' ')));
	}
	return lines.map((cells) => cells.join('\t')).join('\n');
}

/** Print rows; `footer` lines follow the table and are left out of JSON and TSV. */
export function printRows<T extends Record<string, unknown>>(
	rows: readonly T[],
	columns: readonly Column<T>[],
	format: OutputFormat,
	footer: readonly string[] = [],
): void {
	switch (format) {
		case 'json':
			json(rows);
			return;
		case 'tsv':
			log(renderTsv(rows, columns));
			return;
		case 'table':
			log(renderTable(rows, columns));
			if (footer.length > 0) {
				log(`\n${footer.join('\n')}`);
			}
			return;
		default:
			assertNever(format);
	}
}

export const JOURNAL_COLUMNS: readonly Column<JournalListRow>[] = [
	{ key: 'accountingDate', label: 'Date' },
	{ key: 'iconKey', label: 'Kind' },
	{ key: 'entryTitle', label: 'Title', kind: 'text', width: 40 },
	{ key: 'amountDomestic', label: 'Amount', kind: 'money' },
	{ key: 'entryUuid', label: 'Entry' },
];

const SECTION_COLUMNS = JOURNAL_COLUMNS.filter((column) => column.key !== 'accountingDate');

/** Journal lists: one table per date, or the sections as JSON, or flat TSV. */
export function printJournal(sections: readonly JournalDateSection[], format: OutputFormat): void {
	switch (format) {
		case 'json':
			json(sections);
			return;
		case 'tsv':
			log(renderTsv(sections.flatMap((section) => section.rows), JOURNAL_COLUMNS));
			return;
		case 'table':
			if (sections.length === 0) {
				log('No results.');
				return;
			}
			for (const section of sections) {
				log(section.date);
				log(renderTable(section.rows, SECTION_COLUMNS));
			}
			return;
		default:
			assertNever(format);
	}
}
