import { randomUUID } from 'node:crypto';
import { readFile } from 'node:fs/promises';

import type { LedgerDb } from '../db/connection';
import { saveEntryFullReplace } from '../ledger/entries';
import type { EntryLineInput } from '../types/ledger';
import { describeError, fail, ok, type Result } from '../types/result';
import { entryBalance, formatDiff, isBalanced, ZERO_TOLERANCE } from '../utils/amount';
import { type NormalizedLine, type NormalizedPayload, type NormalizeOptions, normalizeLine, normalizeTop } from './payload';

export type ExpenseImportResult = {
	entryUuid: string;
	accountingDate: string;
	currencyOriginal: string;
	totalAmountDomestic: number;
	totalAmountOriginal: number;
	lineCount: number;
};

export type ExpenseImportOptions = NormalizeOptions & {
	/** Checked before the write starts; an aborted import writes nothing. */
	signal?: AbortSignal;
	/** Entry id to use instead of a fresh one. */
	entryUuid?: string;
};

export type BalancedLines = {
	lines: EntryLineInput[];
	totalDomestic: number;
	totalOriginal: number;
};

/** One debit per category line plus the payment-account credit for the totals. */
export function buildBalancedLines(header: NormalizedPayload, normalized: readonly NormalizedLine[]): Result<BalancedLines> {
	const lines: EntryLineInput[] = [];
	let totalDomestic = 0;
	let totalOriginal = 0;

	for (const line of normalized) {
		lines.push({
			accountCode: line.account.code,
			dc: 'D',
			amountDomestic: line.amountDomestic,
			currencyOriginal: header.currencyOriginal,
			amountOriginal: line.amountOriginal,
			itemText: line.itemText,
		});
		totalDomestic += line.amountDomestic;
		totalOriginal += line.amountOriginal;
	}

	if (Math.abs(totalDomestic) <= ZERO_TOLERANCE) {
		return fail('validation', 'total amount_domestic must not be zero', { field: 'lines', value: totalDomestic });
	}

	lines.push({
		accountCode: header.paymentAccount.code,
		dc: 'C',
		amountDomestic: totalDomestic,
		currencyOriginal: header.currencyOriginal,
		amountOriginal: totalOriginal,
		itemText: null,
	});

	const diff = entryBalance(lines);
	if (!isBalanced(diff)) {
		return fail('validation', `debit/credit not balanced after build: diff=${formatDiff(diff)}`, { field: 'lines', value: diff });
	}

	return ok({ lines, totalDomestic, totalOriginal });
}

/**
 * Turn an untrusted expense payload into one balanced EXPENSE entry. Stages run
 * fail-fast and nothing is written until every stage has passed.
 */
export function importExpensePayload(db: LedgerDb, payload: unknown, options: ExpenseImportOptions = {}): Result<ExpenseImportResult> {
	const header = normalizeTop(db, payload, options);
	if (!header.ok) {
		return header;
	}

	const normalized: NormalizedLine[] = [];
	for (const [offset, raw] of header.value.lines.entries()) {
		const line = normalizeLine(db, offset + 1, raw);
		if (!line.ok) {
			return line;
		}
		normalized.push(line.value);
	}

	const built = buildBalancedLines(header.value, normalized);
	if (!built.ok) {
		return built;
	}

	if (options.signal?.aborted) {
		return fail('validation', 'import aborted before write', { field: 'signal' });
	}

	const entryUuid = options.entryUuid ?? randomUUID();
	const saved = saveEntryFullReplace(db, {
		entryUuid,
		accountingDate: header.value.accountingDate,
		entryType: 'EXPENSE',
		entryTitle: header.value.entryTitle,
		entryText: header.value.entryText,
		lines: built.value.lines,
		isNew: true,
	});
	if (!saved.ok) {
		return fail('validation', saved.error.message, saved.error.context, saved.error);
	}

	return ok({
		entryUuid,
		accountingDate: header.value.accountingDate,
		currencyOriginal: header.value.currencyOriginal,
		totalAmountDomestic: built.value.totalDomestic,
		totalAmountOriginal: built.value.totalOriginal,
		lineCount: normalized.length,
	});
}

export async function readJsonFile(path: string): Promise<Result<unknown>> {
	let text: string;
	try {
		text = await readFile(path, 'utf-8');
	} catch (error) {
		return fail('validation', `failed to read JSON file ${path}: ${describeError(error)}`, { field: 'path', value: path }, error);
	}
	try {
		const data: unknown = JSON.parse(text);
		return ok(data);
	} catch (error) {
		return fail('validation', `failed to parse JSON file ${path}: ${describeError(error)}`, { field: 'path', value: path }, error);
	}
}

export async function importExpenseFile(db: LedgerDb, path: string, options: ExpenseImportOptions = {}): Promise<Result<ExpenseImportResult>> {
	const payload = await readJsonFile(path);
	if (!payload.ok) {
		return payload;
	}
	return importExpensePayload(db, payload.value, options);
}
