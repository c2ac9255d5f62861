import { type ZodIssue, z } from 'zod';

import type { LedgerDb } from '../db/connection';
import { findAccountByName, findPaymentAccountByName } from '../ledger/accounts';
import { getDomesticCurrency } from '../ledger/settings';
import type { Account } from '../types/ledger';
import { fail, ok, type Result } from '../types/result';
import { parseNonZeroAmount } from '../utils/amount';
import { isIsoDate, todayIso } from '../utils/datetime';

export const MAX_IMPORT_LINES = 500;
export const MAX_STORE_LENGTH = 200;
export const MAX_NOTE_LENGTH = 500;

/** Length is counted in code points, so an emoji is one character. */
function optionalText(max: number) {
	return z
		.string({ invalid_type_error: 'must be a string or null' })
		.refine((value) => [...value].length <= max, `must be ${max} characters or less`)
		.nullish();
}

function requiredName() {
	return z
		.string({ required_error: 'is required', invalid_type_error: 'must be a non-empty string' })
		.trim()
		.min(1, 'must be a non-empty string');
}

const linesMessage = `must contain between 1 and ${MAX_IMPORT_LINES} items`;

export const ExpensePayloadSchema = z
	.object({
		date: z.string({ invalid_type_error: 'must be YYYY-MM-DD or null' }).nullish(),
		store: optionalText(MAX_STORE_LENGTH),
		note: optionalText(MAX_NOTE_LENGTH),
		payment_account: requiredName(),
		currency_original: z.string({ invalid_type_error: 'must be a 3-letter code or null' }).nullish(),
		lines: z
			.array(z.unknown(), { required_error: 'is required', invalid_type_error: 'must be an array' })
			.min(1, linesMessage)
			.max(MAX_IMPORT_LINES, linesMessage),
	})
	.strict();

export const ExpensePayloadLineSchema = z
	.object({
		expense_category: requiredName(),
		note: optionalText(MAX_NOTE_LENGTH),
		amount_domestic: z.unknown(),
		amount_original: z.unknown(),
	})
	.strict();

export type ExpensePayload = z.infer<typeof ExpensePayloadSchema>;
export type ExpensePayloadLine = z.infer<typeof ExpensePayloadLineSchema>;

export type NormalizedPayload = {
	accountingDate: string;
	entryTitle: string | null;
	entryText: string | null;
	paymentAccount: Account;
	currencyOriginal: string;
	lines: unknown[];
};

export type NormalizedLine = {
	index: number;
	account: Account;
	amountDomestic: number;
	amountOriginal: number;
	itemText: string | null;
};

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Unexpected keys are reported ahead of any other problem. */
function pickIssue(issues: readonly ZodIssue[]): ZodIssue | undefined {
	return issues.find((issue) => issue.code === 'unrecognized_keys') ?? issues[0];
}

function issueResult<T>(issues: readonly ZodIssue[], prefix: string, index?: number): Result<T> {
	const issue = pickIssue(issues);
	if (!issue) {
		return fail('validation', `${prefix || 'payload'} is invalid`, { index });
	}
	if (issue.code === 'unrecognized_keys') {
		const keys = [...issue.keys].sort().join(', ');
		return fail('validation', `${prefix ? `${prefix} ` : ''}unexpected fields: ${keys}`, { field: prefix || undefined, value: keys, index });
	}
	const field = [prefix, ...issue.path.map(String)].filter((part) => part.length > 0).join('.');
	return fail('validation', `${field} ${issue.message}`, { field, index });
}

function cleanText(value: string | null | undefined): string | null {
	if (value === null || value === undefined) {
		return null;
	}
	return value.trim() || null;
}

export type NormalizeOptions = {
	/** Accounting date used when the payload carries none. */
	today?: string;
};

/** Header fields: shape, date, payment account and currency. */
export function normalizeTop(db: LedgerDb, payload: unknown, options: NormalizeOptions = {}): Result<NormalizedPayload> {
	if (!isRecord(payload)) {
		return fail('validation', 'top-level JSON must be an object');
	}

	const parsed = ExpensePayloadSchema.safeParse(payload);
	if (!parsed.success) {
		return issueResult(parsed.error.issues, '');
	}
	const data = parsed.data;

	let accountingDate: string;
	if (data.date === null || data.date === undefined || data.date === '') {
		accountingDate = options.today ?? todayIso();
	} else if (isIsoDate(data.date)) {
		accountingDate = data.date;
	} else {
		return fail('validation', `date must be YYYY-MM-DD or null: ${data.date}`, { field: 'date', value: data.date });
	}

	const paymentAccount = findPaymentAccountByName(db, data.payment_account);
	if (!paymentAccount) {
		return fail('validation', `payment_account not found or not an active ASSET/LIAB account: ${data.payment_account}`, {
			field: 'payment_account',
			value: data.payment_account,
		});
	}

	let currencyOriginal: string;
	if (data.currency_original === null || data.currency_original === undefined || data.currency_original === '') {
		currencyOriginal = getDomesticCurrency(db);
	} else {
		currencyOriginal = data.currency_original.trim().toUpperCase();
		if (!/^[A-Z]{3}$/.test(currencyOriginal)) {
			return fail('validation', `currency_original must be a 3-letter code or null: ${data.currency_original}`, {
				field: 'currency_original',
				value: data.currency_original,
			});
		}
	}

	return ok({
		accountingDate,
		entryTitle: cleanText(data.store),
		entryText: cleanText(data.note),
		paymentAccount,
		currencyOriginal,
		lines: data.lines,
	});
}

/** One category line; `index` is 1-based and tags every error. */
export function normalizeLine(db: LedgerDb, index: number, raw: unknown): Result<NormalizedLine> {
	const tag = `lines[${index}]`;
	if (!isRecord(raw)) {
		return fail('validation', `${tag} must be an object`, { field: tag, index });
	}

	const parsed = ExpensePayloadLineSchema.safeParse(raw);
	if (!parsed.success) {
		return issueResult(parsed.error.issues, tag, index);
	}
	const line = parsed.data;

	const account = findAccountByName(db, line.expense_category, ['EXPENSE']);
	if (!account) {
		return fail('validation', `${tag}.expense_category not found or not an active EXPENSE account: ${line.expense_category}`, {
			field: `${tag}.expense_category`,
			value: line.expense_category,
			index,
		});
	}

	const amountDomestic = parseNonZeroAmount(line.amount_domestic);
	if (amountDomestic === null) {
		return fail('validation', `${tag}.amount_domestic must be a non-zero number`, { field: `${tag}.amount_domestic`, index });
	}

	const rawOriginal = line.amount_original ?? amountDomestic;
	const amountOriginal = parseNonZeroAmount(rawOriginal);
	if (amountOriginal === null) {
		return fail('validation', `${tag}.amount_original must be a non-zero number`, { field: `${tag}.amount_original`, index });
	}

	return ok({ index, account, amountDomestic, amountOriginal, itemText: cleanText(line.note) });
}
