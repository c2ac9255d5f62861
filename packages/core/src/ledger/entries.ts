import type { LedgerDb } from '../db/connection';
import {
	type Entry,
	type EntryHeader,
	type EntryLine,
	isDebitCredit,
	type SavedEntry,
	type SaveEntryRequest,
	toAccountType,
	toDebitCredit,
	toEntryType,
} from '../types/ledger';
import { describeError, fail, ok, type Result } from '../types/result';
import { entryBalance, formatDiff, isBalanced } from '../utils/amount';
import { isIsoDate, nowIsoLocal } from '../utils/datetime';
import type { AttachmentStore } from './attachments';

type EntryHeaderRow = {
	entry_uuid: string;
	modification_date: string;
	accounting_date: string;
	entry_type: string;
	entry_title: string | null;
	entry_text: string | null;
};

type EntryLineRow = {
	entry_uuid: string;
	line_no: number;
	account_code: string;
	account_name: string;
	account_type: string;
	is_pl: number;
	dc: string;
	amount_domestic: number;
	currency_original: string;
	amount_original: number | null;
	item_text: string | null;
};

export function getEntryHeader(db: LedgerDb, entryUuid: string): EntryHeader | null {
	const row = db
		.prepare<[string], EntryHeaderRow>(
			`SELECT entry_uuid, modification_date, accounting_date, entry_type, entry_title, entry_text
			FROM gl_entry WHERE entry_uuid = ?`,
		)
		.get(entryUuid);
	if (!row) {
		return null;
	}
	return {
		entryUuid: row.entry_uuid,
		modificationDate: row.modification_date,
		accountingDate: row.accounting_date,
		entryType: toEntryType(row.entry_type),
		entryTitle: row.entry_title,
		entryText: row.entry_text,
	};
}

export function getEntryLines(db: LedgerDb, entryUuid: string): EntryLine[] {
	const rows = db
		.prepare<[string], EntryLineRow>(
			`
			SELECT
				i.entry_uuid, i.line_no, i.account_code, a.account_name, a.account_type, a.is_pl,
				i.dc, i.amount_domestic, i.currency_original, i.amount_original, i.item_text
			FROM gl_entry_item i
			INNER JOIN gl_account a ON a.account_code = i.account_code
			WHERE i.entry_uuid = ?
			ORDER BY i.line_no
			`,
		)
		.all(entryUuid);

	return rows.map((row) => ({
		entryUuid: row.entry_uuid,
		lineNo: row.line_no,
		accountCode: row.account_code,
		accountName: row.account_name,
		accountType: toAccountType(row.account_type),
		accountIsPl: row.is_pl === 1,
		dc: toDebitCredit(row.dc),
		amountDomestic: row.amount_domestic,
		currencyOriginal: row.currency_original,
		amountOriginal: row.amount_original,
		itemText: row.item_text,
	}));
}

export function getEntry(db: LedgerDb, entryUuid: string): Entry | null {
	const header = getEntryHeader(db, entryUuid);
	if (!header) {
		return null;
	}
	return { ...header, lines: getEntryLines(db, entryUuid) };
}

export function countEntries(db: LedgerDb): number {
	const row = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM gl_entry').get();
	return row?.count ?? 0;
}

/**
 * Removes the entry and its lines in one transaction. The receipt goes through
 * `attachments`, when given, once that transaction has committed.
 */
export function deleteEntry(db: LedgerDb, entryUuid: string, attachments?: AttachmentStore): Result<void> {
	let deleted: Result<void>;
	try {
		deleted = db.transaction((): Result<void> => {
			if (!getEntryHeader(db, entryUuid)) {
				return fail('not_found', `entry not found: ${entryUuid}`, { entryUuid });
			}
			db.prepare<[string]>('DELETE FROM gl_entry_item WHERE entry_uuid = ?').run(entryUuid);
			db.prepare<[string]>('DELETE FROM gl_entry WHERE entry_uuid = ?').run(entryUuid);
			return ok(undefined);
		})();
	} catch (error) {
		return fail('validation', `failed to delete entry ${entryUuid}: ${describeError(error)}`, { entryUuid }, error);
	}

	if (deleted.ok && attachments) {
		try {
			attachments.delete(entryUuid);
		} catch (error) {
			return fail('validation', `entry ${entryUuid} deleted but its attachment was not: ${describeError(error)}`, { entryUuid }, error);
		}
	}
	return deleted;
}

type ActiveAccountRow = { account_code: string; is_active: number };

function checkLines(db: LedgerDb, request: SaveEntryRequest): Result<void> {
	const lookup = db.prepare<[string], ActiveAccountRow>('SELECT account_code, is_active FROM gl_account WHERE account_code = ?');

	for (const [offset, line] of request.lines.entries()) {
		const index = offset + 1;
		const account = lookup.get(line.accountCode);
		if (!account || account.is_active !== 1) {
			return fail('referential', `line ${index}: account not found or inactive: ${line.accountCode}`, {
				accountCode: line.accountCode,
				index,
				entryUuid: request.entryUuid,
			});
		}
		if (!isDebitCredit(line.dc)) {
			return fail('validation', `line ${index}: dc must be D or C: ${String(line.dc)}`, { field: 'dc', index, entryUuid: request.entryUuid });
		}
		if (!Number.isFinite(line.amountDomestic)) {
			return fail('validation', `line ${index}: amount_domestic must be a finite number`, { field: 'amount_domestic', index, entryUuid: request.entryUuid });
		}
		if (line.amountOriginal !== null && !Number.isFinite(line.amountOriginal)) {
			return fail('validation', `line ${index}: amount_original must be a finite number or null`, { field: 'amount_original', index, entryUuid: request.entryUuid });
		}
		if (line.currencyOriginal.trim().length === 0) {
			return fail('validation', `line ${index}: currency_original is required`, { field: 'currency_original', index, entryUuid: request.entryUuid });
		}
	}
	return ok(undefined);
}

/**
 * Persist an entry by replacing its header and every line. Lines are renumbered
 * 1..N in submission order. Nothing is written unless every check passes, and the
 * header write, line delete and line inserts share one transaction.
 */
export function saveEntryFullReplace(db: LedgerDb, request: SaveEntryRequest): Result<SavedEntry> {
	const { entryUuid } = request;

	if (!isIsoDate(request.accountingDate)) {
		return fail('validation', `accounting_date must be YYYY-MM-DD: ${request.accountingDate}`, {
			field: 'accounting_date',
			value: request.accountingDate,
			entryUuid,
		});
	}
	if (request.lines.length === 0) {
		return fail('validation', 'an entry needs at least one line', { field: 'lines', entryUuid });
	}

	const checked = checkLines(db, request);
	if (!checked.ok) {
		return checked;
	}

	const balance = entryBalance(request.lines);
	if (!isBalanced(balance)) {
		return fail('validation', `debit/credit not balanced: diff=${formatDiff(balance)}`, { field: 'lines', value: balance, entryUuid });
	}

	const insertHeader = db.prepare<[string, string, string, string, string | null, string | null]>(
		`INSERT INTO gl_entry (entry_uuid, modification_date, accounting_date, entry_type, entry_title, entry_text)
		VALUES (?, ?, ?, ?, ?, ?)`,
	);
	const updateHeader = db.prepare<[string, string, string, string | null, string | null, string]>(
		`UPDATE gl_entry
		SET modification_date = ?, accounting_date = ?, entry_type = ?, entry_title = ?, entry_text = ?
		WHERE entry_uuid = ?`,
	);
	const deleteLines = db.prepare<[string]>('DELETE FROM gl_entry_item WHERE entry_uuid = ?');
	const insertLine = db.prepare<[string, number, string, string, number, string, number | null, string | null]>(
		`INSERT INTO gl_entry_item (entry_uuid, line_no, account_code, dc, amount_domestic, currency_original, amount_original, item_text)
		VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
	);

	const modificationDate = nowIsoLocal();

	try {
		return db.transaction((): Result<SavedEntry> => {
			if (request.isNew) {
				if (getEntryHeader(db, entryUuid)) {
					return fail('validation', `entry already exists: ${entryUuid}`, { entryUuid });
				}
				insertHeader.run(entryUuid, modificationDate, request.accountingDate, request.entryType, request.entryTitle, request.entryText);
			} else {
				const result = updateHeader.run(modificationDate, request.accountingDate, request.entryType, request.entryTitle, request.entryText, entryUuid);
				if (result.changes === 0) {
					return fail('not_found', `entry not found: ${entryUuid}`, { entryUuid });
				}
			}

			deleteLines.run(entryUuid);
			for (const [offset, line] of request.lines.entries()) {
				insertLine.run(
					entryUuid,
					offset + 1,
					line.accountCode,
					line.dc,
					line.amountDomestic,
					line.currencyOriginal,
					line.amountOriginal,
					line.itemText ?? null,
				);
			}

			return ok({ entryUuid, modificationDate, lineCount: request.lines.length });
		})();
	} catch (error) {
		return fail('validation', `failed to save entry ${entryUuid}: ${describeError(error)}`, { entryUuid }, error);
	}
}
