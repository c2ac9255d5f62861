/**
 * entry - Show or delete one journal entry.
 */

import { deleteEntry, type EntryLine, getEntry, SqliteAttachmentStore, unwrap } from '@tally/core';

import { CommandLine } from '../args';
import { getReadonlyDb, getWritableDb, withDb } from '../db';
import { json, log } from '../logger';
import { type Column, parseFormat, printRows } from '../output';

const LINE_COLUMNS: Column<EntryLine>[] = [
	{ key: 'lineNo', label: '#' },
	{ key: 'accountCode', label: 'Code' },
	{ key: 'accountName', label: 'Account', kind: 'text', width: 40 },
	{ key: 'dc', label: 'D/C' },
	{ key: 'amountDomestic', label: 'Amount', kind: 'money' },
	{ key: 'currencyOriginal', label: 'Ccy' },
	{ key: 'amountOriginal', label: 'Original', kind: 'money' },
	{ key: 'itemText', label: 'Note', kind: 'text', width: 30 },
];

async function runShow(cli: CommandLine): Promise<void> {
	const uuid = cli.requiredPositional(1, 'entry uuid');
	const format = parseFormat(cli.value('format'));
	const entry = await withDb(getReadonlyDb(cli), (db) => getEntry(db, uuid));
	if (!entry) {
		throw new Error(`Entry not found: ${uuid}`);
	}

	if (format === 'json') {
		json(entry);
		return;
	}

	if (format === 'table') {
		log(`${entry.entryType}  ${entry.accountingDate}  ${entry.entryTitle ?? '-'}`);
		if (entry.entryText) log(entry.entryText);
		log(`uuid ${entry.entryUuid}, modified ${entry.modificationDate}\n`);
	}
	printRows(entry.lines, LINE_COLUMNS, format);
}

async function runDelete(cli: CommandLine): Promise<void> {
	const uuid = cli.requiredPositional(1, 'entry uuid');
	await withDb(getWritableDb(cli), (db) => unwrap(deleteEntry(db, uuid, new SqliteAttachmentStore(db))));
	log(`Deleted entry ${uuid}`);
}

export async function runEntry(args: string[]): Promise<void> {
	const cli = CommandLine.parse(args, 'entry');
	const sub = cli.positional(0);

	switch (sub) {
		case 'show':
			return runShow(cli);
		case 'delete':
			return runDelete(cli);
		default:
			throw cli.usageError(`Unknown entry subcommand: ${sub ?? '(none)'}`);
	}
}
