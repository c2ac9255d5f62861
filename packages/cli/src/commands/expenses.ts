/**
 * expenses - Expense lines, newest first, grouped by accounting date.
 */

import { groupJournalByDate, listExpenseList } from '@tally/core';

import { CommandLine } from '../args';
import { getReadonlyDb, withDb } from '../db';
import { parseFormat, printJournal } from '../output';

export async function runExpenses(args: string[]): Promise<void> {
	const cli = CommandLine.parse(args, 'expenses');

	const rows = await withDb(getReadonlyDb(cli), (db) => listExpenseList(db));
	printJournal(groupJournalByDate(rows), parseFormat(cli.value('format')));
}
