/**
 * transactions - Lines posted to one account, newest first.
 */

import { getAccount, groupJournalByDate, listAccountTransactions } from '@tally/core';

import { CommandLine } from '../args';
import { getReadonlyDb, withDb } from '../db';
import { log } from '../logger';
import { parseFormat, printJournal } from '../output';

export async function runTransactions(args: string[]): Promise<void> {
	const cli = CommandLine.parse(args, 'transactions');
	const format = parseFormat(cli.value('format'));
	const accountCode = cli.required('account');

	const { account, rows } = await withDb(getReadonlyDb(cli), (db) => ({
		account: getAccount(db, accountCode),
		rows: listAccountTransactions(db, accountCode),
	}));
	if (!account) {
		throw new Error(`Account not found: ${accountCode}`);
	}

	if (format === 'table') {
		log(`${account.code} ${account.name}\n`);
	}
	printJournal(groupJournalByDate(rows), format);
}
