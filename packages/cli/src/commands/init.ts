/**
 * init - Create the database, seed the chart of accounts and optional sample entries.
 */

import { listAccounts, seedSampleData, unwrap } from '@tally/core';

import { CommandLine } from '../args';
import { getWritableDb, resolveDbPath, withDb } from '../db';
import { formatCount } from '../format';
import { log } from '../logger';

export async function runInit(args: string[]): Promise<void> {
	const cli = CommandLine.parse(args, 'init');
	const path = resolveDbPath(cli);

	await withDb(getWritableDb(cli), (db) => {
		log(`Database ready: ${path}`);
		log(`Chart of accounts: ${formatCount(listAccounts(db).length, 'account')}`);

		if (cli.has('sample')) {
			const added = unwrap(seedSampleData(db));
			log(added > 0 ? `Sample data: ${formatCount(added, 'entry', 'entries')} added` : 'Sample data skipped: ledger already has entries');
		}
	});
}
