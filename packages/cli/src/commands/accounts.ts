/**
 * accounts - List the chart of accounts and manage user accounts.
 */

import {
	type Account,
	type AccountType,
	createUserManagedAccount,
	isAccountType,
	listAccounts,
	listUserManagedAccounts,
	unwrap,
	updateUserManagedAccount,
} from '@tally/core';

import { CommandLine } from '../args';
import { getReadonlyDb, getWritableDb, withDb } from '../db';
import { log } from '../logger';
import { type Column, parseFormat, printRows } from '../output';

const COLUMNS: Column<Account>[] = [
	{ key: 'code', label: 'Code' },
	{ key: 'name', label: 'Name', kind: 'text', width: 40 },
	{ key: 'type', label: 'Type' },
	{ key: 'isActive', label: 'Active', kind: 'flag' },
	{ key: 'isUserManaged', label: 'Managed', kind: 'flag' },
];

function parseAccountType(value: string): AccountType {
	const upper = value.toUpperCase();
	if (!isAccountType(upper)) {
		throw new Error(`Invalid account type: ${value}. Use: ASSET, LIAB, EQUITY, INCOME, EXPENSE`);
	}
	return upper;
}

async function runList(cli: CommandLine): Promise<void> {
	const typeOption = cli.value('type');
	const types = typeOption === undefined ? undefined : [parseAccountType(typeOption)];
	const rows = await withDb(getReadonlyDb(cli), (db) => listAccounts(db, { activeOnly: !cli.has('all'), types }));
	printRows(rows, COLUMNS, parseFormat(cli.value('format')));
}

async function runManaged(cli: CommandLine): Promise<void> {
	const rows = await withDb(getReadonlyDb(cli), (db) => listUserManagedAccounts(db));
	printRows(rows, COLUMNS, parseFormat(cli.value('format')));
}

async function runAdd(cli: CommandLine): Promise<void> {
	const name = cli.required('name');
	const type = parseAccountType(cli.required('type'));

	const account = await withDb(getWritableDb(cli), (db) => unwrap(createUserManagedAccount(db, name, type, !cli.has('inactive'))));
	log(`Created ${account.type} account ${account.code}: ${account.name}`);
}

async function runUpdate(cli: CommandLine): Promise<void> {
	const code = cli.requiredPositional(1, 'account code');
	const name = cli.required('name');

	const account = await withDb(getWritableDb(cli), (db) => unwrap(updateUserManagedAccount(db, code, name, !cli.has('inactive'))));
	log(`Updated account ${account.code}: ${account.name}${account.isActive ? '' : ' (inactive)'}`);
}

export async function runAccounts(args: string[]): Promise<void> {
	const cli = CommandLine.parse(args, 'accounts');
	const sub = cli.positional(0) ?? 'list';

	switch (sub) {
		case 'list':
			return runList(cli);
		case 'managed':
			return runManaged(cli);
		case 'add':
			return runAdd(cli);
		case 'update':
			return runUpdate(cli);
		default:
			throw cli.usageError(`Unknown accounts subcommand: ${sub}`);
	}
}
