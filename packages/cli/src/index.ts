#!/usr/bin/env tsx
/**
 * CLI entry point and command router.
 */

import { LedgerError } from '@tally/core';
import { initConfig } from '@tally/core/config';
import { runAccounts } from './commands/accounts';
import { runBalanceSheet } from './commands/balance-sheet';
import { runEntry } from './commands/entry';
import { runExpenses } from './commands/expenses';
import { runImport } from './commands/import';
import { runInit } from './commands/init';
import { runSettings } from './commands/settings';
import { runTransactions } from './commands/transactions';
import { runTrend } from './commands/trend';
import { error, log } from './logger';

const COMMANDS: Record<string, (args: string[]) => Promise<void> | void> = {
	init: runInit,
	accounts: runAccounts,
	'balance-sheet': runBalanceSheet,
	expenses: runExpenses,
	transactions: runTransactions,
	entry: runEntry,
	trend: runTrend,
	import: runImport,
	settings: runSettings,
};

const HELP = `
tally - Personal double-entry ledger

Usage: tally <command> [options]

Global Options:
  --db=PATH     Override database path
  --format=FMT  Output format: table (default), json, tsv

Commands:

  init [--sample]
    Create the database and seed the chart of accounts.
    --sample: Add sample entries to an empty ledger

  accounts [list|managed|add|update] [options]
    Chart of accounts and user-managed asset/liability accounts.
    Subcommands:
      list [--type=TYPE] [--all]
        --type: ASSET, LIAB, EQUITY, INCOME or EXPENSE
        --all: Include inactive accounts
      managed
        User-managed accounts (active assets, active liabilities, inactive)
      add --name=NAME --type=ASSET|LIAB [--inactive]
      update CODE --name=NAME [--inactive]

  balance-sheet
    All-time balances of active asset and liability accounts.

  expenses
    Expense lines grouped by accounting date, newest first.

  transactions --account=CODE
    Lines posted to one account, newest first.

  entry <show|delete> UUID
    Show an entry with its lines, or delete it.

  trend <expense|assets> [--from=DATE] [--to=DATE] [--granularity=day|month]
    Expense per category, or running asset/liability balances, per period.
    Granularity defaults to month for ranges over 45 days.

  import <file.json> | import --inbox
    Post expense payloads as balanced entries.
    --inbox: Import every payload in the configured inbox

  settings [list|get KEY|set KEY VALUE]
    Ledger settings (USER_NAME, CURRENCY_DOMESTIC).
`.trim();

function describeFailure(err: unknown): string {
	if (err instanceof LedgerError) {
		return `${err.message} [${err.kind}]`;
	}
	return err instanceof Error ? err.message : String(err);
}

async function main() {
	initConfig();
	const args = process.argv.slice(2);

	// Global help
	if (args.includes('--help') || args.includes('-h') || args.includes('help') || args.length === 0) {
		log(HELP);
		process.exit(0);
	}

	const commandIndex = args.findIndex((arg) => !arg.startsWith('-') && arg !== '--');
	const command = commandIndex === -1 ? undefined : args[commandIndex];

	if (!command) {
		log(HELP);
		process.exit(0);
	}

	const handler = COMMANDS[command];
	if (!handler) {
		error(`Unknown command: ${command}\n`);
		log(HELP);
		process.exit(1);
	}

	const globalArgs = commandIndex > 0 ? args.slice(0, commandIndex).filter((arg) => arg !== '--') : [];
	const commandArgs = args.slice(commandIndex + 1);
	await handler([...globalArgs, ...commandArgs]);
}

main().catch((err: unknown) => {
	error(`Error: ${describeFailure(err)}`);
	process.exit(1);
});
