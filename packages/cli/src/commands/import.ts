/**
 * import - Post expense payloads (JSON) as balanced entries.
 */

import { type ExpenseImportResult, getDomesticCurrency, type ImportInboxResult, importExpenseFile, importInbox, unwrap } from '@tally/core';
import { getConfig, resolveConfigRelative } from '@tally/core/config';
import { defineCommand, runCommand } from 'citty';

import { CommandLine } from '../args';
import { getWritableDb, withDb } from '../db';
import { formatCount, formatMoney } from '../format';
import { json, log } from '../logger';

function renderEntry(result: ExpenseImportResult, domesticCurrency: string): void {
	log(`Imported entry ${result.entryUuid}`);
	log(`  Date:  ${result.accountingDate}`);
	log(`  Total: ${formatMoney(result.totalAmountDomestic, domesticCurrency)} (${formatMoney(result.totalAmountOriginal, result.currencyOriginal)})`);
	log(`  Lines: ${result.lineCount}`);
}

function renderInbox(result: ImportInboxResult): void {
	log(`Imported ${formatCount(result.imported.length, 'file')}`);
	for (const file of result.imported) {
		log(`  ${file.path} -> ${file.entryUuid} (${file.accountingDate}, ${file.lineCount} lines)`);
	}

	if (result.failed.length > 0) {
		log(`\nFailed ${formatCount(result.failed.length, 'file')}`);
		for (const { path, reason } of result.failed) {
			log(`  ${path}: ${reason}`);
		}
		log('\nRejected payloads saved to:');
		for (const path of result.failedPayloads) {
			log(`  ${path}`);
		}
	}

	if (result.archivedFiles.length > 0) {
		log(`\nArchived ${formatCount(result.archivedFiles.length, 'file')}`);
		for (const file of result.archivedFiles.slice(0, 5)) {
			log(`  ${file}`);
		}
		if (result.archivedFiles.length > 5) {
			log(`  ... and ${result.archivedFiles.length - 5} more`);
		}
	}
}

/** Abort controller tied to Ctrl-C for the lifetime of `fn`. */
async function withInterrupt<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
	const controller = new AbortController();
	const onInterrupt = () => controller.abort();
	process.once('SIGINT', onInterrupt);
	try {
		return await fn(controller.signal);
	} finally {
		process.off('SIGINT', onInterrupt);
	}
}

export const importCmd = defineCommand({
	meta: { name: 'import', description: 'Import expense payloads from a JSON file or the inbox' },
	args: {
		file: { type: 'positional', description: 'Payload file (JSON)', required: false },
		inbox: { type: 'boolean', description: 'Import every payload in the configured inbox' },
		format: { type: 'string', description: 'Output format: table, json', default: 'table' },
		db: { type: 'string', description: 'Database path' },
	},
	async run({ args }) {
		const format = args.format === 'json' ? 'json' : 'table';
		const db = getWritableDb(CommandLine.parse(args.db ? [`--db=${args.db}`] : [], 'import'));

		if (args.inbox) {
			const dirs = getConfig().import;
			const result = await withDb(db, (conn) =>
				withInterrupt((signal) =>
					importInbox(conn, {
						inboxDir: resolveConfigRelative(dirs.inbox),
						archiveDir: resolveConfigRelative(dirs.archive),
						failedDir: resolveConfigRelative(dirs.failed),
						signal,
					}),
				),
			);
			if (format === 'json') {
				json(result);
				return;
			}
			renderInbox(result);
			return;
		}

		const file = args.file;
		if (!file) {
			db.close();
			throw new Error('Missing payload file\nRun: tally import <file.json> | tally import --inbox');
		}

		const { result, domesticCurrency } = await withDb(db, (conn) =>
			withInterrupt(async (signal) => ({
				result: unwrap(await importExpenseFile(conn, file, { signal })),
				domesticCurrency: getDomesticCurrency(conn),
			})),
		);
		if (format === 'json') {
			json(result);
			return;
		}
		renderEntry(result, domesticCurrency);
	},
});

export async function runImport(args: string[]): Promise<void> {
	await runCommand(importCmd, { rawArgs: args });
}
