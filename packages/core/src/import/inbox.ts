import { existsSync } from 'node:fs';
import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { extname, join } from 'node:path';

import type { LedgerDb } from '../db/connection';
import { describeError } from '../types/result';
import { fileTimestamp } from '../utils/datetime';
import { ArchiveManager } from './archive-manager';
import { type ExpenseImportResult, importExpensePayload, type ExpenseImportOptions } from './expense-import';

export type ImportInboxOptions = Pick<ExpenseImportOptions, 'signal' | 'today'> & {
	inboxDir: string;
	archiveDir: string;
	failedDir: string;
	now?: Date;
};

export type ImportedFile = ExpenseImportResult & { path: string };

export type FailedFile = {
	path: string;
	reason: string;
};

export type ImportInboxResult = {
	imported: ImportedFile[];
	failed: FailedFile[];
	archivedFiles: string[];
	failedPayloads: string[];
};

export async function scanInbox(inboxDir: string): Promise<string[]> {
	if (!existsSync(inboxDir)) {
		return [];
	}
	const entries = await readdir(inboxDir, { withFileTypes: true });
	return entries
		.filter((entry) => entry.isFile() && extname(entry.name).toLowerCase() === '.json')
		.map((entry) => entry.name)
		.sort()
		.map((name) => join(inboxDir, name));
}

async function saveFailedPayload(failedDir: string, content: string, now: Date, used: Set<string>): Promise<string> {
	await mkdir(failedDir, { recursive: true });
	const stamp = fileTimestamp(now);
	let target = join(failedDir, `${stamp}.json`);
	let counter = 2;
	while (used.has(target) || existsSync(target)) {
		target = join(failedDir, `${stamp}-${counter}.json`);
		counter += 1;
	}
	used.add(target);
	await writeFile(target, content, 'utf-8');
	return target;
}

function failedContent(text: string): string {
	try {
		const payload: unknown = JSON.parse(text);
		return `${JSON.stringify(payload, null, 2)}\n`;
	} catch {
		return text;
	}
}

/**
 * Import every JSON payload in the inbox, in file-name order. Imported files are
 * archived; a copy of each rejected payload goes to `failedDir` and the original
 * stays in the inbox.
 */
export async function importInbox(db: LedgerDb, options: ImportInboxOptions): Promise<ImportInboxResult> {
	const now = options.now ?? new Date();
	const files = await scanInbox(options.inboxDir);

	const archiveManager = new ArchiveManager();
	await archiveManager.prepareArchive(files, options.archiveDir, now);

	const imported: ImportedFile[] = [];
	const failed: FailedFile[] = [];
	const failedPayloads: string[] = [];
	const usedFailedNames = new Set<string>();
	const succeeded = new Set<string>();

	let archivedFiles: string[] = [];
	try {
		for (const path of files) {
			if (options.signal?.aborted) {
				break;
			}

			let text: string;
			try {
				text = await readFile(path, 'utf-8');
			} catch (error) {
				failed.push({ path, reason: `failed to read file: ${describeError(error)}` });
				continue;
			}
			// the read may have outlived an abort
			if (options.signal?.aborted) {
				break;
			}

			let payload: unknown;
			let parseError: string | null = null;
			try {
				payload = JSON.parse(text);
			} catch (error) {
				parseError = describeError(error);
			}

			const result = parseError === null ? importExpensePayload(db, payload, { signal: options.signal, today: options.today }) : null;
			if (result?.ok) {
				imported.push({ path, ...result.value });
				succeeded.add(path);
				continue;
			}

			const reason = result ? result.error.message : `failed to parse JSON: ${parseError ?? 'unknown error'}`;
			try {
				failedPayloads.push(await saveFailedPayload(options.failedDir, failedContent(text), now, usedFailedNames));
				failed.push({ path, reason });
			} catch (error) {
				failed.push({ path, reason: `${reason} (payload copy not saved: ${describeError(error)})` });
			}
		}
	} finally {
		// committed entries are archived even when the run stops early
		archivedFiles = await archiveManager.commitArchive(succeeded);
	}

	return { imported, failed, archivedFiles, failedPayloads };
}
