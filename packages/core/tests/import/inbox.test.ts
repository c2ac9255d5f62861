import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import { slugify } from '../../src/import/archive-manager';
import { importInbox, scanInbox } from '../../src/import/inbox';
import { countEntries } from '../../src/ledger/entries';
import { createTestDb } from '../helpers';

const NOW = new Date(2025, 2, 1, 10, 20, 30, 5);

describe('importInbox', () => {
	let root: string;
	let inboxDir: string;
	let archiveDir: string;
	let failedDir: string;

	beforeEach(async () => {
		root = await mkdtemp(join(tmpdir(), 'tally-inbox-'));
		inboxDir = join(root, 'inbox');
		archiveDir = join(root, 'archive');
		failedDir = join(root, 'failed');
		await mkdir(inboxDir, { recursive: true });
	});

	afterEach(async () => {
		await rm(root, { recursive: true, force: true });
	});

	test('archives imported payloads and copies rejected ones', async () => {
		const badPayload = { payment_account: 'Nope', lines: [{ expense_category: 'Food and dining', amount_domestic: 5 }] };
		await writeFile(join(inboxDir, 'a-lunch.json'), JSON.stringify({ payment_account: 'Cash', lines: [{ expense_category: 'Food and dining', amount_domestic: 9 }] }));
		await writeFile(join(inboxDir, 'b-bad.json'), JSON.stringify(badPayload));
		await writeFile(join(inboxDir, 'c-broken.json'), '{not json');
		await writeFile(join(inboxDir, 'notes.txt'), 'ignored');
		const db = createTestDb();

		const result = await importInbox(db, { inboxDir, archiveDir, failedDir, today: '2025-03-01', now: NOW });

		expect(result.imported.map((file) => file.path)).toEqual([join(inboxDir, 'a-lunch.json')]);
		expect(result.imported[0]?.totalAmountDomestic).toBe(9);
		expect(result.failed).toEqual([
			{ path: join(inboxDir, 'b-bad.json'), reason: 'payment_account not found or not an active ASSET/LIAB account: Nope' },
			{ path: join(inboxDir, 'c-broken.json'), reason: expect.stringMatching(/^failed to parse JSON: /) },
		]);
		expect(result.archivedFiles).toEqual([join(archiveDir, '2025-03-01', '20250301-102030_01_a-lunch.json')]);
		expect(result.failedPayloads).toEqual([join(failedDir, '20250301_102030_005000.json'), join(failedDir, '20250301_102030_005000-2.json')]);

		expect(countEntries(db)).toBe(1);
		expect((await readdir(inboxDir)).sort()).toEqual(['b-bad.json', 'c-broken.json', 'notes.txt']);
		expect(existsSync(join(archiveDir, '2025-03-01', '20250301-102030_01_a-lunch.json'))).toBe(true);
		expect(await readFile(join(failedDir, '20250301_102030_005000.json'), 'utf-8')).toBe(`${JSON.stringify(badPayload, null, 2)}\n`);
		expect(await readFile(join(failedDir, '20250301_102030_005000-2.json'), 'utf-8')).toBe('{not json');
	});

	test('does nothing for an empty inbox', async () => {
		const db = createTestDb();

		const result = await importInbox(db, { inboxDir, archiveDir, failedDir, now: NOW });

		expect(result).toEqual({ imported: [], failed: [], archivedFiles: [], failedPayloads: [] });
		expect(existsSync(archiveDir)).toBe(false);
	});

	test('stops before the first file once aborted', async () => {
		await writeFile(join(inboxDir, 'a.json'), JSON.stringify({ payment_account: 'Cash', lines: [{ expense_category: 'Food and dining', amount_domestic: 9 }] }));
		const controller = new AbortController();
		controller.abort();
		const db = createTestDb();

		const result = await importInbox(db, { inboxDir, archiveDir, failedDir, now: NOW, signal: controller.signal });

		expect(result.imported).toEqual([]);
		expect(await readdir(inboxDir)).toEqual(['a.json']);
	});

	test('archives committed files when a rejected payload cannot be copied', async () => {
		const blocker = join(root, 'blocker');
		await writeFile(blocker, 'not a folder');
		await writeFile(join(inboxDir, 'a.json'), JSON.stringify({ payment_account: 'Cash', lines: [{ expense_category: 'Food and dining', amount_domestic: 9 }] }));
		await writeFile(join(inboxDir, 'b.json'), JSON.stringify({ payment_account: 'Nope', lines: [{ expense_category: 'Food and dining', amount_domestic: 5 }] }));
		const db = createTestDb();
		const options = { inboxDir, archiveDir, failedDir: join(blocker, 'failed'), today: '2025-03-01', now: NOW };

		const first = await importInbox(db, options);

		expect(first.imported.map((file) => file.path)).toEqual([join(inboxDir, 'a.json')]);
		expect(first.archivedFiles).toHaveLength(1);
		expect(first.failedPayloads).toEqual([]);
		expect(first.failed).toHaveLength(1);
		expect(first.failed[0]?.path).toBe(join(inboxDir, 'b.json'));
		expect(first.failed[0]?.reason).toMatch(/^payment_account not found or not an active ASSET\/LIAB account: Nope \(payload copy not saved: /);
		expect(await readdir(inboxDir)).toEqual(['b.json']);

		const second = await importInbox(db, options);

		expect(second.imported).toEqual([]);
		expect(countEntries(db)).toBe(1);
	});

	test('scans JSON files in name order and tolerates a missing folder', async () => {
		await writeFile(join(inboxDir, 'b.JSON'), '{}');
		await writeFile(join(inboxDir, 'a.json'), '{}');

		expect(await scanInbox(inboxDir)).toEqual([join(inboxDir, 'a.json'), join(inboxDir, 'b.JSON')]);
		expect(await scanInbox(join(root, 'missing'))).toEqual([]);
	});
});

describe('slugify', () => {
	test('keeps lowercase alphanumerics joined by single dashes', () => {
		expect(slugify('  Receipt #42 -- Tesco!', 40)).toBe('receipt-42-tesco');
		expect(slugify('***', 40)).toBe('');
		expect(slugify('abcdef', 3)).toBe('abc');
	});
});
