import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, test } from 'vitest';

import { findConfigPath, getConfig, getConfigDir, initConfig, isConfigInitialized, loadConfig, parseConfig, resetConfig, resolveConfigRelative } from '../../src/config/loader';

describe('parseConfig', () => {
	test('fills every key with its default', () => {
		expect(parseConfig('', 'test.toml')).toEqual({
			ledger: { domestic_currency: 'GBP', user_name: '' },
			paths: { database: 'tally.db' },
			import: { inbox: 'imports/inbox', archive: 'imports/archive', failed: 'imports/failed' },
		});
	});

	test('upper-cases the domestic currency', () => {
		const config = parseConfig('[ledger]\ndomestic_currency = "eur"\nuser_name = "Test User"\n', 'test.toml');

		expect(config.ledger).toEqual({ domestic_currency: 'EUR', user_name: 'Test User' });
	});

	test('lists every invalid key', () => {
		expect(() => parseConfig('[ledger]\ndomestic_currency = "EURO"\n', 'test.toml')).toThrow(
			'Invalid config file at test.toml:\n  ledger.domestic_currency: Must be a 3-letter currency code',
		);
	});
});

describe('config singleton', () => {
	let dir: string | null = null;

	afterEach(async () => {
		resetConfig();
		if (dir) {
			await rm(dir, { recursive: true, force: true });
			dir = null;
		}
	});

	test('loads a config file and resolves paths beside it', async () => {
		dir = await mkdtemp(join(tmpdir(), 'tally-config-'));
		const path = join(dir, 'tally.config.toml');
		await writeFile(path, '[paths]\ndatabase = "books/ledger.db"\n');

		initConfig(path);

		expect(isConfigInitialized()).toBe(true);
		expect(getConfig().paths.database).toBe('books/ledger.db');
		expect(getConfigDir()).toBe(dir);
		expect(resolveConfigRelative('books/ledger.db')).toBe(join(dir, 'books', 'ledger.db'));
		expect(resolveConfigRelative('/var/ledger.db')).toBe('/var/ledger.db');
	});

	test('uses defaults when the file is missing', async () => {
		dir = await mkdtemp(join(tmpdir(), 'tally-config-'));

		initConfig(join(dir, 'tally.config.toml'));

		expect(getConfig().ledger.domestic_currency).toBe('GBP');
		expect(() => loadConfig(join(dir ?? '', 'tally.config.toml'))).toThrow(/^Config file not found: /);
	});

	test('fails before initialization', () => {
		expect(isConfigInitialized()).toBe(false);
		expect(() => getConfig()).toThrow('Config not initialized. Call initConfig() first.');
	});

	test('prefers an explicit path over the environment', () => {
		expect(findConfigPath('/etc/tally.toml')).toBe('/etc/tally.toml');
	});
});
