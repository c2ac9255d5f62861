import type { LedgerDb } from './connection';
import { SCHEMA_SQL, SCHEMA_VERSION } from './schema';
import { getChartOfAccountsSeeds, getDefaultSettings, type SettingDefaults } from './seed';

type UserVersionRow = {
	user_version: number;
};

export function getUserVersion(db: LedgerDb): number {
	const row = db.prepare<[], UserVersionRow>('PRAGMA user_version').get();
	return row?.user_version ?? 0;
}

function setUserVersion(db: LedgerDb, version: number): void {
	db.exec(`PRAGMA user_version = ${version}`);
}

function initializeFreshDb(db: LedgerDb, defaults: SettingDefaults): void {
	db.exec(SCHEMA_SQL);

	const accountStmt = db.prepare<[string, string, string, number, number]>(`
		INSERT OR IGNORE INTO gl_account (account_code, account_name, account_type, is_pl, is_active, is_user_managed)
		VALUES (?, ?, ?, ?, 1, ?)
	`);
	for (const account of getChartOfAccountsSeeds()) {
		accountStmt.run(account.code, account.name, account.type, account.isPl ? 1 : 0, account.isUserManaged ? 1 : 0);
	}

	const settingStmt = db.prepare<[string, string]>('INSERT OR IGNORE INTO user_setting (setting_key, setting_value) VALUES (?, ?)');
	for (const [key, value] of getDefaultSettings(defaults)) {
		settingStmt.run(key, value);
	}
}

/**
 * Create the schema, seed the system chart and default settings, and stamp the
 * schema version. Seeds are insert-or-ignore, so existing rows are kept.
 */
export function migrateToLatest(db: LedgerDb, defaults: SettingDefaults = {}): void {
	const currentVersion = getUserVersion(db);
	if (currentVersion >= SCHEMA_VERSION) {
		return;
	}

	db.transaction(() => {
		if (currentVersion === 0) {
			initializeFreshDb(db, defaults);
		}

		setUserVersion(db, SCHEMA_VERSION);
	})();
}
