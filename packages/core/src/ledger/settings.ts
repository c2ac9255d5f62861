import type { LedgerDb } from '../db/connection';
import { DEFAULT_DOMESTIC_CURRENCY, SETTING_KEYS } from '../db/seed';

export function getSetting(db: LedgerDb, key: string): string | null {
	const row = db.prepare<[string], { setting_value: string }>('SELECT setting_value FROM user_setting WHERE setting_key = ?').get(key);
	return row?.setting_value ?? null;
}

export function setSetting(db: LedgerDb, key: string, value: string): void {
	db.prepare<[string, string]>(
		`INSERT INTO user_setting (setting_key, setting_value) VALUES (?, ?)
		ON CONFLICT(setting_key) DO UPDATE SET setting_value = excluded.setting_value`,
	).run(key, value);
}

export function listSettings(db: LedgerDb): Array<{ key: string; value: string }> {
	return db
		.prepare<[], { setting_key: string; setting_value: string }>('SELECT setting_key, setting_value FROM user_setting ORDER BY setting_key')
		.all()
		.map((row) => ({ key: row.setting_key, value: row.setting_value }));
}

export function getDomesticCurrency(db: LedgerDb): string {
	return getSetting(db, SETTING_KEYS.domesticCurrency) || DEFAULT_DOMESTIC_CURRENCY;
}

export function getUserName(db: LedgerDb): string {
	return getSetting(db, SETTING_KEYS.userName) ?? '';
}
