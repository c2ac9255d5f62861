export { type LedgerDb, MEMORY_PATH, type OpenDatabaseOptions, openDatabase } from './db/connection';
export { getUserVersion, migrateToLatest } from './db/migrate';
export { SCHEMA_SQL, SCHEMA_VERSION } from './db/schema';
export { type ChartAccountSeed, DEFAULT_DOMESTIC_CURRENCY, getChartOfAccountsSeeds, getDefaultSettings, SETTING_KEYS, type SettingDefaults } from './db/seed';
export { type SampleDataOptions, seedSampleData } from './demo/sample-data';
export * from './import/index';
export * from './ledger/index';
export * from './queries/icons';
export * from './queries/ledger';
export * from './types/ledger';
export * from './types/result';
export * from './utils/amount';
export * from './utils/datetime';
