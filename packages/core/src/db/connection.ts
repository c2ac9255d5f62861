import { existsSync, mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import Database from 'libsql';

import { getUserVersion, migrateToLatest } from './migrate';
import { SCHEMA_VERSION } from './schema';
import type { SettingDefaults } from './seed';

export const MEMORY_PATH = ':memory:';

export type RunResult = { changes: number };

export interface Statement<P extends unknown[], R> {
	run(...params: P): RunResult;
	get(...params: P): R | undefined;
	all(...params: P): R[];
}

/**
 * Synchronous connection used by every ledger module. `transaction(fn)` returns a
 * function that runs `fn` in BEGIN/COMMIT and rolls back when it throws; a nested
 * call runs inside a savepoint of the outer transaction.
 */
export interface LedgerDb {
	readonly path: string;
	readonly readonly: boolean;
	readonly memory: boolean;
	prepare<P extends unknown[] = unknown[], R = unknown>(sql: string): Statement<P, R>;
	exec(sql: string): void;
	transaction<T>(fn: () => T): () => T;
	close(): void;
}

class LibsqlLedgerDb implements LedgerDb {
	readonly memory: boolean;
	private depth = 0;

	constructor(
		private readonly raw: Database.Database,
		readonly path: string,
		readonly readonly: boolean,
	) {
		this.memory = path === MEMORY_PATH;
	}

	prepare<P extends unknown[] = unknown[], R = unknown>(sql: string): Statement<P, R> {
		const stmt = this.raw.prepare(sql);
		// libsql statements are untyped: rows come back in the shape the caller declares.
		return {
			run: (...params: P) => ({ changes: Number(stmt.run(...params).changes) }),
			get: (...params: P): R | undefined => stmt.get(...params) ?? undefined,
			all: (...params: P): R[] => stmt.all(...params),
		};
	}

	exec(sql: string): void {
		this.raw.exec(sql);
	}

	transaction<T>(fn: () => T): () => T {
		return () => {
			const savepoint = this.depth > 0 ? `tally_sp_${this.depth}` : null;
			this.exec(savepoint ? `SAVEPOINT ${savepoint}` : 'BEGIN');
			this.depth += 1;

			let result: T;
			try {
				result = fn();
			} catch (error) {
				this.depth -= 1;
				this.exec(savepoint ? `ROLLBACK TO ${savepoint}; RELEASE ${savepoint}` : 'ROLLBACK');
				throw error;
			}

			this.depth -= 1;
			this.exec(savepoint ? `RELEASE ${savepoint}` : 'COMMIT');
			return result;
		};
	}

	close(): void {
		this.raw.close();
	}
}

export type OpenDatabaseOptions = {
	path?: string;
	create?: boolean;
	readonly?: boolean;
	migrate?: boolean;
	/** Seed values for settings when the schema is first created. */
	defaults?: SettingDefaults;
	/** Milliseconds to wait on a lock held by another connection. */
	busyTimeout?: number;
};

function applyPragmas(db: LedgerDb, busyTimeout: number): void {
	db.exec(`PRAGMA busy_timeout = ${Math.max(0, Math.trunc(busyTimeout))}`);
	db.exec('PRAGMA foreign_keys = ON');
	if (!db.readonly && !db.memory) {
		db.exec('PRAGMA journal_mode = WAL');
	}
	db.exec('PRAGMA synchronous = NORMAL');
	db.exec('PRAGMA cache_size = -64000');
	db.exec('PRAGMA temp_store = MEMORY');
	if (db.readonly) {
		db.exec('PRAGMA query_only = ON');
	}
}

function connect(path: string, create: boolean, readonly: boolean, busyTimeout: number): LedgerDb {
	if (!create && path !== MEMORY_PATH && !existsSync(path)) {
		throw new Error(`database file not found: ${path}`);
	}
	const db = new LibsqlLedgerDb(new Database(path, { readonly }), path, readonly);
	applyPragmas(db, busyTimeout);
	return db;
}

export function openDatabase(options: OpenDatabaseOptions = {}): LedgerDb {
	const {
		path = resolve(process.cwd(), 'data/tally.db'),
		create = true,
		readonly = false,
		migrate: shouldMigrate = false,
		defaults = {},
		busyTimeout = 5000,
	} = options;
	const inMemory = path === MEMORY_PATH;

	if (create && !inMemory) {
		mkdirSync(dirname(path), { recursive: true });
	}

	if (shouldMigrate && readonly && !inMemory) {
		let needsMigration = true;
		try {
			const roDb = connect(path, false, true, busyTimeout);
			needsMigration = getUserVersion(roDb) < SCHEMA_VERSION;
			roDb.close();
		} catch (error) {
			if (!create) {
				throw error;
			}
		}

		if (needsMigration) {
			const rwDb = connect(path, create, false, busyTimeout);
			migrateToLatest(rwDb, defaults);
			rwDb.close();
		}

		return connect(path, false, true, busyTimeout);
	}

	const db = connect(path, create, readonly && !inMemory, busyTimeout);

	if (shouldMigrate && !db.readonly) {
		migrateToLatest(db, defaults);
	}

	return db;
}
