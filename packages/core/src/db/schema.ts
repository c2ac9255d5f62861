export const SCHEMA_VERSION = 1;

export const SCHEMA_SQL = `
-- Chart of accounts: system categories plus user-managed asset/liability accounts
CREATE TABLE IF NOT EXISTS gl_account (
	account_code    TEXT PRIMARY KEY NOT NULL,
	account_name    TEXT NOT NULL UNIQUE,
	account_type    TEXT NOT NULL,
	is_pl           INTEGER NOT NULL,
	is_active       INTEGER NOT NULL,
	is_user_managed INTEGER NOT NULL,
	CHECK (account_type IN ('ASSET','LIAB','EQUITY','INCOME','EXPENSE')),
	CHECK (is_pl IN (0,1)),
	CHECK (is_active IN (0,1)),
	CHECK (is_user_managed IN (0,1)),
	CHECK (account_code GLOB '[0-9][0-9][0-9][0-9][0-9][0-9][0-9][0-9][0-9][0-9]')
);

-- Entries: the transaction header
CREATE TABLE IF NOT EXISTS gl_entry (
	entry_uuid        TEXT PRIMARY KEY NOT NULL,
	modification_date TEXT NOT NULL,
	accounting_date   TEXT NOT NULL,
	entry_type        TEXT NOT NULL,
	entry_title       TEXT,
	entry_text        TEXT,
	CHECK (entry_type IN ('EXPENSE','GENERAL'))
);

-- Entry lines: the debit/credit legs, renumbered on every write
CREATE TABLE IF NOT EXISTS gl_entry_item (
	entry_uuid        TEXT NOT NULL,
	line_no           INTEGER NOT NULL,
	account_code      TEXT NOT NULL,
	dc                TEXT NOT NULL,
	amount_domestic   NUMERIC NOT NULL,
	currency_original TEXT NOT NULL,
	amount_original   NUMERIC,
	item_text         TEXT,
	PRIMARY KEY (entry_uuid, line_no),
	FOREIGN KEY (entry_uuid) REFERENCES gl_entry(entry_uuid) ON DELETE CASCADE,
	FOREIGN KEY (account_code) REFERENCES gl_account(account_code),
	CHECK (dc IN ('D','C'))
);

-- One receipt per entry
CREATE TABLE IF NOT EXISTS gl_entry_attachment (
	entry_uuid TEXT PRIMARY KEY NOT NULL,
	file_name  TEXT,
	mime_type  TEXT NOT NULL,
	file_blob  BLOB NOT NULL,
	FOREIGN KEY (entry_uuid) REFERENCES gl_entry(entry_uuid) ON DELETE CASCADE,
	CHECK (mime_type IN ('image/jpeg','image/png','application/pdf'))
);

CREATE TABLE IF NOT EXISTS user_setting (
	setting_key   TEXT PRIMARY KEY NOT NULL,
	setting_value TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_gl_entry_accounting_date ON gl_entry(accounting_date);
CREATE INDEX IF NOT EXISTS idx_gl_entry_item_account ON gl_entry_item(account_code);
`;
