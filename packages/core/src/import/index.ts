export { ArchiveManager, type ArchiveOperation, slugify } from './archive-manager';
export {
	type BalancedLines,
	buildBalancedLines,
	type ExpenseImportOptions,
	type ExpenseImportResult,
	importExpenseFile,
	importExpensePayload,
	readJsonFile,
} from './expense-import';
export { type FailedFile, type ImportedFile, type ImportInboxOptions, type ImportInboxResult, importInbox, scanInbox } from './inbox';
export {
	ExpensePayloadLineSchema,
	ExpensePayloadSchema,
	MAX_IMPORT_LINES,
	MAX_NOTE_LENGTH,
	MAX_STORE_LENGTH,
	type NormalizedLine,
	type NormalizedPayload,
	normalizeLine,
	normalizeTop,
} from './payload';
