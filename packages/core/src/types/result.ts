export const LEDGER_ERROR_KINDS = ['validation', 'referential', 'not_found'] as const;

export type LedgerErrorKind = (typeof LEDGER_ERROR_KINDS)[number];

export type LedgerErrorContext = {
	field?: string;
	value?: string | number;
	index?: number;
	accountCode?: string;
	entryUuid?: string;
};

export class LedgerError extends Error {
	readonly kind: LedgerErrorKind;
	readonly context: LedgerErrorContext;

	constructor(kind: LedgerErrorKind, message: string, context: LedgerErrorContext = {}, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'LedgerError';
		this.kind = kind;
		this.context = context;
	}
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: LedgerError };

export function ok<T>(value: T): Result<T> {
	return { ok: true, value };
}

export function fail<T = never>(kind: LedgerErrorKind, message: string, context: LedgerErrorContext = {}, cause?: unknown): Result<T> {
	return { ok: false, error: new LedgerError(kind, message, context, cause === undefined ? undefined : { cause }) };
}

export function validationError<T = never>(message: string, context: LedgerErrorContext = {}): Result<T> {
	return fail('validation', message, context);
}

/**
 * Convert a result into its value, throwing the carried error.
 * Meant for process boundaries (CLI commands, scripts), not for library code.
 */
export function unwrap<T>(result: Result<T>): T {
	if (!result.ok) {
		throw result.error;
	}
	return result.value;
}

export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : 'Unknown error';
}
