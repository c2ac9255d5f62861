import { describe, expect, test } from 'vitest';

import { isAccountType, isProfitAndLoss, toAccountType, toDebitCredit, toEntryType } from '../../src/types/ledger';
import { describeError, fail, LedgerError, ok, unwrap, validationError } from '../../src/types/result';

describe('ledger tags', () => {
	test('narrows stored values', () => {
		expect(toAccountType('LIAB')).toBe('LIAB');
		expect(toDebitCredit('C')).toBe('C');
		expect(toEntryType('GENERAL')).toBe('GENERAL');
		expect(() => toAccountType('BANK')).toThrow('Unknown account type: BANK');
		expect(() => toDebitCredit('X')).toThrow('Unknown dc: X');
	});

	test('flags profit and loss types', () => {
		expect(isProfitAndLoss('EXPENSE')).toBe(true);
		expect(isProfitAndLoss('INCOME')).toBe(true);
		expect(isProfitAndLoss('ASSET')).toBe(false);
		expect(isProfitAndLoss('EQUITY')).toBe(false);
		expect(isAccountType('asset')).toBe(false);
	});
});

describe('Result', () => {
	test('unwraps values and throws carried errors', () => {
		expect(unwrap(ok(3))).toBe(3);

		const failed = fail('not_found', 'entry not found: e-1', { entryUuid: 'e-1' });
		expect(() => unwrap(failed)).toThrow(LedgerError);
		if (!failed.ok) {
			expect(failed.error.kind).toBe('not_found');
			expect(failed.error.context).toEqual({ entryUuid: 'e-1' });
			expect(failed.error.cause).toBeUndefined();
		}
	});

	test('builds validation errors and describes unknown throwables', () => {
		const result = validationError('bad', { field: 'date' });

		expect(result.ok ? null : result.error.kind).toBe('validation');
		expect(describeError(new Error('boom'))).toBe('boom');
		expect(describeError('boom')).toBe('Unknown error');
	});
});
