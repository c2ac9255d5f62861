import { describe, expect, test } from 'vitest';

import { guessMimeType, MAX_ATTACHMENT_BYTES, SqliteAttachmentStore } from '../../src/ledger/attachments';
import { unwrap } from '../../src/types/result';
import { CASH, createTestDb, FOOD, line, postEntry } from '../helpers';

describe('guessMimeType', () => {
	test('maps receipt extensions', () => {
		expect(guessMimeType('receipt.JPG')).toBe('image/jpeg');
		expect(guessMimeType('scan.png')).toBe('image/png');
		expect(guessMimeType('/tmp/invoice.pdf')).toBe('application/pdf');
		expect(guessMimeType('photo.gif')).toBeNull();
	});
});

describe('SqliteAttachmentStore', () => {
	function setup() {
		const db = createTestDb();
		postEntry(db, '2025-01-10', [line(FOOD, 'D', 5), line(CASH, 'C', 5)], { entryUuid: 'e-1' });
		return { db, store: new SqliteAttachmentStore(db) };
	}

	test('stores and replaces the single receipt of an entry', () => {
		const { store } = setup();

		unwrap(store.put('e-1', Buffer.from('first'), 'image/png', 'first.png'));
		unwrap(store.put('e-1', Buffer.from('second'), 'application/pdf', 'second.pdf'));

		const stored = store.get('e-1');
		expect(stored?.fileName).toBe('second.pdf');
		expect(stored?.mimeType).toBe('application/pdf');
		expect(stored?.bytes.toString()).toBe('second');
	});

	test('rejects unsupported types and oversized files', () => {
		const { store } = setup();

		const gif = store.put('e-1', Buffer.from('x'), 'image/gif', 'x.gif');
		const large = store.put('e-1', Buffer.alloc(MAX_ATTACHMENT_BYTES + 1), 'image/png', null);

		expect(gif.ok ? null : gif.error.message).toBe('unsupported attachment type: image/gif');
		expect(large.ok ? null : large.error.context.field).toBe('file_blob');
		expect(store.get('e-1')).toBeNull();
	});

	test('requires the entry to exist', () => {
		const { store } = setup();
		const result = store.put('missing', Buffer.from('x'), 'image/png', null);

		expect(result.ok ? null : result.error.kind).toBe('not_found');
	});

	test('deletes a receipt', () => {
		const { store } = setup();
		unwrap(store.put('e-1', Buffer.from('x'), 'image/jpeg', null));

		store.delete('e-1');

		expect(store.get('e-1')).toBeNull();
	});
});
