import { extname } from 'node:path';

import type { LedgerDb } from '../db/connection';
import { describeError, fail, ok, type Result } from '../types/result';

export const ATTACHMENT_MIME_TYPES = ['image/jpeg', 'image/png', 'application/pdf'] as const;

export type AttachmentMimeType = (typeof ATTACHMENT_MIME_TYPES)[number];

export function isAttachmentMimeType(value: string): value is AttachmentMimeType {
	return (ATTACHMENT_MIME_TYPES as readonly string[]).includes(value);
}

export const MAX_ATTACHMENT_BYTES = 10 * 1024 * 1024;

export type Attachment = {
	entryUuid: string;
	fileName: string | null;
	mimeType: AttachmentMimeType;
	bytes: Buffer;
};

/**
 * Storage for the single receipt attached to an entry. The ledger store only ever
 * calls `delete`; the rest is for front ends.
 */
export interface AttachmentStore {
	get(entryUuid: string): Attachment | null;
	put(entryUuid: string, bytes: Uint8Array, mimeType: string, fileName: string | null): Result<void>;
	delete(entryUuid: string): void;
}

const MIME_BY_EXTENSION: Record<string, AttachmentMimeType> = {
	'.jpg': 'image/jpeg',
	'.jpeg': 'image/jpeg',
	'.png': 'image/png',
	'.pdf': 'application/pdf',
};

export function guessMimeType(path: string): AttachmentMimeType | null {
	return MIME_BY_EXTENSION[extname(path).toLowerCase()] ?? null;
}

type AttachmentRow = {
	entry_uuid: string;
	file_name: string | null;
	mime_type: string;
	file_blob: Uint8Array;
};

export class SqliteAttachmentStore implements AttachmentStore {
	constructor(private readonly db: LedgerDb) {}

	get(entryUuid: string): Attachment | null {
		const row = this.db
			.prepare<[string], AttachmentRow>('SELECT entry_uuid, file_name, mime_type, file_blob FROM gl_entry_attachment WHERE entry_uuid = ?')
			.get(entryUuid);
		if (!row || !isAttachmentMimeType(row.mime_type)) {
			return null;
		}
		return { entryUuid: row.entry_uuid, fileName: row.file_name, mimeType: row.mime_type, bytes: Buffer.from(row.file_blob) };
	}

	put(entryUuid: string, bytes: Uint8Array, mimeType: string, fileName: string | null): Result<void> {
		if (!isAttachmentMimeType(mimeType)) {
			return fail('validation', `unsupported attachment type: ${mimeType}`, { field: 'mime_type', value: mimeType, entryUuid });
		}
		if (bytes.byteLength > MAX_ATTACHMENT_BYTES) {
			return fail('validation', `attachment exceeds ${MAX_ATTACHMENT_BYTES} bytes`, { field: 'file_blob', value: bytes.byteLength, entryUuid });
		}

		const exists = this.db.prepare<[string], { entry_uuid: string }>('SELECT entry_uuid FROM gl_entry WHERE entry_uuid = ?').get(entryUuid);
		if (!exists) {
			return fail('not_found', `entry not found: ${entryUuid}`, { entryUuid });
		}

		try {
			this.db
				.prepare<[string, string | null, string, Buffer]>(
					`INSERT INTO gl_entry_attachment (entry_uuid, file_name, mime_type, file_blob)
					VALUES (?, ?, ?, ?)
					ON CONFLICT(entry_uuid) DO UPDATE SET
						file_name = excluded.file_name,
						mime_type = excluded.mime_type,
						file_blob = excluded.file_blob`,
				)
				.run(entryUuid, fileName, mimeType, Buffer.from(bytes));
		} catch (error) {
			return fail('validation', `failed to store attachment: ${describeError(error)}`, { entryUuid }, error);
		}
		return ok(undefined);
	}

	delete(entryUuid: string): void {
		this.db.prepare<[string]>('DELETE FROM gl_entry_attachment WHERE entry_uuid = ?').run(entryUuid);
	}
}
