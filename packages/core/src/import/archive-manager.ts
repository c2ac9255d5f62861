import { mkdir, rename } from 'node:fs/promises';
import { basename, extname, join, resolve } from 'node:path';

import { formatIsoDate } from '../utils/datetime';

export type ArchiveOperation = {
	sourcePath: string;
	targetPath: string;
	completed: boolean;
};

function pad2(value: number): string {
	return String(value).padStart(2, '0');
}

function archiveTimestamp(now: Date): string {
	return `${now.getFullYear()}${pad2(now.getMonth() + 1)}${pad2(now.getDate())}-${pad2(now.getHours())}${pad2(now.getMinutes())}${pad2(now.getSeconds())}`;
}

/**
 * Moves imported files into a dated archive folder in two phases: targets are
 * planned first, files move only once their import has been committed.
 */
export class ArchiveManager {
	private operations: ArchiveOperation[] = [];

	/**
	 * Phase 1: create the dated folder and plan a unique target for every file.
	 */
	async prepareArchive(files: readonly string[], archiveRootDir: string, now: Date = new Date()): Promise<string[]> {
		if (files.length === 0) {
			return [];
		}

		const timestamp = archiveTimestamp(now);
		const targetDir = resolve(archiveRootDir, formatIsoDate(now));
		await mkdir(targetDir, { recursive: true });

		const targetPaths: string[] = [];
		const usedNames = new Set<string>();

		for (const [index, sourcePath] of files.entries()) {
			const ext = extname(sourcePath).toLowerCase();
			const nameSlug = slugify(basename(sourcePath, extname(sourcePath)), 40) || 'payload';
			const order = String(index + 1).padStart(2, '0');

			let targetName = `${timestamp}_${order}_${nameSlug}${ext}`;
			let counter = 2;
			while (usedNames.has(targetName)) {
				targetName = `${timestamp}_${order}_${nameSlug}-${counter}${ext}`;
				counter += 1;
			}
			usedNames.add(targetName);

			const targetPath = join(targetDir, targetName);
			this.operations.push({ sourcePath, targetPath, completed: false });
			targetPaths.push(targetPath);
		}

		return targetPaths;
	}

	/**
	 * Phase 2: move the planned files. When `only` is given, files outside it stay put.
	 */
	async commitArchive(only?: ReadonlySet<string>): Promise<string[]> {
		const archived: string[] = [];

		for (const op of this.operations) {
			if (op.completed || (only && !only.has(op.sourcePath))) {
				continue;
			}
			await rename(op.sourcePath, op.targetPath);
			op.completed = true;
			archived.push(op.targetPath);
		}

		return archived;
	}
}

export function slugify(value: string, maxLen: number): string {
	const normalized = value
		.toLowerCase()
		.replace(/[^a-z0-9]+/g, '-')
		.replace(/^-+|-+$/g, '')
		.replace(/-{2,}/g, '-');
	if (normalized.length === 0) {
		return '';
	}
	return normalized.slice(0, maxLen);
}
