const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 86_400_000;

function pad2(value: number): string {
	return value.toString().padStart(2, '0');
}

function parseIsoParts(value: string): { year: number; month: number; day: number } | null {
	const match = ISO_DATE_PATTERN.exec(value);
	if (!match) {
		return null;
	}
	const year = Number(match[1]);
	const month = Number(match[2]);
	const day = Number(match[3]);
	const probe = new Date(Date.UTC(year, month - 1, day));
	if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
		return null;
	}
	return { year, month, day };
}

/** True for real calendar dates written as YYYY-MM-DD. */
export function isIsoDate(value: string): boolean {
	return parseIsoParts(value) !== null;
}

export function formatIsoDate(date: Date): string {
	return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

export function todayIso(now: Date = new Date()): string {
	return formatIsoDate(now);
}

/** Local wall-clock timestamp, YYYY-MM-DDTHH:MM:SS. */
export function nowIsoLocal(now: Date = new Date()): string {
	return `${formatIsoDate(now)}T${pad2(now.getHours())}:${pad2(now.getMinutes())}:${pad2(now.getSeconds())}`;
}

/** Compact timestamp for file names, YYYYMMDD_HHMMSS_ffffff. */
export function fileTimestamp(now: Date = new Date()): string {
	const date = `${now.getFullYear()}${pad2(now.getMonth() + 1)}${pad2(now.getDate())}`;
	const time = `${pad2(now.getHours())}${pad2(now.getMinutes())}${pad2(now.getSeconds())}`;
	const micros = (now.getMilliseconds() * 1000).toString().padStart(6, '0');
	return `${date}_${time}_${micros}`;
}

function toUtcMs(value: string): number {
	const parts = parseIsoParts(value);
	if (!parts) {
		throw new Error(`Invalid date: ${value}`);
	}
	return Date.UTC(parts.year, parts.month - 1, parts.day);
}

export function addDays(value: string, days: number): string {
	const shifted = new Date(toUtcMs(value) + days * DAY_MS);
	return `${shifted.getUTCFullYear()}-${pad2(shifted.getUTCMonth() + 1)}-${pad2(shifted.getUTCDate())}`;
}

export function daysBetween(from: string, to: string): number {
	return Math.round((toUtcMs(to) - toUtcMs(from)) / DAY_MS);
}

export function monthOf(value: string): string {
	return value.slice(0, 7);
}
