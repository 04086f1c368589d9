/**
 * Calendar-date helpers. Dates travel as ISO `YYYY-MM-DD` strings and are
 * interpreted in UTC so that ordering and arithmetic never depend on the
 * host timezone.
 */
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export const isIsoCalendarDate = (value: string): boolean => {
	const match = ISO_DATE_PATTERN.exec(value);
	if (!match) {
		return false;
	}
	const year = Number(match[1]);
	const month = Number(match[2]);
	const day = Number(match[3]);
	const ts = Date.UTC(year, month - 1, day);
	const roundTrip = new Date(ts);
	return (
		roundTrip.getUTCFullYear() === year &&
		roundTrip.getUTCMonth() === month - 1 &&
		roundTrip.getUTCDate() === day
	);
};

export const isoDateToTimestamp = (value: string): number => {
	if (!isIsoCalendarDate(value)) {
		throw new Error(`Invalid ISO calendar date: "${value}"`);
	}
	return Date.parse(`${value}T00:00:00Z`);
};

export const timestampToIsoDate = (timestamp: number): string =>
	new Date(timestamp).toISOString().slice(0, 10);

/**
 * Accepts `YYYY-MM-DD` or a full ISO timestamp and returns its UTC day, or
 * null when the value is neither.
 */
export const normalizeIsoDate = (value: string): string | null => {
	const trimmed = value.trim();
	if (isIsoCalendarDate(trimmed)) {
		return trimmed;
	}
	if (!/^\d{4}-\d{2}-\d{2}T/.test(trimmed)) {
		return null;
	}
	const ts = Date.parse(trimmed);
	return Number.isNaN(ts) ? null : timestampToIsoDate(ts);
};
