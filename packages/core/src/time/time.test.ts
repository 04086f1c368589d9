import { describe, expect, it } from "vitest";
import {
	isIsoCalendarDate,
	isoDateToTimestamp,
	normalizeIsoDate,
	timestampToIsoDate,
} from "./time";

describe("isIsoCalendarDate", () => {
	it("accepts real calendar days", () => {
		expect(isIsoCalendarDate("2024-02-29")).toBe(true);
		expect(isIsoCalendarDate("2023-12-31")).toBe(true);
	});

	it("rejects impossible days and other formats", () => {
		expect(isIsoCalendarDate("2023-02-29")).toBe(false);
		expect(isIsoCalendarDate("2023-13-01")).toBe(false);
		expect(isIsoCalendarDate("2023-1-5")).toBe(false);
		expect(isIsoCalendarDate("01/05/2023")).toBe(false);
	});
});

describe("date conversions", () => {
	it("maps ISO days to UTC midnight and back", () => {
		const ts = isoDateToTimestamp("2024-01-02");
		expect(ts).toBe(Date.UTC(2024, 0, 2));
		expect(timestampToIsoDate(ts)).toBe("2024-01-02");
	});

	it("throws on malformed input", () => {
		expect(() => isoDateToTimestamp("2024-02-30")).toThrowError(
			/Invalid ISO calendar date/
		);
	});

	it("normalizes full timestamps to their UTC day", () => {
		expect(normalizeIsoDate("2024-03-05T21:30:00Z")).toBe("2024-03-05");
		expect(normalizeIsoDate(" 2024-03-05 ")).toBe("2024-03-05");
	});

	it("returns null for values that are not ISO days or timestamps", () => {
		expect(normalizeIsoDate("2024-02-30")).toBeNull();
		expect(normalizeIsoDate("03/05/2024")).toBeNull();
	});
});
