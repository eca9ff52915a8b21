import { describe, expect, it } from "vitest";
import { compareTs, isMessageTs, maxTs, tsBefore } from "../src/timestamps.js";

describe("timestamps", () => {
	it("recognises platform timestamps", () => {
		expect(isMessageTs("1704110400.000100")).toBe(true);
		expect(isMessageTs("1704110400")).toBe(true);
		expect(isMessageTs("17041.10400.1")).toBe(false);
		expect(isMessageTs("abc")).toBe(false);
	});

	it("orders by whole seconds first", () => {
		expect(compareTs("9.999999", "10.000000")).toBe(-1);
		expect(compareTs("10.000000", "9.999999")).toBe(1);
	});

	it("compares fractions digit by digit after padding", () => {
		expect(compareTs("1704110400.0001", "1704110400.000100")).toBe(0);
		expect(compareTs("1704110400.000099", "1704110400.0001")).toBe(-1);
		expect(compareTs("1704110400", "1704110400.000000")).toBe(0);
	});

	it("distinguishes values a double would collapse", () => {
		expect(compareTs("1704110400.0000011", "1704110400.0000012")).toBe(-1);
	});

	it("finds the maximum", () => {
		expect(maxTs(["5.0", "7.0", "3.0"])).toBe("7.0");
		expect(maxTs([])).toBeNull();
	});

	it("formats a look-back bound with microsecond precision", () => {
		expect(tsBefore(1_704_110_460_000, 60)).toBe("1704110400.000000");
		expect(tsBefore(1_704_110_460_250, 10)).toBe("1704110450.250000");
	});
});
