import type { MessageTs } from "./types.js";

const TS_PATTERN = /^\d+(\.\d+)?$/;

export function isMessageTs(value: string): value is MessageTs {
	return TS_PATTERN.test(value);
}

/**
 * Numeric comparison of two platform timestamps without going through
 * floating point: whole seconds first, then the fractional digits padded to
 * equal length. Returns a negative number, zero, or a positive number.
 */
export function compareTs(a: MessageTs, b: MessageTs): number {
	const [aSeconds = "0", aFraction = ""] = a.split(".");
	const [bSeconds = "0", bFraction = ""] = b.split(".");

	const secondsDiff =
		Number.parseInt(aSeconds, 10) - Number.parseInt(bSeconds, 10);
	if (secondsDiff !== 0) {
		return secondsDiff < 0 ? -1 : 1;
	}

	const width = Math.max(aFraction.length, bFraction.length);
	const left = aFraction.padEnd(width, "0");
	const right = bFraction.padEnd(width, "0");
	if (left === right) return 0;
	return left < right ? -1 : 1;
}

export function maxTs(values: readonly MessageTs[]): MessageTs | null {
	let max: MessageTs | null = null;
	for (const value of values) {
		if (max === null || compareTs(value, max) > 0) {
			max = value;
		}
	}
	return max;
}

/**
 * Timestamp `seconds` before `nowMs`, in platform format
 */
export function tsBefore(nowMs: number, seconds: number): MessageTs {
	return (nowMs / 1000 - seconds).toFixed(6);
}
