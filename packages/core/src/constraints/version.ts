/**
 * Attribute value ordering
 */

import type { AttributeValue } from "./constraint.types";

const NUMERIC_SEGMENT = /^\d+$/;

function segments(value: string): string[] {
	return value
		.trim()
		.replace(/^v(?=\d)/i, "")
		.split(/[.\-+_]/)
		.filter((segment) => segment.length > 0);
}

/**
 * Compare two dotted versions.
 *
 * Numeric segments compare numerically, other segments lexically, and a
 * missing segment counts as "0" ("2.3" equals "2.3.0"). A numeric segment
 * sorts before a non-numeric one.
 */
export function compareVersions(a: string, b: string): number {
	const left = segments(a);
	const right = segments(b);
	const length = Math.max(left.length, right.length);

	for (let i = 0; i < length; i++) {
		const l = left[i] ?? "0";
		const r = right[i] ?? "0";
		const lNumeric = NUMERIC_SEGMENT.test(l);
		const rNumeric = NUMERIC_SEGMENT.test(r);

		if (lNumeric && rNumeric) {
			const diff = Number(l) - Number(r);
			if (diff !== 0) return diff < 0 ? -1 : 1;
			continue;
		}
		if (lNumeric !== rNumeric) {
			return lNumeric ? -1 : 1;
		}
		if (l !== r) {
			return l < r ? -1 : 1;
		}
	}

	return 0;
}

/**
 * Compare two attribute values: numbers numerically, anything else as versions
 */
export function compareValues(a: AttributeValue, b: AttributeValue): number {
	if (typeof a === "number" && typeof b === "number") {
		return a === b ? 0 : a < b ? -1 : 1;
	}
	return compareVersions(String(a), String(b));
}

/**
 * Check two attribute values for equality under value ordering
 */
export function valuesEqual(a: AttributeValue, b: AttributeValue): boolean {
	return a === b || compareValues(a, b) === 0;
}
