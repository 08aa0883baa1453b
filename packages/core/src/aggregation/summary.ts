/**
 * Result Summary
 */

import type { TestableKind } from "../testable/definition.types";
import type { Result } from "../testable/result.types";
import type { TerminalStatus } from "../testable/status";

export type StatusCounts = Record<TerminalStatus | "total", number>;

/**
 * Test summary statistics
 */
export interface ResultSummary {
	status: TerminalStatus;
	cases: StatusCounts;
	steps: StatusCounts;
	flights: StatusCounts;
	suites: StatusCounts;
	duration: number;
	/** Passed cases over all cases (1 when there are none) */
	passRate: number;
}

function emptyCounts(): StatusCounts {
	return { total: 0, passed: 0, failed: 0, error: 0, skipped: 0 };
}

/**
 * Count results per kind and status over a result tree
 */
export function summarizeResult(root: Result): ResultSummary {
	const counts: Record<TestableKind, StatusCounts> = {
		suite: emptyCounts(),
		case: emptyCounts(),
		flight: emptyCounts(),
		step: emptyCounts(),
	};

	const visit = (result: Result): void => {
		const entry = counts[result.kind];
		entry.total++;
		entry[result.status]++;
		result.children.forEach(visit);
	};
	visit(root);

	return {
		status: root.status,
		cases: counts.case,
		steps: counts.step,
		flights: counts.flight,
		suites: counts.suite,
		duration: root.duration,
		passRate: counts.case.total > 0 ? counts.case.passed / counts.case.total : 1,
	};
}
