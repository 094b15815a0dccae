// =============================================================================
// IN-MEMORY FILTERING & SORTING
// =============================================================================

import type { Row, SortBy, Where } from "@fundflow/core/db";

/** Order two stored values of the same primitive kind; null when incomparable. */
export function compareValues(a: unknown, b: unknown): number | null {
	if (typeof a === "number" && typeof b === "number") return a - b;
	if (typeof a === "string" && typeof b === "string") return a < b ? -1 : a > b ? 1 : 0;
	if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
	return null;
}

function likeToRegExp(pattern: string): RegExp {
	const source = pattern
		.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
		.replace(/%/g, ".*")
		.replace(/_/g, ".");
	return new RegExp(`^${source}$`, "i");
}

export function matchesCondition(row: Row, condition: Where): boolean {
	const value = row[condition.field];

	switch (condition.operator) {
		case "eq":
			return compareValues(value, condition.value) === 0 || value === condition.value;
		case "ne":
			return !(compareValues(value, condition.value) === 0 || value === condition.value);
		case "gt": {
			const cmp = compareValues(value, condition.value);
			return cmp !== null && cmp > 0;
		}
		case "gte": {
			const cmp = compareValues(value, condition.value);
			return cmp !== null && cmp >= 0;
		}
		case "lt": {
			const cmp = compareValues(value, condition.value);
			return cmp !== null && cmp < 0;
		}
		case "lte": {
			const cmp = compareValues(value, condition.value);
			return cmp !== null && cmp <= 0;
		}
		case "in":
			return Array.isArray(condition.value) && condition.value.includes(value);
		case "like":
			return (
				typeof value === "string" &&
				typeof condition.value === "string" &&
				likeToRegExp(condition.value).test(value)
			);
		case "is_null":
			return value === null || value === undefined;
		case "is_not_null":
			return value !== null && value !== undefined;
	}
}

export function matchesAll(row: Row, where: Where[]): boolean {
	return where.every((w) => matchesCondition(row, w));
}

/** Sort rows by one field, nulls last in either direction. */
export function sortRows(rows: Row[], sortBy: SortBy): Row[] {
	return [...rows].sort((a, b) => {
		const aVal = a[sortBy.field];
		const bVal = b[sortBy.field];

		if (aVal === bVal) return 0;
		if (aVal === null || aVal === undefined) return 1;
		if (bVal === null || bVal === undefined) return -1;

		const comparison = compareValues(aVal, bVal) ?? 0;
		return sortBy.direction === "desc" ? -comparison : comparison;
	});
}
