/**
 * Sorting variants.
 *
 * Every algorithm returns a new array and leaves its input untouched, so they
 * can be swapped behind a StrategyContext without the caller noticing.
 */

import { z } from "zod";
import type { Capability } from "../core/capability.ts";
import { VariantRegistry } from "../core/factory/index.ts";

export type SortOrder = "asc" | "desc";

export interface SortOptions {
	order?: SortOrder;
}

export const SortOptionsSchema = z
	.object({
		order: z.enum(["asc", "desc"]).optional(),
	})
	.strict();

export type SortStrategy = Capability<readonly number[], number[]>;

/**
 * Total order shared by every algorithm: ascending, NaN after all numbers.
 */
export function compareNumbers(a: number, b: number): number {
	if (Number.isNaN(a)) return Number.isNaN(b) ? 0 : 1;
	if (Number.isNaN(b)) return -1;
	return a < b ? -1 : a > b ? 1 : 0;
}

abstract class OrderedSort implements SortStrategy {
	readonly order: SortOrder;

	constructor(options: SortOptions = {}) {
		this.order = options.order ?? "asc";
	}

	perform(numbers: readonly number[]): number[] {
		const sorted = this.sortAscending([...numbers]);
		return this.order === "desc" ? sorted.reverse() : sorted;
	}

	protected abstract sortAscending(values: number[]): number[];
}

export class QuickSort extends OrderedSort {
	protected sortAscending(values: number[]): number[] {
		return quickSort(values);
	}
}

export class MergeSort extends OrderedSort {
	protected sortAscending(values: number[]): number[] {
		return mergeSort(values);
	}
}

export class InsertionSort extends OrderedSort {
	protected sortAscending(values: number[]): number[] {
		const sorted: number[] = [];
		for (const value of values) {
			const index = sorted.findIndex((existing) => compareNumbers(existing, value) > 0);
			if (index === -1) {
				sorted.push(value);
			} else {
				sorted.splice(index, 0, value);
			}
		}
		return sorted;
	}
}

function quickSort(values: number[]): number[] {
	if (values.length <= 1) {
		return values;
	}

	const pivot = values[Math.floor(values.length / 2)]!;
	const less = values.filter((v) => compareNumbers(v, pivot) < 0);
	const equal = values.filter((v) => compareNumbers(v, pivot) === 0);
	const greater = values.filter((v) => compareNumbers(v, pivot) > 0);

	return [...quickSort(less), ...equal, ...quickSort(greater)];
}

function mergeSort(values: number[]): number[] {
	if (values.length <= 1) {
		return values;
	}

	const mid = Math.floor(values.length / 2);
	const left = mergeSort(values.slice(0, mid));
	const right = mergeSort(values.slice(mid));

	const merged: number[] = [];
	let i = 0;
	let j = 0;
	while (i < left.length && j < right.length) {
		const a = left[i]!;
		const b = right[j]!;
		if (compareNumbers(a, b) <= 0) {
			merged.push(a);
			i++;
		} else {
			merged.push(b);
			j++;
		}
	}

	return [...merged, ...left.slice(i), ...right.slice(j)];
}

export function createSortRegistry(): VariantRegistry<SortStrategy, SortOptions> {
	const registry = new VariantRegistry<SortStrategy, SortOptions>("SortRegistry");
	const schema = SortOptionsSchema;

	registry.register("quick", (options) => new QuickSort(options), {
		description: "Partition around a middle pivot",
		schema,
	});
	registry.register("merge", (options) => new MergeSort(options), {
		description: "Split in halves, merge sorted runs",
		schema,
	});
	registry.register("insertion", (options) => new InsertionSort(options), {
		description: "Insert each value into a growing sorted list",
		schema,
	});

	return registry;
}
