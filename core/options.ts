/**
 * Configuration carrier for variants and contexts.
 *
 * Options are plain data (no functions or class instances). They are copied
 * and deep-frozen when attached, so replacing configuration always means
 * attaching a new carrier.
 */

export type Options<T extends object> = Readonly<T>;

function deepFreeze(value: unknown): void {
	if (value === null || typeof value !== "object" || Object.isFrozen(value)) {
		return;
	}
	Object.freeze(value);
	for (const child of Object.values(value)) {
		deepFreeze(child);
	}
}

/**
 * Copy and deep-freeze a set of options.
 */
export function freezeOptions<T extends object>(values: T): Options<T> {
	const copy = structuredClone(values);
	deepFreeze(copy);
	return copy;
}
