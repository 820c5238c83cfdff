/**
 * BaseRegistry - ordered key -> item store shared by every registry.
 *
 * This base class provides:
 * - Key-based registration (last write wins, or strict with throwOnConflict)
 * - Lookup by key with a typed "not found" error
 * - Insertion-ordered snapshots of keys and items
 *
 * Used by: VariantRegistry
 *
 * @example
 * ```typescript
 * class ShapeRegistry extends BaseRegistry<Shape> {
 *   register(shape: Shape): void {
 *     this.registerItem(shape.name, shape);
 *   }
 * }
 * ```
 */

/**
 * Error thrown when a requested key is not registered.
 */
export class UnknownKeyError extends Error {
	constructor(
		public readonly key: string,
		public readonly registryName: string,
		public readonly availableKeys: string[],
	) {
		const available = availableKeys.length > 0
			? `Available: ${availableKeys.join(", ")}`
			: "Registry is empty";
		super(`${registryName}: "${key}" not found. ${available}`);
		this.name = "UnknownKeyError";
	}
}

/**
 * Error thrown when registration conflicts with an existing entry
 * (only when the registry was created with throwOnConflict).
 */
export class RegistryConflictError extends Error {
	constructor(
		public readonly key: string,
		public readonly registryName: string,
	) {
		super(`${registryName}: Key "${key}" is already registered`);
		this.name = "RegistryConflictError";
	}
}

/**
 * Options for registry behavior.
 */
export interface RegistryOptions {
	/** Name of the registry (used in error messages) */
	name: string;
	/** Whether to throw on duplicate registration (default: false, last write wins) */
	throwOnConflict?: boolean;
}

/**
 * Generic base registry class.
 *
 * @typeParam T - Type of items stored in the registry
 */
export class BaseRegistry<T> {
	protected items = new Map<string, T>();
	protected readonly registryName: string;
	protected readonly throwOnConflict: boolean;

	constructor(options: RegistryOptions) {
		this.registryName = options.name;
		this.throwOnConflict = options.throwOnConflict ?? false;
	}

	get name(): string {
		return this.registryName;
	}

	/**
	 * Register an item under a key.
	 *
	 * Re-registering a key replaces the previous item in place, so the key
	 * keeps its original position in {@link keys}.
	 *
	 * @throws RegistryConflictError if the key exists and throwOnConflict=true
	 */
	protected registerItem(key: string, item: T): void {
		if (this.throwOnConflict && this.items.has(key)) {
			throw new RegistryConflictError(key, this.registryName);
		}
		this.items.set(key, item);
	}

	/**
	 * Get an item by key.
	 * Returns undefined if not found.
	 */
	get(key: string): T | undefined {
		return this.items.get(key);
	}

	/**
	 * Get an item by key.
	 * Throws UnknownKeyError if not found.
	 */
	getOrThrow(key: string): T {
		const item = this.items.get(key);
		if (item === undefined) {
			throw new UnknownKeyError(key, this.registryName, this.keys());
		}
		return item;
	}

	has(key: string): boolean {
		return this.items.has(key);
	}

	/**
	 * Get all registered items, in registration order.
	 */
	list(): T[] {
		return Array.from(this.items.values());
	}

	/**
	 * Get all keys, in registration order. The returned array is a copy.
	 */
	keys(): string[] {
		return Array.from(this.items.keys());
	}

	get size(): number {
		return this.items.size;
	}

	delete(key: string): boolean {
		return this.items.delete(key);
	}

	clear(): void {
		this.items.clear();
	}
}
