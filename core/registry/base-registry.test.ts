/**
 * Unit tests for BaseRegistry class.
 *
 * Tests cover:
 * 1. Basic operations (register, get, has, delete, clear)
 * 2. Ordering of keys and items
 * 3. Replacement policy and strict mode
 * 4. Edge cases (empty registry)
 */

import { describe, expect, it, beforeEach } from "vitest";
import {
	BaseRegistry,
	UnknownKeyError,
	RegistryConflictError,
} from "./base-registry.ts";

// Test item type
interface TestItem {
	name: string;
	value: number;
}

// Concrete registry for testing
class TestRegistry extends BaseRegistry<TestItem> {
	constructor(throwOnConflict = false) {
		super({ name: "TestRegistry", throwOnConflict });
	}

	register(item: TestItem): void {
		this.registerItem(item.name, item);
	}
}

describe("BaseRegistry", () => {
	let registry: TestRegistry;

	beforeEach(() => {
		registry = new TestRegistry();
	});

	describe("Basic operations", () => {
		it("registers and retrieves items by key", () => {
			const item: TestItem = { name: "foo", value: 42 };
			registry.register(item);

			expect(registry.get("foo")).toBe(item);
			expect(registry.has("foo")).toBe(true);
		});

		it("returns undefined for non-existent key", () => {
			expect(registry.get("nonexistent")).toBeUndefined();
			expect(registry.has("nonexistent")).toBe(false);
		});

		it("throws UnknownKeyError when using getOrThrow", () => {
			expect(() => registry.getOrThrow("nonexistent")).toThrow(UnknownKeyError);
			expect(() => registry.getOrThrow("nonexistent")).toThrow(
				'TestRegistry: "nonexistent" not found. Registry is empty',
			);
		});

		it("includes available keys in error", () => {
			registry.register({ name: "alpha", value: 1 });
			registry.register({ name: "beta", value: 2 });

			let caught: unknown;
			try {
				registry.getOrThrow("gamma");
			} catch (e) {
				caught = e;
			}

			expect(caught).toBeInstanceOf(UnknownKeyError);
			if (caught instanceof UnknownKeyError) {
				expect(caught.key).toBe("gamma");
				expect(caught.registryName).toBe("TestRegistry");
				expect(caught.availableKeys).toEqual(["alpha", "beta"]);
				expect(caught.message).toBe(
					'TestRegistry: "gamma" not found. Available: alpha, beta',
				);
			}
		});

		it("tracks size correctly", () => {
			expect(registry.size).toBe(0);

			registry.register({ name: "a", value: 1 });
			expect(registry.size).toBe(1);

			registry.register({ name: "b", value: 2 });
			expect(registry.size).toBe(2);
		});

		it("deletes and clears items", () => {
			registry.register({ name: "a", value: 1 });
			registry.register({ name: "b", value: 2 });

			expect(registry.delete("a")).toBe(true);
			expect(registry.delete("a")).toBe(false);
			expect(registry.keys()).toEqual(["b"]);

			registry.clear();
			expect(registry.size).toBe(0);
		});
	});

	describe("Ordering", () => {
		it("returns keys in insertion order", () => {
			registry.register({ name: "zebra", value: 1 });
			registry.register({ name: "apple", value: 2 });
			registry.register({ name: "mango", value: 3 });

			expect(registry.keys()).toEqual(["zebra", "apple", "mango"]);
			expect(registry.list().map((i) => i.value)).toEqual([1, 2, 3]);
		});

		it("returns a snapshot, not a live view", () => {
			registry.register({ name: "a", value: 1 });
			const keys = registry.keys();

			registry.register({ name: "b", value: 2 });
			keys.push("mutated");

			expect(keys).toEqual(["a", "mutated"]);
			expect(registry.keys()).toEqual(["a", "b"]);
		});
	});

	describe("Replacement policy", () => {
		it("replaces an existing key by default (last write wins)", () => {
			registry.register({ name: "a", value: 1 });
			registry.register({ name: "b", value: 2 });
			registry.register({ name: "a", value: 99 });

			expect(registry.get("a")?.value).toBe(99);
			expect(registry.keys()).toEqual(["a", "b"]);
			expect(registry.size).toBe(2);
		});

		it("throws RegistryConflictError in strict mode", () => {
			const strict = new TestRegistry(true);
			strict.register({ name: "a", value: 1 });

			expect(() => strict.register({ name: "a", value: 2 })).toThrow(
				RegistryConflictError,
			);
			expect(() => strict.register({ name: "a", value: 2 })).toThrow(
				'TestRegistry: Key "a" is already registered',
			);
			expect(strict.get("a")?.value).toBe(1);
		});
	});
});
