/**
 * Variant Registry - named constructors that build variants on demand.
 *
 * Extends BaseRegistry for key handling (last write wins, ordered keys).
 * Each entry may carry a zod schema; configuration passed to create() is
 * parsed through it and frozen before the constructor sees it.
 */

import type { z } from "zod";
import { BaseRegistry, type RegistryOptions } from "../registry/index.ts";
import { freezeOptions } from "../options.ts";

/**
 * Error thrown when a registered constructor (or its configuration schema)
 * fails. The original error is kept as `cause`.
 */
export class ConstructionError extends Error {
	constructor(
		public readonly key: string,
		public readonly registryName: string,
		cause: unknown,
	) {
		const reason = cause instanceof Error ? cause.message : String(cause);
		super(`${registryName}: failed to construct "${key}": ${reason}`, { cause });
		this.name = "ConstructionError";
	}
}

/**
 * Builds one variant. Receives the configuration when create() was given one.
 */
export type VariantConstructor<C, K extends object> = (configuration?: Readonly<K>) => C;

export interface RegisterOptions<K extends object> {
	/** Human-readable description shown by describe() and the CLI */
	description?: string;
	/** Schema that configuration must satisfy before construction */
	schema?: z.ZodType<K, z.ZodTypeDef, unknown>;
}

/**
 * Stored registry entry.
 */
export interface VariantEntry<C, K extends object> extends RegisterOptions<K> {
	key: string;
	construct: VariantConstructor<C, K>;
}

/**
 * Anything that can build a variant by key.
 */
export interface VariantSource<C, K extends object> {
	create(key: string, configuration?: K): C;
}

/**
 * Central registry for variant constructors.
 *
 * @typeParam C - Type every variant conforms to
 * @typeParam K - Configuration accepted by create()
 */
export class VariantRegistry<C extends object, K extends object = Record<string, unknown>>
	extends BaseRegistry<VariantEntry<C, K>>
	implements VariantSource<C, K>
{
	constructor(name = "VariantRegistry", options: Omit<RegistryOptions, "name"> = {}) {
		super({ name, ...options });
	}

	/**
	 * Bind a constructor to a key. An existing binding for the key is replaced.
	 */
	register(
		key: string,
		construct: VariantConstructor<C, K>,
		options: RegisterOptions<K> = {},
	): void {
		this.registerItem(key, { key, construct, ...options });
	}

	/**
	 * Build a new variant.
	 * @throws UnknownKeyError if the key is not registered
	 * @throws ConstructionError if the schema or the constructor fails
	 */
	create(key: string, configuration?: K): C {
		const entry = this.getOrThrow(key);

		let instance: C;
		try {
			instance = configuration === undefined
				? entry.construct()
				: entry.construct(this.prepare(entry, configuration));
		} catch (error) {
			throw new ConstructionError(key, this.registryName, error);
		}

		// Untyped constructors can still hand back nothing
		if (instance === null || instance === undefined) {
			throw new ConstructionError(
				key,
				this.registryName,
				new TypeError("constructor returned no instance"),
			);
		}

		return instance;
	}

	/**
	 * Registered keys, in registration order.
	 */
	listKeys(): string[] {
		return this.keys();
	}

	/**
	 * Key and description of a registered entry, for listings.
	 * @throws UnknownKeyError if the key is not registered
	 */
	describe(key: string): { key: string; description?: string } {
		const { description } = this.getOrThrow(key);
		return description === undefined ? { key } : { key, description };
	}

	private prepare(entry: VariantEntry<C, K>, configuration: K): Readonly<K> {
		const parsed = entry.schema ? entry.schema.parse(configuration) : configuration;
		return freezeOptions(parsed);
	}
}
