/**
 * Factory module - build variants by key.
 */

export {
	VariantRegistry,
	ConstructionError,
	type VariantConstructor,
	type VariantEntry,
	type VariantSource,
	type RegisterOptions,
} from "./variant-registry.ts";
