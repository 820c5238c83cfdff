/**
 * Registry module - shared ordered store for pluggable components.
 *
 * Provides BaseRegistry class and error types for consistent
 * registration and lookup across the codebase.
 */

export {
	BaseRegistry,
	UnknownKeyError,
	RegistryConflictError,
	type RegistryOptions,
} from "./base-registry.ts";
