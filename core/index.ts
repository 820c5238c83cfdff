/**
 * Core module exports for strategykit.
 */

export * from "./capability.ts";
export * from "./options.ts";
export * from "./config.ts";

// Registries and contexts
export * from "./registry/index.ts";
export * from "./factory/index.ts";
export * from "./strategy/index.ts";
