/**
 * Strategy module - swap interchangeable variants at runtime.
 */

export {
	StrategyContext,
	NoStrategySelectedError,
	type ContextState,
	type StrategyContextInit,
} from "./context.ts";
