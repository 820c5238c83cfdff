/**
 * Capability interface - the contract every interchangeable variant satisfies.
 * Each variant is a small, self-contained object with one operation, so it can
 * be built by a registry or by hand and handed to a StrategyContext.
 */

/**
 * Per-call options a StrategyContext hands to the variant it delegates to.
 */
export type StrategyOptions = Readonly<Record<string, unknown>>;

/**
 * Interface for variants.
 *
 * @typeParam I - Input accepted by `perform`
 * @typeParam O - Output produced by `perform`
 */
export interface Capability<I, O> {
	/**
	 * Run the variant's operation.
	 * @param options - Context-level options, when the context carries any
	 */
	perform(input: I, options?: StrategyOptions): O;

	/**
	 * Release resources held by the variant. Called once by a StrategyContext
	 * when the variant is replaced. Variants without resources omit it.
	 */
	release?(): void;
}

/**
 * Plain function form of a variant.
 */
export type CapabilityFn<I, O> = (input: I, options?: StrategyOptions) => O;

/**
 * Wrap a plain function as a Capability.
 */
export function fromFunction<I, O>(fn: CapabilityFn<I, O>): Capability<I, O> {
	return {
		perform: (input, options) => fn(input, options),
	};
}
