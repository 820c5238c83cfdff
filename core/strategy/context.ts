/**
 * StrategyContext - holds one active variant and routes calls to it.
 *
 * States: "unset" (initial, nothing selected) and "ready". setStrategy moves
 * to "ready"; nothing moves back. execute() in "unset" throws
 * NoStrategySelectedError so callers can tell "not configured yet" apart from
 * a failure inside the selected variant.
 */

import type { Capability, StrategyOptions } from "../capability.ts";
import type { VariantSource } from "../factory/index.ts";
import { freezeOptions } from "../options.ts";

/**
 * Error thrown when execute() is called before any strategy was selected.
 */
export class NoStrategySelectedError extends Error {
	constructor(public readonly contextName: string) {
		super(`${contextName}: no strategy selected. Call setStrategy() before execute()`);
		this.name = "NoStrategySelectedError";
	}
}

export type ContextState = "unset" | "ready";

export interface StrategyContextInit<I, O> {
	/** Name used in error messages (default: "StrategyContext") */
	name?: string;
	/** Initial strategy; the context starts "ready" when given */
	strategy?: Capability<I, O>;
	/** Options passed to every perform() call */
	configuration?: Record<string, unknown>;
}

export class StrategyContext<I, O> {
	readonly name: string;
	private strategy: Capability<I, O> | undefined;
	private configuration: StrategyOptions | undefined;

	constructor(init: StrategyContextInit<I, O> = {}) {
		this.name = init.name ?? "StrategyContext";
		this.strategy = init.strategy;
		this.configuration = init.configuration ? freezeOptions(init.configuration) : undefined;
	}

	get state(): ContextState {
		return this.strategy ? "ready" : "unset";
	}

	/**
	 * The selected strategy, or undefined while unset.
	 */
	get current(): Capability<I, O> | undefined {
		return this.strategy;
	}

	/**
	 * The context-level options, or undefined when none are attached.
	 */
	get options(): StrategyOptions | undefined {
		return this.configuration;
	}

	/**
	 * Replace the held strategy. The previous one is released when it declares
	 * release() and is a different object.
	 */
	setStrategy(strategy: Capability<I, O>): void {
		const previous = this.strategy;
		this.strategy = strategy;
		if (previous && previous !== strategy) {
			previous.release?.();
		}
	}

	/**
	 * Build a strategy from a registry and select it.
	 */
	select<K extends object>(
		source: VariantSource<Capability<I, O>, K>,
		key: string,
		configuration?: K,
	): void {
		this.setStrategy(source.create(key, configuration));
	}

	/**
	 * Attach options handed to every perform() call. Pass undefined to detach.
	 */
	setConfiguration(configuration: Record<string, unknown> | undefined): void {
		this.configuration = configuration ? freezeOptions(configuration) : undefined;
	}

	/**
	 * Delegate to the selected strategy. Errors it throws propagate unchanged.
	 * @throws NoStrategySelectedError if no strategy was ever selected
	 */
	execute(input: I): O {
		if (!this.strategy) {
			throw new NoStrategySelectedError(this.name);
		}
		return this.strategy.perform(input, this.configuration);
	}
}
