/**
 * Trading strategies with their own options.
 *
 * Each strategy captures its options at construction (window size, price
 * band), so a TradingBot can swap strategies without knowing their settings.
 */

import { z } from "zod";
import type { Capability } from "../core/capability.ts";
import { VariantRegistry } from "../core/factory/index.ts";
import { StrategyContext } from "../core/strategy/index.ts";

export type TradeDecision = "buy" | "sell" | "hold";

export type TradingStrategy = Capability<readonly number[], TradeDecision>;

export interface TradingOptions {
	windowSize?: number;
	minPrice?: number;
	maxPrice?: number;
}

export const DEFAULT_WINDOW_SIZE = 3;
export const DEFAULT_MIN_PRICE = 32000;
export const DEFAULT_MAX_PRICE = 33000;

export const AverageOptionsSchema = z
	.object({
		windowSize: z.number().int().positive().optional(),
	})
	.strict();

export const MinMaxOptionsSchema = z
	.object({
		minPrice: z.number().optional(),
		maxPrice: z.number().optional(),
	})
	.strict()
	.refine(
		(o) => (o.minPrice ?? DEFAULT_MIN_PRICE) <= (o.maxPrice ?? DEFAULT_MAX_PRICE),
		{ message: "minPrice must not exceed maxPrice" },
	);

/**
 * Buy below the moving average of the last `windowSize` prices, sell above it.
 */
export class AverageTradingStrategy implements TradingStrategy {
	readonly windowSize: number;

	constructor(options: Pick<TradingOptions, "windowSize"> = {}) {
		this.windowSize = options.windowSize ?? DEFAULT_WINDOW_SIZE;
	}

	perform(prices: readonly number[]): TradeDecision {
		const last = prices.at(-1);
		if (last === undefined) {
			return "hold";
		}

		const window = prices.slice(-this.windowSize);
		const mean = window.reduce((sum, p) => sum + p, 0) / window.length;

		if (last < mean) return "buy";
		if (last > mean) return "sell";
		return "hold";
	}
}

/**
 * Buy under a floor price, sell over a ceiling.
 */
export class MinMaxTradingStrategy implements TradingStrategy {
	readonly minPrice: number;
	readonly maxPrice: number;

	constructor(options: Pick<TradingOptions, "minPrice" | "maxPrice"> = {}) {
		this.minPrice = options.minPrice ?? DEFAULT_MIN_PRICE;
		this.maxPrice = options.maxPrice ?? DEFAULT_MAX_PRICE;
	}

	perform(prices: readonly number[]): TradeDecision {
		const last = prices.at(-1);
		if (last === undefined) {
			return "hold";
		}

		if (last < this.minPrice) return "buy";
		if (last > this.maxPrice) return "sell";
		return "hold";
	}
}

export function createTradingRegistry(): VariantRegistry<TradingStrategy, TradingOptions> {
	const registry = new VariantRegistry<TradingStrategy, TradingOptions>("TradingStrategyRegistry");
	registry.register("average", (options) => new AverageTradingStrategy(options), {
		description: "Compare the last price to a moving average",
		schema: AverageOptionsSchema,
	});
	registry.register("minmax", (options) => new MinMaxTradingStrategy(options), {
		description: "Trade outside a fixed price band",
		schema: MinMaxOptionsSchema,
	});
	return registry;
}

// ============================================================================
// Exchange & Bot
// ============================================================================

export interface Exchange {
	getMarketData(symbol: string): number[];
	buy(symbol: string, amount: number): void;
	sell(symbol: string, amount: number): void;
}

export interface Order {
	side: "buy" | "sell";
	symbol: string;
	amount: number;
}

/**
 * Exchange backed by fixed price series. Records every order placed.
 */
export class InMemoryExchange implements Exchange {
	readonly orders: Order[] = [];
	private readonly prices: Map<string, number[]>;

	constructor(prices: Record<string, number[]>) {
		this.prices = new Map(Object.entries(prices));
	}

	getMarketData(symbol: string): number[] {
		const series = this.prices.get(symbol);
		if (!series) {
			throw new Error(`No market data for symbol "${symbol}"`);
		}
		return [...series];
	}

	buy(symbol: string, amount: number): void {
		this.orders.push({ side: "buy", symbol, amount });
	}

	sell(symbol: string, amount: number): void {
		this.orders.push({ side: "sell", symbol, amount });
	}
}

export class TradingBot {
	private readonly context: StrategyContext<readonly number[], TradeDecision>;

	constructor(
		private readonly exchange: Exchange,
		strategy?: TradingStrategy,
	) {
		this.context = new StrategyContext({ name: "TradingBot", strategy });
	}

	setStrategy(strategy: TradingStrategy): void {
		this.context.setStrategy(strategy);
	}

	/**
	 * Run the strategy once for a symbol and place the resulting order.
	 */
	run(symbol: string, amount = 10): TradeDecision {
		const prices = this.exchange.getMarketData(symbol);
		const decision = this.context.execute(prices);

		if (decision === "buy") {
			this.exchange.buy(symbol, amount);
		} else if (decision === "sell") {
			this.exchange.sell(symbol, amount);
		} else {
			console.log(`[trading] No action needed for ${symbol}.`);
		}

		return decision;
	}
}
