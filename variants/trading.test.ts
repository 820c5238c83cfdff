import { describe, test, expect, afterEach, vi } from "vitest";
import {
	AverageTradingStrategy,
	MinMaxTradingStrategy,
	InMemoryExchange,
	TradingBot,
	createTradingRegistry,
} from "./trading.ts";
import { ConstructionError } from "../core/factory/index.ts";
import { NoStrategySelectedError } from "../core/strategy/index.ts";

describe("trading", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	describe("AverageTradingStrategy", () => {
		const strategy = new AverageTradingStrategy();

		test("compares the last price to the window mean", () => {
			expect(strategy.perform([30, 20, 10])).toBe("buy");
			expect(strategy.perform([10, 20, 30])).toBe("sell");
			expect(strategy.perform([10, 10, 10])).toBe("hold");
		});

		test("only looks at the last windowSize prices", () => {
			expect(strategy.perform([100, 1, 2, 3])).toBe("sell");
			expect(new AverageTradingStrategy({ windowSize: 4 }).perform([100, 1, 2, 3])).toBe("buy");
		});

		test("holds on an empty series", () => {
			expect(strategy.perform([])).toBe("hold");
		});
	});

	describe("MinMaxTradingStrategy", () => {
		test("uses the default price band", () => {
			const strategy = new MinMaxTradingStrategy();

			expect(strategy.perform([31000])).toBe("buy");
			expect(strategy.perform([34000])).toBe("sell");
			expect(strategy.perform([32500])).toBe("hold");
		});

		test("uses the configured price band", () => {
			const strategy = new MinMaxTradingStrategy({ minPrice: 30000, maxPrice: 32000 });

			expect(strategy.perform([31000])).toBe("hold");
			expect(strategy.perform([29000])).toBe("buy");
			expect(strategy.perform([32001])).toBe("sell");
		});
	});

	describe("registry", () => {
		const registry = createTradingRegistry();

		test("builds strategies with their own options", () => {
			const strategy = registry.create("minmax", { minPrice: 30000, maxPrice: 32000 });

			expect(strategy).toBeInstanceOf(MinMaxTradingStrategy);
			expect(strategy.perform([31000])).toBe("hold");
		});

		test("rejects an inverted price band", () => {
			expect(() => registry.create("minmax", { minPrice: 40000 })).toThrow(ConstructionError);
		});

		test("rejects options meant for another strategy", () => {
			expect(() => registry.create("average", { minPrice: 1 })).toThrow(ConstructionError);
			expect(() => registry.create("average", { windowSize: 0 })).toThrow(ConstructionError);
		});
	});

	describe("TradingBot", () => {
		test("places orders from the selected strategy and swaps strategies", () => {
			const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
			const exchange = new InMemoryExchange({ "BTC/USD": [33000, 31000] });
			const bot = new TradingBot(exchange, new MinMaxTradingStrategy({ minPrice: 30000, maxPrice: 32000 }));

			expect(bot.run("BTC/USD")).toBe("hold");
			expect(log).toHaveBeenCalledWith("[trading] No action needed for BTC/USD.");
			expect(exchange.orders).toEqual([]);

			bot.setStrategy(new AverageTradingStrategy());
			expect(bot.run("BTC/USD", 2)).toBe("buy");
			expect(exchange.orders).toEqual([{ side: "buy", symbol: "BTC/USD", amount: 2 }]);
		});

		test("sells with the default amount", () => {
			const exchange = new InMemoryExchange({ "ETH/USD": [1, 2, 3] });
			const bot = new TradingBot(exchange, new AverageTradingStrategy());

			expect(bot.run("ETH/USD")).toBe("sell");
			expect(exchange.orders).toEqual([{ side: "sell", symbol: "ETH/USD", amount: 10 }]);
		});

		test("requires a strategy", () => {
			const bot = new TradingBot(new InMemoryExchange({ "BTC/USD": [1] }));

			expect(() => bot.run("BTC/USD")).toThrow(NoStrategySelectedError);
		});

		test("surfaces missing market data", () => {
			const bot = new TradingBot(new InMemoryExchange({}), new AverageTradingStrategy());

			expect(() => bot.run("DOGE/USD")).toThrow('No market data for symbol "DOGE/USD"');
		});
	});
});
