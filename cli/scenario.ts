/**
 * Scenario runner - drives every built-in variant family from a scenario
 * config and collects one output line per step.
 */

import type { ScenarioConfig } from "../core/config.ts";
import { StrategyContext } from "../core/strategy/index.ts";
import {
	CustomerSupport,
	InMemoryExchange,
	TradingBot,
	createTicket,
	runExport,
	seededRandom,
	type BuiltinRegistries,
} from "../variants/index.ts";

export function runScenario(config: ScenarioConfig, registries: BuiltinRegistries): string[] {
	const lines: string[] = [];

	if (config.shape) {
		const { name, color } = config.shape;
		const context = new StrategyContext<void, string>({
			name: "ShapeContext",
			configuration: color ? { color } : undefined,
		});
		context.select(registries.shapes, name);
		lines.push(`[shape] ${context.execute()}`);
	}

	if (config.sort) {
		const { algorithm, order, numbers } = config.sort;
		const sorter = registries.sorting.create(algorithm, order ? { order } : undefined);
		lines.push(`[sort] ${algorithm}: ${sorter.perform(numbers).join(", ")}`);
	}

	if (config.tickets) {
		const { ordering, seed, items } = config.tickets;
		// A seed also makes ticket ids repeatable
		const random = seed === undefined ? undefined : seededRandom(seed);
		const support = new CustomerSupport(
			registries.tickets.create(ordering, seed === undefined ? undefined : { seed }),
		);
		for (const item of items) {
			support.addTicket(createTicket(item.customer, item.issue, random));
		}
		const processed = support.processTickets();
		lines.push(`[support] ${ordering}: processed ${processed.length} ticket(s)`);
	}

	if (config.trading) {
		const { strategy, options, symbol, amount, prices } = config.trading;
		const exchange = new InMemoryExchange({ [symbol]: prices });
		const bot = new TradingBot(exchange, registries.trading.create(strategy, options));
		lines.push(`[trading] ${strategy} ${symbol}: ${bot.run(symbol, amount)}`);
	}

	if (config.export) {
		const { quality, folder } = config.export;
		for (const line of runExport(registries.quality.create(quality), folder)) {
			lines.push(`[export] ${line}`);
		}
	}

	return lines;
}
