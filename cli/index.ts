#!/usr/bin/env tsx
/**
 * strategykit CLI entry point.
 * Lists the built-in registries and runs their variants by key.
 */

import { discoverScenarios } from "../core/config.ts";
import { StrategyContext } from "../core/strategy/index.ts";
import {
	CustomerSupport,
	InMemoryExchange,
	TradingBot,
	createBuiltinRegistries,
	createTicket,
	listRegistries,
	runExport,
	type BuiltinRegistries,
	type TradingOptions,
} from "../variants/index.ts";
import {
	parseArgs,
	toNumberList,
	toOptionNumber,
	toOptionString,
	toSortOptions,
	type OptionValue,
} from "./args.ts";
import { runScenario } from "./scenario.ts";

/**
 * Print help message.
 */
function printHelp(): void {
	console.log(`
╭─────────────────────────────────────────────────────────────────╮
│                          STRATEGYKIT                             │
│       Build variants by key, swap them behind a context          │
╰─────────────────────────────────────────────────────────────────╯

Usage:
  strategykit <command> [options]

Commands:
  list                 List every built-in registry and its keys
  draw <shape>         Draw a shape (--color <name>)
  sort                 Sort numbers (--algorithm <key> --numbers <n...> [--order desc])
  tickets              Process the sample support queue (--ordering <key> [--seed n])
  trade                Run a trading strategy once (--strategy <key> --prices <n...>)
                       [--symbol s] [--window-size n] [--min-price n] [--max-price n]
  export               Export with a quality preset (--quality <key> [--folder path])
  run <pattern>        Run every scenario YAML matching a glob pattern
  help                 Show this help message

Examples:
  strategykit list
  strategykit draw circle --color red
  strategykit sort --algorithm merge --numbers 4 2 7 1
  strategykit tickets --ordering random --seed 42
  strategykit trade --strategy minmax --prices 31500 29500 --min-price 30000 --max-price 32000
  strategykit export --quality master --folder /tmp/video
  strategykit run "scenarios/*.yaml"
`);
}

function listCommand(registries: BuiltinRegistries): void {
	for (const registry of listRegistries(registries)) {
		console.log(`\n📦 ${registry.name}`);
		for (const key of registry.listKeys()) {
			const { description } = registry.describe(key);
			console.log(`   ${key.padEnd(16)}${description ?? ""}`);
		}
	}
	console.log("");
}

function drawCommand(registries: BuiltinRegistries, shape: string, options: Record<string, OptionValue>): void {
	const color = toOptionString(options["color"]);
	const context = new StrategyContext<void, string>({
		name: "ShapeContext",
		configuration: color ? { color } : undefined,
	});
	context.select(registries.shapes, shape);
	console.log(context.execute());
}

function sortCommand(registries: BuiltinRegistries, options: Record<string, OptionValue>): void {
	const algorithm = toOptionString(options["algorithm"]) ?? "quick";
	const numbers = toNumberList(options, "numbers");
	const sorter = registries.sorting.create(algorithm, toSortOptions(options));
	console.log(sorter.perform(numbers).join(", "));
}

function ticketsCommand(registries: BuiltinRegistries, options: Record<string, OptionValue>): void {
	const ordering = toOptionString(options["ordering"]) ?? "fifo";
	const seed = toOptionNumber(options, "seed");
	const support = new CustomerSupport(
		registries.tickets.create(ordering, seed === undefined ? undefined : { seed }),
	);

	support.addTicket(createTicket("Zack Ali", "My computer makes strange sounds!"));
	support.addTicket(createTicket("Linus Sebastian", "I can't upload any videos, please help."));
	support.addTicket(createTicket("John Smith", "My editor doesn't automatically solve my bugs."));

	support.processTickets();
}

function tradeCommand(registries: BuiltinRegistries, options: Record<string, OptionValue>): void {
	const strategy = toOptionString(options["strategy"]);
	if (!strategy) {
		throw new Error(`Please specify --strategy (${registries.trading.listKeys().join(", ")})`);
	}
	const symbol = toOptionString(options["symbol"]) ?? "BTC/USD";
	const prices = toNumberList(options, "prices");

	const tradingOptions: TradingOptions = {};
	const windowSize = toOptionNumber(options, "window-size");
	const minPrice = toOptionNumber(options, "min-price");
	const maxPrice = toOptionNumber(options, "max-price");
	if (windowSize !== undefined) tradingOptions.windowSize = windowSize;
	if (minPrice !== undefined) tradingOptions.minPrice = minPrice;
	if (maxPrice !== undefined) tradingOptions.maxPrice = maxPrice;

	const bot = new TradingBot(
		new InMemoryExchange({ [symbol]: prices }),
		registries.trading.create(strategy, tradingOptions),
	);
	console.log(`${symbol}: ${bot.run(symbol)}`);
}

function exportCommand(registries: BuiltinRegistries, options: Record<string, OptionValue>): void {
	const quality = toOptionString(options["quality"]);
	if (!quality) {
		throw new Error(`Please specify --quality (${registries.quality.listKeys().join(", ")})`);
	}
	const folder = toOptionString(options["folder"]) ?? "/tmp/export";
	for (const line of runExport(registries.quality.create(quality), folder)) {
		console.log(line);
	}
}

async function runCommand(registries: BuiltinRegistries, pattern: string): Promise<void> {
	const scenarios = await discoverScenarios(pattern);
	if (scenarios.length === 0) {
		console.log(`No scenario files match ${pattern}`);
		return;
	}

	for (const { file, config } of scenarios) {
		console.log(`\n▶ ${config.name ?? file}`);
		for (const line of runScenario(config, registries)) {
			console.log(`  ${line}`);
		}
	}
	console.log(`\n✅ Ran ${scenarios.length} scenario(s)`);
}

async function main(): Promise<void> {
	const parsed = parseArgs(process.argv);
	const registries = createBuiltinRegistries();

	switch (parsed.command) {
		case "help":
		case "--help":
		case "-h":
			printHelp();
			break;

		case "list":
			listCommand(registries);
			break;

		case "draw":
			if (!parsed.args[0]) {
				console.error("\n❌ Please specify a shape.\n");
				process.exit(1);
			}
			drawCommand(registries, parsed.args[0], parsed.options);
			break;

		case "sort":
			sortCommand(registries, parsed.options);
			break;

		case "tickets":
			ticketsCommand(registries, parsed.options);
			break;

		case "trade":
			tradeCommand(registries, parsed.options);
			break;

		case "export":
			exportCommand(registries, parsed.options);
			break;

		case "run":
			if (!parsed.args[0]) {
				console.error("\n❌ Please specify a scenario file or glob pattern.\n");
				process.exit(1);
			}
			await runCommand(registries, parsed.args[0]);
			break;

		default:
			console.error(`\n❌ Unknown command: ${parsed.command}\n`);
			printHelp();
			process.exit(1);
	}
}

// Run the CLI
main().catch((error: unknown) => {
	console.error("❌ Error:", error instanceof Error ? error.message : error);
	process.exit(1);
});
