/**
 * Command line argument parsing for the strategykit CLI.
 */

import { formatZodError } from "../core/config.ts";
import { SortOptionsSchema, type SortOptions } from "../variants/index.ts";

export type OptionValue = string | string[] | boolean;

export interface ParsedArgs {
	command: string;
	args: string[];
	options: Record<string, OptionValue>;
}

/**
 * Safely convert an option value to a string array.
 * Splits comma-separated values (e.g., "a,b,c" → ["a", "b", "c"]).
 */
export function toStringArray(value: OptionValue | undefined): string[] | undefined {
	if (value === undefined || typeof value === "boolean") return undefined;
	const values = Array.isArray(value) ? value : [value];
	return values.flatMap((v) => v.split(",").map((s) => s.trim())).filter(Boolean);
}

export function toOptionString(value: OptionValue | undefined): string | undefined {
	if (typeof value === "string") return value;
	if (Array.isArray(value)) return value[0];
	return undefined;
}

function toNumber(name: string, value: string): number {
	const parsed = Number(value);
	if (!Number.isFinite(parsed)) {
		throw new Error(`--${name} expects numbers, got "${value}"`);
	}
	return parsed;
}

export function toOptionNumber(options: Record<string, OptionValue>, name: string): number | undefined {
	const value = toOptionString(options[name]);
	return value === undefined ? undefined : toNumber(name, value);
}

export function toNumberList(options: Record<string, OptionValue>, name: string): number[] {
	return (toStringArray(options[name]) ?? []).map((v) => toNumber(name, v));
}

/**
 * Validate --order against the sort option schema.
 * @throws Error listing the accepted values
 */
export function toSortOptions(options: Record<string, OptionValue>): SortOptions | undefined {
	const order = toOptionString(options["order"]);
	if (order === undefined) return undefined;

	const result = SortOptionsSchema.safeParse({ order });
	if (!result.success) {
		throw new Error(formatZodError(result.error, "--order"));
	}
	return result.data;
}

// Negative numbers are values, not flags
function isFlag(arg: string): boolean {
	return arg.startsWith("-") && !/^-\d/.test(arg);
}

/**
 * Parse command line arguments into a command, positional args and options.
 * An option collects every following value up to the next flag.
 */
export function parseArgs(argv: string[]): ParsedArgs {
	const args = argv.slice(2);
	const command = args[0] ?? "help";
	const restArgs: string[] = [];
	const options: Record<string, OptionValue> = {};

	for (let i = 1; i < args.length; i++) {
		const arg = args[i];

		if (!arg) continue;

		if (arg.startsWith("--")) {
			const key = arg.slice(2);
			const nextArg = args[i + 1];

			// Check if it's a boolean flag or has a value
			if (!nextArg || isFlag(nextArg)) {
				options[key] = true;
			} else {
				// Collect multiple values for array options
				const values: string[] = [];
				let next = args[i + 1];
				while (next !== undefined && next !== "" && !isFlag(next)) {
					values.push(next);
					i++;
					next = args[i + 1];
				}
				options[key] = values.length === 1 ? values[0]! : values;
			}
		} else {
			restArgs.push(arg);
		}
	}

	return { command, args: restArgs, options };
}
