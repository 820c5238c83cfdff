import { describe, test, expect } from "vitest";
import { parseArgs, toNumberList, toOptionNumber, toSortOptions } from "./args.ts";
import { createSortRegistry } from "../variants/index.ts";

const argv = (...args: string[]) => ["node", "strategykit", ...args];

describe("parseArgs", () => {
	test("splits command, positional args, valued options and boolean flags", () => {
		expect(parseArgs(argv("draw", "circle", "--color", "red", "--verbose"))).toEqual({
			command: "draw",
			args: ["circle"],
			options: { color: "red", verbose: true },
		});
	});

	test("defaults to help without a command", () => {
		expect(parseArgs(argv()).command).toBe("help");
	});

	test("collects negative numbers as option values", () => {
		const parsed = parseArgs(argv("sort", "--algorithm", "merge", "--numbers", "4", "-2", "7", "1"));

		expect(parsed.args).toEqual([]);
		expect(parsed.options).toEqual({ algorithm: "merge", numbers: ["4", "-2", "7", "1"] });
		expect(toNumberList(parsed.options, "numbers")).toEqual([4, -2, 7, 1]);
	});

	test("accepts a negative number as a single value", () => {
		const parsed = parseArgs(argv("tickets", "--seed", "-5", "--ordering", "random"));

		expect(toOptionNumber(parsed.options, "seed")).toBe(-5);
		expect(parsed.options["ordering"]).toBe("random");
	});

	test("stops collecting at the next flag", () => {
		const parsed = parseArgs(argv("sort", "--numbers", "3", "-1.5", "--order", "desc"));

		expect(parsed.options).toEqual({ numbers: ["3", "-1.5"], order: "desc" });
	});

	test("sorts numbers read from the command line", () => {
		const parsed = parseArgs(argv("sort", "--algorithm", "merge", "--numbers", "4", "-2", "7", "1"));
		const sorter = createSortRegistry().create("merge", toSortOptions(parsed.options));

		expect(sorter.perform(toNumberList(parsed.options, "numbers"))).toEqual([-2, 1, 4, 7]);
	});

	test("rejects numbers that do not parse", () => {
		const parsed = parseArgs(argv("sort", "--numbers", "4", "x"));

		expect(() => toNumberList(parsed.options, "numbers")).toThrow('--numbers expects numbers, got "x"');
	});
});

describe("toSortOptions", () => {
	test("returns undefined without --order", () => {
		expect(toSortOptions({})).toBeUndefined();
	});

	test("accepts asc and desc", () => {
		expect(toSortOptions({ order: "desc" })).toEqual({ order: "desc" });
		expect(toSortOptions({ order: "asc" })).toEqual({ order: "asc" });
	});

	test("rejects an unknown order instead of sorting ascending", () => {
		expect(() => toSortOptions({ order: "down" })).toThrow(/^Validation failed for --order:\n {2}- order: /);
	});
});
