/**
 * Scenario configuration for strategykit.
 * Defines Zod schemas for scenario YAML files and the loaders that read them.
 */

import { readFile } from "node:fs/promises";
import { glob } from "glob";
import { parse } from "yaml";
import { z, type ZodError } from "zod";

// ============================================================================
// Scenario Schema
// ============================================================================

// Interpolation yields strings, so numeric fields accept "42" as well as 42
const numeric = () => z.coerce.number();

const ShapeSectionSchema = z.object({
	name: z.string(),
	color: z.string().optional(),
});

const SortSectionSchema = z.object({
	algorithm: z.string().default("quick"),
	order: z.enum(["asc", "desc"]).optional(),
	numbers: z.array(numeric()),
});

const TicketSchema = z.object({
	customer: z.string(),
	issue: z.string(),
});

const TicketsSectionSchema = z.object({
	ordering: z.string().default("fifo"),
	seed: numeric().int().optional(),
	items: z.array(TicketSchema).default([]),
});

const TradingSectionSchema = z.object({
	strategy: z.string(),
	options: z
		.object({
			windowSize: numeric().optional(),
			minPrice: numeric().optional(),
			maxPrice: numeric().optional(),
		})
		.optional(),
	symbol: z.string().default("BTC/USD"),
	amount: numeric().positive().default(10),
	prices: z.array(numeric()).min(1),
});

const ExportSectionSchema = z.object({
	quality: z.string(),
	folder: z.string().default("/tmp/export"),
});

export const ScenarioConfigSchema = z.object({
	name: z.string().optional(),
	shape: ShapeSectionSchema.optional(),
	sort: SortSectionSchema.optional(),
	tickets: TicketsSectionSchema.optional(),
	trading: TradingSectionSchema.optional(),
	export: ExportSectionSchema.optional(),
});

export type ScenarioConfig = z.infer<typeof ScenarioConfigSchema>;

// ============================================================================
// Errors
// ============================================================================

/**
 * Error thrown when a scenario file cannot be read, parsed or validated.
 */
export class ConfigError extends Error {
	constructor(
		message: string,
		public readonly source: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "ConfigError";
	}
}

/**
 * Format Zod validation errors for user-friendly display.
 */
export function formatZodError(error: ZodError, source: string): string {
	const issues = error.issues.map((issue) => {
		const path = issue.path.join(".");
		return `  - ${path ? `${path}: ` : ""}${issue.message}`;
	});
	return `Validation failed for ${source}:\n${issues.join("\n")}`;
}

// ============================================================================
// Environment Interpolation
// ============================================================================

/**
 * Interpolate environment variables in a string.
 * Supports ${VAR} and ${VAR:-default} syntax.
 */
export function interpolateEnvVars(value: string): string {
	return value.replace(
		/\$\{(\w+)(?::-([^}]*))?\}/g,
		(match: string, name: string, defaultValue?: string) => {
			const envVal = process.env[name];
			if (envVal !== undefined && envVal !== "") {
				return envVal;
			}

			if (defaultValue !== undefined) {
				return defaultValue;
			}

			// Unset without default: leave the placeholder visible
			return match;
		},
	);
}

/**
 * Recursively interpolate environment variables in an object.
 */
function interpolateEnvVarsInObject(obj: unknown): unknown {
	if (typeof obj === "string") {
		return interpolateEnvVars(obj);
	}
	if (Array.isArray(obj)) {
		return obj.map((item) => interpolateEnvVarsInObject(item));
	}
	if (obj !== null && typeof obj === "object") {
		const result: Record<string, unknown> = {};
		for (const [key, value] of Object.entries(obj)) {
			result[key] = interpolateEnvVarsInObject(value);
		}
		return result;
	}
	return obj;
}

// ============================================================================
// Loaders
// ============================================================================

/**
 * Parse and validate scenario YAML.
 * @param source - File name or label used in error messages
 * @throws ConfigError on invalid YAML or a schema violation
 */
export function parseScenarioConfig(text: string, source = "<inline>"): ScenarioConfig {
	let raw: unknown;
	try {
		raw = parse(text);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new ConfigError(`Invalid YAML in ${source}: ${reason}`, source, { cause: error });
	}

	const result = ScenarioConfigSchema.safeParse(interpolateEnvVarsInObject(raw ?? {}));
	if (!result.success) {
		throw new ConfigError(formatZodError(result.error, source), source, { cause: result.error });
	}
	return result.data;
}

/**
 * Read and validate one scenario file.
 * @throws ConfigError if the file cannot be read or is invalid
 */
export async function loadScenarioConfig(path: string): Promise<ScenarioConfig> {
	let content: string;
	try {
		content = await readFile(path, "utf8");
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new ConfigError(`Failed to read scenario config ${path}: ${reason}`, path, { cause: error });
	}
	return parseScenarioConfig(content, path);
}

export interface LoadedScenario {
	file: string;
	config: ScenarioConfig;
}

/**
 * Load every scenario file matching a glob pattern, sorted by path.
 * @throws ConfigError on the first file that fails to load
 */
export async function discoverScenarios(pattern: string): Promise<LoadedScenario[]> {
	const files = (await glob(pattern)).sort();
	const scenarios: LoadedScenario[] = [];
	for (const file of files) {
		scenarios.push({ file, config: await loadScenarioConfig(file) });
	}
	return scenarios;
}
