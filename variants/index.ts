/**
 * Built-in variant families.
 */

export * from "./shapes.ts";
export * from "./sorting.ts";
export * from "./tickets.ts";
export * from "./trading.ts";
export * from "./exporters.ts";

import type { VariantRegistry } from "../core/factory/index.ts";
import { createShapeRegistry } from "./shapes.ts";
import { createSortRegistry } from "./sorting.ts";
import { createOrderingRegistry } from "./tickets.ts";
import { createTradingRegistry } from "./trading.ts";
import {
	createVideoExporterRegistry,
	createAudioExporterRegistry,
	createQualityRegistry,
} from "./exporters.ts";

export interface BuiltinRegistries {
	shapes: ReturnType<typeof createShapeRegistry>;
	sorting: ReturnType<typeof createSortRegistry>;
	tickets: ReturnType<typeof createOrderingRegistry>;
	trading: ReturnType<typeof createTradingRegistry>;
	video: ReturnType<typeof createVideoExporterRegistry>;
	audio: ReturnType<typeof createAudioExporterRegistry>;
	quality: ReturnType<typeof createQualityRegistry>;
}

/**
 * Fresh, isolated instances of every built-in registry.
 */
export function createBuiltinRegistries(): BuiltinRegistries {
	const video = createVideoExporterRegistry();
	const audio = createAudioExporterRegistry();
	return {
		shapes: createShapeRegistry(),
		sorting: createSortRegistry(),
		tickets: createOrderingRegistry(),
		trading: createTradingRegistry(),
		video,
		audio,
		quality: createQualityRegistry(video, audio),
	};
}

export type RegistryListing = Pick<VariantRegistry<object>, "name" | "listKeys" | "describe">;

/**
 * Registries as a flat list, for listings.
 */
export function listRegistries(registries: BuiltinRegistries): RegistryListing[] {
	return Object.values(registries);
}
