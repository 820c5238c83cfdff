/**
 * Shape variants - the smallest factory example: each key builds a shape
 * that knows how to describe drawing itself.
 */

import type { Capability, StrategyOptions } from "../core/capability.ts";
import { VariantRegistry } from "../core/factory/index.ts";

export type Shape = Capability<void, string>;

export class NamedShape implements Shape {
	constructor(readonly shapeName: string) {}

	/**
	 * A context-level `color` option is woven into the description.
	 */
	perform(_input: void, options?: StrategyOptions): string {
		const color = typeof options?.color === "string" ? `${options.color} ` : "";
		return `Drawing a ${color}${this.shapeName}`;
	}
}

export function createShapeRegistry(): VariantRegistry<Shape> {
	const registry = new VariantRegistry<Shape>("ShapeRegistry");
	registry.register("circle", () => new NamedShape("circle"), { description: "Round shape" });
	registry.register("square", () => new NamedShape("square"), { description: "Four equal sides" });
	registry.register("triangle", () => new NamedShape("triangle"), { description: "Three sides" });
	return registry;
}
