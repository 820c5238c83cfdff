import { describe, test, expect } from "vitest";
import { createShapeRegistry, NamedShape } from "./shapes.ts";
import { StrategyContext } from "../core/strategy/index.ts";
import { UnknownKeyError } from "../core/registry/index.ts";

describe("shapes", () => {
	test("circle draws through the registry", () => {
		const registry = createShapeRegistry();

		expect(registry.create("circle").perform()).toBe("Drawing a circle");
	});

	test("circle draws through a context", () => {
		const registry = createShapeRegistry();
		const context = new StrategyContext<void, string>();

		context.setStrategy(registry.create("circle"));

		expect(context.execute()).toBe("Drawing a circle");
	});

	test("lists built-in shapes in registration order", () => {
		expect(createShapeRegistry().listKeys()).toEqual(["circle", "square", "triangle"]);
	});

	test("uses the context color option", () => {
		const context = new StrategyContext({
			strategy: new NamedShape("square"),
			configuration: { color: "red" },
		});

		expect(context.execute()).toBe("Drawing a red square");
	});

	test("ignores a non-string color", () => {
		expect(new NamedShape("triangle").perform(undefined, { color: 7 })).toBe("Drawing a triangle");
	});

	test("unknown shapes fail with UnknownKeyError", () => {
		expect(() => createShapeRegistry().create("hexagon")).toThrow(UnknownKeyError);
	});

	test("host-side fallback to a default key", () => {
		const registry = createShapeRegistry();
		const build = (key: string) => {
			try {
				return registry.create(key);
			} catch (error) {
				if (error instanceof UnknownKeyError) {
					return registry.create("circle");
				}
				throw error;
			}
		};

		expect(build("hexagon").perform()).toBe("Drawing a circle");
	});
});
