import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["core/**/*.test.ts", "variants/**/*.test.ts", "cli/**/*.test.ts"],
		environment: "node",
	},
});
