// PURITY: SHELL (configuration only)
// INVARIANT: Deterministic test execution without side effects between files

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // tests import describe/it/expect from "vitest"
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// CORE is pure and small; it is held to full coverage
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**", "src/**/*.test.ts"],
			thresholds: {
				"src/core/**/*.ts": {
					branches: 100,
					functions: 100,
					lines: 100,
					statements: 100,
				},
			},
		},

		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
