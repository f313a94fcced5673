// INVARIANT: Early-exit flags win wherever they appear; Build carries the builder tokens

import { describe, expect, it } from "vitest";

import {
	builderTokens,
	normalizeLintName,
	Route,
	routeArgs,
} from "../../src/core/router.js";

describe("routeArgs: early exits", () => {
	it.each([["-h"], ["--help"]])("%s shows help", (flag): void => {
		expect(routeArgs(["rpl", flag])).toEqual(Route.ShowHelp());
	});

	it.each([["-V"], ["--version"]])("%s shows version", (flag): void => {
		expect(routeArgs(["rpl", flag])).toEqual(Route.ShowVersion());
	});

	it("finds help after the separator and after other flags", (): void => {
		expect(routeArgs(["rpl", "--fix", "--", "-h"])._tag).toBe("ShowHelp");
	});

	it("help takes precedence over version and explain", (): void => {
		expect(routeArgs(["--version", "--explain", "x", "--help"])._tag).toBe(
			"ShowHelp",
		);
	});

	it("version takes precedence over explain", (): void => {
		expect(routeArgs(["--explain", "x", "-V"])._tag).toBe("ShowVersion");
	});

	it("--explain lowercases the lint name", (): void => {
		expect(routeArgs(["rpl", "--explain", "Unsafe_CELL"])).toEqual(
			Route.Explain({ lint: "unsafe_cell" }),
		);
	});

	it("--explain without a lint name falls back to help", (): void => {
		expect(routeArgs(["rpl", "--explain"])).toEqual(Route.ShowHelp());
	});

	it("--explain uses the token right after its first occurrence", (): void => {
		expect(routeArgs(["--explain", "A", "--explain", "B"])).toEqual(
			Route.Explain({ lint: "a" }),
		);
	});
});

describe("routeArgs: build", () => {
	it("no tokens builds with no arguments", (): void => {
		expect(routeArgs([])).toEqual(Route.Build({ args: [] }));
	});

	it("strips the leading rpl subcommand token", (): void => {
		expect(routeArgs(["rpl", "--manifest-path", "x/Cargo.toml"])).toEqual(
			Route.Build({ args: ["--manifest-path", "x/Cargo.toml"] }),
		);
	});
});

describe("Route", () => {
	it("early-exit routes carry no fields besides their tag", (): void => {
		expect(Object.keys(Route.ShowHelp())).toEqual(["_tag"]);
		expect(Object.keys(Route.ShowVersion())).toEqual(["_tag"]);
	});
});

describe("builderTokens", () => {
	it("keeps everything when run directly without the rpl token", (): void => {
		expect(builderTokens(["--fix"])).toEqual(["--fix"]);
	});

	it("removes only the first rpl token", (): void => {
		expect(builderTokens(["rpl", "rpl"])).toEqual(["rpl"]);
	});
});

describe("normalizeLintName", () => {
	it("folds ASCII letters only", (): void => {
		expect(normalizeLintName("Ünsafe-LINT_9")).toBe("Ünsafe-lint_9");
	});
});
