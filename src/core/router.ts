// PURITY: CORE
// INVARIANT: Early-exit flags take precedence over building, wherever they appear
// COMPLEXITY: O(n) where n = |tokens|

import { Data } from "effect";

import {
	CARGO_SUBCOMMAND_TOKEN,
	EXPLAIN_FLAG,
	HELP_FLAGS,
	VERSION_FLAGS,
} from "./models.js";

/**
 * What the front end does with the captured command line.
 */
export type Route = Data.TaggedEnum<{
	ShowHelp: Record<never, never>;
	ShowVersion: Record<never, never>;
	Explain: { readonly lint: string };
	Build: { readonly args: readonly string[] };
}>;

export const Route = Data.taggedEnum<Route>();

/**
 * Lowercases ASCII letters only; other characters are kept as-is.
 *
 * @pure true
 * @invariant |normalizeLintName(s)| = |s|
 * @complexity O(n)
 */
export function normalizeLintName(lint: string): string {
	return lint.replace(/[A-Z]/g, (letter) => letter.toLowerCase());
}

/**
 * Drops the `rpl` token cargo places before the user's arguments.
 *
 * @pure true
 * @invariant result is tokens or tokens.slice(1)
 * @complexity O(n)
 */
export function builderTokens(tokens: readonly string[]): readonly string[] {
	return tokens[0] === CARGO_SUBCOMMAND_TOKEN ? tokens.slice(1) : tokens;
}

function explainRoute(tokens: readonly string[], position: number): Route {
	const lint = tokens[position + 1];
	return lint === undefined
		? Route.ShowHelp()
		: Route.Explain({ lint: normalizeLintName(lint) });
}

/**
 * Classifies the captured tokens into an early exit or a build.
 *
 * Precedence: help, then version, then `--explain`. A trailing
 * `--explain` with nothing after it shows help.
 *
 * @param tokens - Command line without the runtime and script entries
 *
 * @pure true
 * @invariant ∃ t ∈ tokens: t ∈ HELP_FLAGS → result = ShowHelp
 * @postcondition result._tag = "Build" → result.args = builderTokens(tokens)
 * @complexity O(n) where n = |tokens|
 *
 * @example
 * ```ts
 * routeArgs(["rpl", "--explain", "Unsafe_Cell"]);
 * // Route.Explain({ lint: "unsafe_cell" })
 * ```
 */
export function routeArgs(tokens: readonly string[]): Route {
	if (tokens.some((t) => HELP_FLAGS.includes(t))) {
		return Route.ShowHelp();
	}
	if (tokens.some((t) => VERSION_FLAGS.includes(t))) {
		return Route.ShowVersion();
	}
	const explainAt = tokens.indexOf(EXPLAIN_FLAG);
	if (explainAt !== -1) {
		return explainRoute(tokens, explainAt);
	}
	return Route.Build({ args: builderTokens(tokens) });
}
