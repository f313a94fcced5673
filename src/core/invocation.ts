// PURITY: CORE
// FORMAT THEOREM: ∀ ts: tokens(ts) = consumed(--fix) ⊎ orchestratorArgs ⊎ analysisArgs \ synthesized(--no-deps)
// INVARIANT: Tokens after the first separator are never interpreted
// COMPLEXITY: O(n) time / O(n) space where n = |tokens|

import {
	ARGS_SEPARATOR,
	type CargoSubcommand,
	DEFAULT_SUBCOMMAND,
	FIX_FLAG,
	type Invocation,
	NO_DEPS_FLAG,
} from "./models.js";

interface ScanState {
	subcommand: CargoSubcommand;
	readonly orchestratorArgs: string[];
	readonly analysisArgs: string[];
}

/**
 * Handles one token before the separator.
 * Returns false when the separator was reached and the scan must stop.
 */
function scanToken(token: string, state: ScanState): boolean {
	if (token === FIX_FLAG) {
		state.subcommand = "fix";
		return true;
	}
	if (token === NO_DEPS_FLAG) {
		state.analysisArgs.push(token);
		return true;
	}
	if (token === ARGS_SEPARATOR) {
		return false;
	}
	state.orchestratorArgs.push(token);
	return true;
}

/**
 * Partitions the user's tokens into a cargo subcommand, cargo arguments
 * and analysis-tool arguments.
 *
 * @param tokens - Arguments with the program name and `rpl` token removed
 * @returns Invocation; never fails, `[]` yields `check` with empty lists
 *
 * @pure true
 * @invariant FIX_FLAG ∈ tokens before the separator ↔ subcommand = "fix"
 * @invariant subcommand = "fix" → count(NO_DEPS_FLAG, analysisArgs) ≥ 1, and the
 *   synthesized flag is added only when the count would otherwise be 0
 * @complexity O(n) where n = |tokens|
 *
 * @example
 * ```ts
 * buildInvocation(["--fix", "--", "--no-deps"]);
 * // { subcommand: "fix", orchestratorArgs: [], analysisArgs: ["--no-deps"] }
 * ```
 */
export function buildInvocation(tokens: readonly string[]): Invocation {
	const state: ScanState = {
		subcommand: DEFAULT_SUBCOMMAND,
		orchestratorArgs: [],
		analysisArgs: [],
	};

	let index = 0;
	for (; index < tokens.length; index += 1) {
		const token = tokens[index] ?? "";
		if (!scanToken(token, state)) break;
	}

	state.analysisArgs.push(...tokens.slice(index + 1));

	if (state.subcommand === "fix" && !state.analysisArgs.includes(NO_DEPS_FLAG)) {
		state.analysisArgs.push(NO_DEPS_FLAG);
	}

	return {
		subcommand: state.subcommand,
		orchestratorArgs: state.orchestratorArgs,
		analysisArgs: state.analysisArgs,
	};
}
