// PURITY: CORE
// FORMAT THEOREM: ∀ xs: (∀ x ∈ xs: DELIM ∉ x ∧ ¬endsWithProperPrefix(x, DELIM)) → parseAnalysisArgs(serializeAnalysisArgs(xs)) = xs
// INVARIANT: Every argument is followed by exactly one delimiter
// COMPLEXITY: O(n) where n = total length of the arguments

import { ANALYSIS_ARGS_DELIMITER } from "./models.js";

/**
 * Encodes the analysis arguments for the `RPL_ARGS` variable.
 *
 * @pure true
 * @invariant serializeAnalysisArgs([]) = ""
 * @complexity O(n)
 *
 * @example
 * ```ts
 * serializeAnalysisArgs(["--no-deps", "-D", "x"]);
 * // "--no-deps__RPL_HACKERY__-D__RPL_HACKERY__x__RPL_HACKERY__"
 * ```
 */
export function serializeAnalysisArgs(args: readonly string[]): string {
	return args.map((arg) => `${arg}${ANALYSIS_ARGS_DELIMITER}`).join("");
}

/**
 * Decodes `RPL_ARGS` back into the ordered argument list. This is the
 * receiving side of {@link serializeAnalysisArgs}, used by the driver.
 *
 * @pure true
 * @invariant parseAnalysisArgs("") = []
 * @complexity O(n)
 */
export function parseAnalysisArgs(serialized: string): readonly string[] {
	if (serialized.length === 0) return [];
	const parts = serialized.split(ANALYSIS_ARGS_DELIMITER);
	// the trailing delimiter leaves one empty segment at the end
	return parts[parts.length - 1] === "" ? parts.slice(0, -1) : parts;
}
