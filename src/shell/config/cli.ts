// PURITY: SHELL (argv boundary)
// INVARIANT: process.argv is read once, by the caller, and never again
// COMPLEXITY: O(n) where n = |argv|

/**
 * Captured command line, owned by the run that captured it.
 */
export interface CliArgs {
	/** Everything after the runtime and script entries */
	readonly tokens: readonly string[];
}

/**
 * Copies the user's tokens out of an argv-shaped array.
 *
 * @example
 * ```ts
 * // Command: cargo rpl --fix -- -D some_lint
 * // argv: ["node", "/usr/bin/cargo-rpl", "rpl", "--fix", "--", "-D", "some_lint"]
 * captureCliArgs(process.argv).tokens;
 * // ["rpl", "--fix", "--", "-D", "some_lint"]
 * ```
 */
export function captureCliArgs(argv: readonly string[]): CliArgs {
	return { tokens: Object.freeze(argv.slice(2)) };
}
