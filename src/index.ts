// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or the APP entry
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Programmatic entry: handles an argv-shaped array and returns the exit code.
 *
 * @example
 * ```typescript
 * import { main } from "cargo-rpl";
 *
 * const exitCode = main(["node", "cargo-rpl", "rpl", "--fix"]);
 * ```
 */
export { defaultDependencies, main } from "./main.js";
export {
	type AppDependencies,
	runBuild,
	runCargoRpl,
} from "./app/runCargoRpl.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES AND FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	CargoSubcommand,
	ExitCode,
	Invocation,
	OrchestratorCommand,
	Platform,
	SubprocessOutcome,
} from "./core/models.js";
export {
	ANALYSIS_ARGS_DELIMITER,
	ANALYSIS_ARGS_ENV_VAR,
	WRAPPER_ENV_VAR,
} from "./core/models.js";

/**
 * Receiving side of the `RPL_ARGS` channel, for the analysis driver.
 *
 * @pure true
 */
export {
	parseAnalysisArgs,
	serializeAnalysisArgs,
} from "./core/analysis-args.js";
export { buildOrchestratorCommand } from "./core/command.js";
export { computeExitCode } from "./core/decision.js";
export { siblingExecutablePath } from "./core/driver-path.js";
export {
	InvalidSettings,
	LaunchFailed,
	ManifestUnreadable,
} from "./core/errors.js";
export { buildInvocation } from "./core/invocation.js";
export { Route, routeArgs } from "./core/router.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL SEAMS (for embedding and tests)
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type DriverLocator,
	fixedDriverLocator,
	processDriverLocator,
} from "./shell/process/driver-locator.js";
export { createSpawnRunner, type ProcessRunner } from "./shell/process/spawn.js";
