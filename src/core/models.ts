// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Cargo subcommand the orchestrator is asked to run.
 *
 * @remarks
 * - `check` is the default dry run
 * - `fix` applies lint suggestions and implies {@link NO_DEPS_FLAG}
 */
export type CargoSubcommand = "check" | "fix";

export const DEFAULT_SUBCOMMAND: CargoSubcommand = "check";

/** Selects the `fix` subcommand; never forwarded. */
export const FIX_FLAG = "--fix";

/** Analysis-only flag: lint the given crate without its dependencies. */
export const NO_DEPS_FLAG = "--no-deps";

/** Everything after this token goes to the analysis tool untouched. */
export const ARGS_SEPARATOR = "--";

/** Token cargo inserts when it runs `cargo-rpl rpl ...`. */
export const CARGO_SUBCOMMAND_TOKEN = "rpl";

export const HELP_FLAGS: readonly string[] = ["-h", "--help"];
export const VERSION_FLAGS: readonly string[] = ["-V", "--version"];
export const EXPLAIN_FLAG = "--explain";

/** Compiler-wrapper variable read by cargo for workspace members. */
export const WRAPPER_ENV_VAR = "RUSTC_WORKSPACE_WRAPPER";

/** Serialized analysis argument list read by the driver. */
export const ANALYSIS_ARGS_ENV_VAR = "RPL_ARGS";

/**
 * Joins analysis arguments inside {@link ANALYSIS_ARGS_ENV_VAR}.
 * An argument that contains this text, or ends with a proper prefix of it
 * (`x__RPL_HACKERY_`), can be split at the wrong place by the receiver.
 */
export const ANALYSIS_ARGS_DELIMITER = "__RPL_HACKERY__";

export const DEFAULT_ORCHESTRATOR = "cargo";
export const DRIVER_EXECUTABLE_NAME = "rpl-driver";

/**
 * Process exit status.
 *
 * @remarks
 * - 0 on success and on every early exit
 * - the child's own status on failure
 * - {@link ABNORMAL_EXIT_CODE} when the child left no status
 */
export type ExitCode = number;

export const SUCCESS_EXIT_CODE: ExitCode = 0;
export const ABNORMAL_EXIT_CODE: ExitCode = -1;
export const LAUNCH_FAILURE_EXIT_CODE: ExitCode = 101;
export const INVALID_SETTINGS_EXIT_CODE: ExitCode = 1;

/**
 * Partitioned command line for one run.
 *
 * @remarks
 * - @invariant orchestratorArgs and analysisArgs preserve input order
 * - @invariant subcommand === "fix" → analysisArgs includes NO_DEPS_FLAG
 */
export interface Invocation {
	readonly subcommand: CargoSubcommand;
	readonly orchestratorArgs: readonly string[];
	readonly analysisArgs: readonly string[];
}

/**
 * Fully specified orchestrator process: program, argv and the
 * environment entries added on top of the parent's.
 */
export interface OrchestratorCommand {
	readonly program: string;
	readonly args: readonly string[];
	readonly environment: Readonly<Record<string, string>>;
}

/**
 * How the orchestrator process ended.
 *
 * @remarks
 * - status is null when the process was terminated by a signal
 */
export interface SubprocessOutcome {
	readonly status: number | null;
	readonly signal: string | null;
}

/** Platform names the sibling-path resolver distinguishes. */
export type Platform = "win32" | "posix";
