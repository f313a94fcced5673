// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value; typed errors become exit codes here and nowhere else
// COMPLEXITY: O(1) plus the run itself

import { Effect } from "effect";

import { type AppDependencies, runCargoRpl } from "./app/runCargoRpl.js";
import {
	type ExitCode,
	INVALID_SETTINGS_EXIT_CODE,
	LAUNCH_FAILURE_EXIT_CODE,
} from "./core/models.js";
import { captureCliArgs } from "./shell/config/cli.js";
import { readPackageInfo } from "./shell/config/package-info.js";
import { DEFAULT_LOG_LEVEL, resolveLogLevel } from "./shell/config/settings.js";
import { StderrLoggerLive, withLogging } from "./shell/logging/logger.js";
import {
	reportInvalidSettings,
	reportLaunchFailure,
} from "./shell/output/console.js";
import { processDriverLocator } from "./shell/process/driver-locator.js";
import { createSpawnRunner } from "./shell/process/spawn.js";

/**
 * Real process-backed dependencies for the given argv.
 */
export function defaultDependencies(argv: readonly string[]): AppDependencies {
	return {
		runner: createSpawnRunner(),
		locator: processDriverLocator(argv),
		packageInfo: readPackageInfo(),
	};
}

const logLevel = resolveLogLevel.pipe(
	Effect.catchTag("InvalidSettings", (error) =>
		Effect.logWarning(error.detail).pipe(Effect.as(DEFAULT_LOG_LEVEL)),
	),
);

/**
 * Entry for programmatic usage (without terminating the process).
 *
 * @param argv - argv-shaped array: runtime, script, then the user's tokens
 * @returns ExitCode for the caller to exit with
 *
 * @example
 * ```ts
 * // cargo rpl --fix
 * const code = main(["node", "/usr/bin/cargo-rpl", "rpl", "--fix"]);
 * ```
 */
export function main(
	argv: readonly string[],
	deps: AppDependencies = defaultDependencies(argv),
): ExitCode {
	const { tokens } = captureCliArgs(argv);

	const program = logLevel.pipe(
		Effect.flatMap((level) => runCargoRpl(tokens, deps).pipe(withLogging(level))),
		Effect.catchTags({
			LaunchFailed: (error) =>
				reportLaunchFailure(error).pipe(Effect.as(LAUNCH_FAILURE_EXIT_CODE)),
			InvalidSettings: (error) =>
				reportInvalidSettings(error).pipe(
					Effect.as(INVALID_SETTINGS_EXIT_CODE),
				),
		}),
		Effect.provide(StderrLoggerLive),
	);

	return Effect.runSync(program);
}
