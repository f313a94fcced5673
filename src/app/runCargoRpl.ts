// PURITY: APP (no process.exit here; composes CORE decisions with SHELL effects)
// EFFECT: Effect<ExitCode, LaunchFailed | InvalidSettings>
// INVARIANT: Early-exit routes never reach the process runner
// COMPLEXITY: O(n) where n = |tokens|, plus the orchestrator's running time

import { Effect } from "effect";
import { match } from "ts-pattern";

import { buildOrchestratorCommand, describeCommand } from "../core/command.js";
import { computeExitCode } from "../core/decision.js";
import type { InvalidSettings, LaunchFailed } from "../core/errors.js";
import type { PackageInfo } from "../core/help.js";
import { buildInvocation } from "../core/invocation.js";
import { type ExitCode, SUCCESS_EXIT_CODE } from "../core/models.js";
import { type Route, routeArgs } from "../core/router.js";
import { resolveOrchestrator } from "../shell/config/settings.js";
import { printHelp, printVersion } from "../shell/output/console.js";
import type { DriverLocator } from "../shell/process/driver-locator.js";
import type { ProcessRunner } from "../shell/process/spawn.js";

/**
 * Everything the app touches outside the pure core.
 */
export interface AppDependencies {
	readonly runner: ProcessRunner;
	readonly locator: DriverLocator;
	readonly packageInfo: Effect.Effect<PackageInfo>;
}

type RunError = LaunchFailed | InvalidSettings;

/**
 * Builds the cargo command for `args`, runs it and maps its outcome.
 *
 * @pure false (spawns the orchestrator)
 * @effect Effect<ExitCode, LaunchFailed | InvalidSettings>
 */
export function runBuild(
	args: readonly string[],
	deps: AppDependencies,
): Effect.Effect<ExitCode, RunError> {
	return Effect.gen(function* () {
		const program = yield* resolveOrchestrator;
		const invocation = buildInvocation(args);
		const command = buildOrchestratorCommand(invocation, {
			program,
			driverPath: deps.locator.locate(),
		});

		yield* Effect.logDebug(`running ${describeCommand(command)}`);
		const outcome = yield* deps.runner.run(command);
		yield* Effect.logDebug(
			`${program} finished: status=${String(outcome.status)} signal=${String(outcome.signal)}`,
		);

		return computeExitCode(outcome);
	});
}

function dispatch(
	route: Route,
	deps: AppDependencies,
): Effect.Effect<ExitCode, RunError> {
	return match<Route, Effect.Effect<ExitCode, RunError>>(route)
		.with({ _tag: "ShowHelp" }, () =>
			printHelp.pipe(Effect.as(SUCCESS_EXIT_CODE)),
		)
		.with({ _tag: "ShowVersion" }, () =>
			deps.packageInfo.pipe(
				Effect.flatMap(printVersion),
				Effect.as(SUCCESS_EXIT_CODE),
			),
		)
		.with({ _tag: "Explain" }, ({ lint }) =>
			// documentation lookup belongs to rpl-driver
			Effect.logDebug(`explain requested for lint '${lint}'`).pipe(
				Effect.as(SUCCESS_EXIT_CODE),
			),
		)
		.with({ _tag: "Build" }, ({ args }) => runBuild(args, deps))
		.exhaustive();
}

/**
 * Handles one command line and returns the exit code as a value.
 *
 * @param tokens - Captured command line (see captureCliArgs)
 * @param deps - Runner, driver locator and package metadata
 *
 * @pure false (console output, subprocess), but does not terminate the process
 * @invariant routeArgs(tokens)._tag ≠ "Build" → result = 0 and deps.runner is untouched
 * @postcondition Build route → result = computeExitCode(outcome)
 */
export function runCargoRpl(
	tokens: readonly string[],
	deps: AppDependencies,
): Effect.Effect<ExitCode, RunError> {
	return Effect.suspend(() => dispatch(routeArgs(tokens), deps));
}
