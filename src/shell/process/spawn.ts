// PURITY: SHELL (spawns the orchestrator process)
// EFFECT: Effect<SubprocessOutcome, LaunchFailed>
// INVARIANT: Exactly one child per run; blocks until it exits; no timeout, no retry
// COMPLEXITY: O(1) plus the child's own running time

import { spawnSync } from "node:child_process";

import { Effect } from "effect";

import { LaunchFailed } from "../../core/errors.js";
import type {
	OrchestratorCommand,
	SubprocessOutcome,
} from "../../core/models.js";

/**
 * Runs an orchestrator command to completion.
 */
export interface ProcessRunner {
	readonly run: (
		command: OrchestratorCommand,
	) => Effect.Effect<SubprocessOutcome, LaunchFailed>;
}

function launchFailed(program: string, error: Error | string): LaunchFailed {
	return new LaunchFailed({
		program,
		reason: typeof error === "string" ? error : error.message,
	});
}

/**
 * Environment passed to the child: the parent's, overlaid with the
 * command's own entries.
 */
export function childEnvironment(
	base: NodeJS.ProcessEnv,
	command: OrchestratorCommand,
): NodeJS.ProcessEnv {
	return { ...base, ...command.environment };
}

/**
 * Runner backed by `spawnSync` with inherited stdio, so cargo talks to
 * the user's terminal directly.
 *
 * @param baseEnv - Environment the command's entries are laid over
 */
export function createSpawnRunner(
	baseEnv: NodeJS.ProcessEnv = process.env,
): ProcessRunner {
	return {
		run: (command) =>
			Effect.try({
				try: () =>
					spawnSync(command.program, command.args, {
						stdio: "inherit",
						env: childEnvironment(baseEnv, command),
					}),
				catch: (error) =>
					launchFailed(
						command.program,
						error instanceof Error ? error : String(error),
					),
			}).pipe(
				Effect.flatMap((result) =>
					result.error === undefined
						? Effect.succeed<SubprocessOutcome>({
								status: result.status,
								signal: result.signal,
							})
						: Effect.fail(launchFailed(command.program, result.error)),
				),
			),
	};
}
