// PURITY: CORE
// INVARIANT: args = [subcommand, ...orchestratorArgs]; environment carries exactly the wrapper and argument variables
// COMPLEXITY: O(n) where n = |orchestratorArgs| + |analysisArgs|

import { serializeAnalysisArgs } from "./analysis-args.js";
import {
	ANALYSIS_ARGS_ENV_VAR,
	type Invocation,
	type OrchestratorCommand,
	WRAPPER_ENV_VAR,
} from "./models.js";

export interface CommandTarget {
	/** Orchestrator executable, `cargo` unless overridden */
	readonly program: string;
	/** Absolute path of the analysis driver */
	readonly driverPath: string;
}

/**
 * Turns an invocation into the orchestrator process description.
 *
 * @pure true
 * @invariant result.args[0] = invocation.subcommand
 * @postcondition result.environment[WRAPPER_ENV_VAR] = target.driverPath
 * @complexity O(n)
 */
export function buildOrchestratorCommand(
	invocation: Invocation,
	target: CommandTarget,
): OrchestratorCommand {
	return {
		program: target.program,
		args: [invocation.subcommand, ...invocation.orchestratorArgs],
		environment: {
			[WRAPPER_ENV_VAR]: target.driverPath,
			[ANALYSIS_ARGS_ENV_VAR]: serializeAnalysisArgs(invocation.analysisArgs),
		},
	};
}

/**
 * One-line rendering used in debug logs.
 *
 * @pure true
 * @invariant result starts with command.program
 * @complexity O(n)
 */
export function describeCommand(command: OrchestratorCommand): string {
	const env = Object.entries(command.environment)
		.map(([name, value]) => `${name}=${JSON.stringify(value)}`)
		.join(" ");
	return [command.program, ...command.args].join(" ") + ` (${env})`;
}
