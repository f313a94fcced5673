// PURITY: CORE
// FORMAT THEOREM: ∀o: o.status = 0 ↔ computeExitCode(o) = 0
// INVARIANT: No side effects, deterministic mapping Outcome → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";

import {
	ABNORMAL_EXIT_CODE,
	type ExitCode,
	type SubprocessOutcome,
	SUCCESS_EXIT_CODE,
} from "./models.js";

/**
 * Computes this process's exit code from the orchestrator's outcome.
 *
 * @param outcome - Status and signal reported for the finished child
 * @returns 0 on success, the child's status on failure, -1 when no status exists
 *
 * @pure true
 * @invariant outcome.status ≠ null → result = outcome.status
 * @postcondition outcome.status = null → result = ABNORMAL_EXIT_CODE
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode({ status: 101, signal: null }); // 101
 * computeExitCode({ status: null, signal: "SIGKILL" }); // -1
 * ```
 */
export const computeExitCode = (outcome: SubprocessOutcome): ExitCode =>
	pipe(
		outcome.status,
		(status) => status ?? ABNORMAL_EXIT_CODE,
		(code) => (code === 0 ? SUCCESS_EXIT_CODE : code),
	);
