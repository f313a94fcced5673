// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * The orchestrator process could not be started at all
 * (missing executable, permission denied, ...).
 *
 * @pure true (Data class)
 * @invariant program.length > 0 ∧ reason.length > 0
 */
export class LaunchFailed extends Data.TaggedError("LaunchFailed")<{
	readonly program: string;
	readonly reason: string;
}> {}

/**
 * An environment setting holds a value that cannot be used.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class InvalidSettings extends Data.TaggedError("InvalidSettings")<{
	readonly detail: string;
}> {}

/**
 * The package manifest used for `--version` is missing or malformed.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class ManifestUnreadable extends Data.TaggedError("ManifestUnreadable")<{
	readonly path: string;
	readonly detail: string;
}> {}
