// PURITY: SHELL (console I/O)
// INVARIANT: Help and version go to stdout; diagnostics go to stderr

import { Effect } from "effect";

import type { InvalidSettings, LaunchFailed } from "../../core/errors.js";
import { helpMessage, type PackageInfo, versionMessage } from "../../core/help.js";

export const printHelp: Effect.Effect<void> = Effect.sync(() => {
	console.log(helpMessage());
});

export const printVersion = (info: PackageInfo): Effect.Effect<void> =>
	Effect.sync(() => {
		console.log(versionMessage(info));
	});

export const reportLaunchFailure = (error: LaunchFailed): Effect.Effect<void> =>
	Effect.sync(() => {
		console.error(`error: could not run ${error.program}: ${error.reason}`);
	});

export const reportInvalidSettings = (
	error: InvalidSettings,
): Effect.Effect<void> =>
	Effect.sync(() => {
		console.error(`error: ${error.detail}`);
	});
