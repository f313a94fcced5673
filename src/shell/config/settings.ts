// PURITY: SHELL (reads the environment through Effect's ConfigProvider)
// INVARIANT: Missing variables fall back to defaults; only malformed values fail
// COMPLEXITY: O(1)

import { Config, Effect, LogLevel, Option } from "effect";

import { InvalidSettings } from "../../core/errors.js";
import { DEFAULT_ORCHESTRATOR } from "../../core/models.js";

/** Overrides the build orchestrator executable (set by cargo itself). */
export const ORCHESTRATOR_ENV_VAR = "CARGO";

/** Minimum level of diagnostic log lines written to stderr. */
export const LOG_LEVEL_ENV_VAR = "CARGO_RPL_LOG";

export const DEFAULT_LOG_LEVEL: LogLevel.LogLevel = LogLevel.Info;

const LOG_LEVELS: Readonly<Record<string, LogLevel.LogLevel>> = {
	all: LogLevel.All,
	trace: LogLevel.Trace,
	debug: LogLevel.Debug,
	info: LogLevel.Info,
	warn: LogLevel.Warning,
	warning: LogLevel.Warning,
	error: LogLevel.Error,
	fatal: LogLevel.Fatal,
	none: LogLevel.None,
	off: LogLevel.None,
};

/**
 * Maps a level name onto an Effect log level, ignoring case.
 *
 * @returns Option.none() for names that are not log levels
 */
export function parseLogLevel(raw: string): Option.Option<LogLevel.LogLevel> {
	return Option.fromNullable(LOG_LEVELS[raw.trim().toLowerCase()]);
}

/**
 * Orchestrator executable: `$CARGO` when set, otherwise `cargo`.
 */
export const resolveOrchestrator: Effect.Effect<string, InvalidSettings> =
	Config.string(ORCHESTRATOR_ENV_VAR).pipe(
		Config.withDefault(DEFAULT_ORCHESTRATOR),
		Effect.mapError(
			(error) => new InvalidSettings({ detail: String(error) }),
		),
	);

/**
 * Minimum log level from `$CARGO_RPL_LOG`, `Info` when unset.
 */
export const resolveLogLevel: Effect.Effect<LogLevel.LogLevel, InvalidSettings> =
	Config.option(Config.string(LOG_LEVEL_ENV_VAR)).pipe(
		Effect.mapError(
			(error) => new InvalidSettings({ detail: String(error) }),
		),
		Effect.flatMap((raw) =>
			Option.match(raw, {
				onNone: () => Effect.succeed(DEFAULT_LOG_LEVEL),
				onSome: (value) =>
					Option.match(parseLogLevel(value), {
						onNone: () =>
							Effect.fail(
								new InvalidSettings({
									detail: `${LOG_LEVEL_ENV_VAR}=${value} is not a log level (expected one of: ${Object.keys(LOG_LEVELS).join(", ")})`,
								}),
							),
						onSome: (level) => Effect.succeed(level),
					}),
			}),
		),
	);
