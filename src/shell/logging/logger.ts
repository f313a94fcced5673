// PURITY: SHELL (writes to stderr)
// INVARIANT: Diagnostics never go to stdout, which carries help/version text and cargo's own output
// COMPLEXITY: O(n) where n = message length

import { Effect, Layer, Logger, type LogLevel } from "effect";

const LOG_PREFIX = "cargo-rpl";

/**
 * Logger emitting `cargo-rpl [LEVEL] message` lines on stderr.
 */
export const stderrLogger = Logger.make(({ logLevel, message }) => {
	const parts = Array.isArray(message) ? message : [message];
	console.error(`${LOG_PREFIX} [${logLevel.label}] ${parts.map(String).join(" ")}`);
});

export const StderrLoggerLive: Layer.Layer<never> = Logger.replace(
	Logger.defaultLogger,
	stderrLogger,
);

/**
 * Runs an effect with the stderr logger installed and `level` as the
 * minimum level.
 */
export const withLogging =
	(level: LogLevel.LogLevel) =>
	<A, E>(self: Effect.Effect<A, E>): Effect.Effect<A, E> =>
		self.pipe(
			Logger.withMinimumLogLevel(level),
			Effect.provide(StderrLoggerLive),
		);
