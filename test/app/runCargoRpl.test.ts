// INVARIANT: Early-exit routes never reach the runner; Build maps the child outcome to the exit code

import { ConfigProvider, Effect, Either } from "effect";
import { afterEach, describe, expect, it, vi } from "vitest";

import { runCargoRpl } from "../../src/app/runCargoRpl.js";
import { LaunchFailed } from "../../src/core/errors.js";
import { recordingDependencies, TEST_DRIVER_PATH } from "../utils/fakes.js";

const withEnv =
	(entries: Record<string, string>) =>
	<A, E>(self: Effect.Effect<A, E>): Effect.Effect<A, E> =>
		Effect.withConfigProvider(
			self,
			ConfigProvider.fromMap(new Map<string, string>(Object.entries(entries))),
		);

const captureStdout = () =>
	vi.spyOn(console, "log").mockImplementation(() => {
		// sink
	});

afterEach((): void => {
	vi.restoreAllMocks();
});

describe("runCargoRpl: early exits", () => {
	it("prints help and exits 0 without running cargo", (): void => {
		const log = captureStdout();
		const deps = recordingDependencies();
		const code = Effect.runSync(runCargoRpl(["rpl", "--help"], deps).pipe(withEnv({})));
		expect(code).toBe(0);
		expect(deps.commands).toEqual([]);
		expect(log).toHaveBeenCalledTimes(1);
		expect(String(log.mock.calls[0]?.[0])).toMatch(
			/^Checks a package to catch common mistakes and improve your Rust code\./,
		);
	});

	it("prints name and version", (): void => {
		const log = captureStdout();
		const deps = recordingDependencies();
		const code = Effect.runSync(runCargoRpl(["rpl", "-V"], deps).pipe(withEnv({})));
		expect(code).toBe(0);
		expect(log).toHaveBeenCalledWith("cargo-rpl 9.9.9");
		expect(deps.commands).toEqual([]);
	});

	it("explain exits 0 quietly without running cargo", (): void => {
		const log = captureStdout();
		const deps = recordingDependencies();
		const code = Effect.runSync(
			runCargoRpl(["rpl", "--explain", "SOME_LINT"], deps).pipe(withEnv({})),
		);
		expect(code).toBe(0);
		expect(log).not.toHaveBeenCalled();
		expect(deps.commands).toEqual([]);
	});
});

describe("runCargoRpl: build", () => {
	it("runs cargo check with the wrapper and argument variables", (): void => {
		const deps = recordingDependencies();
		const code = Effect.runSync(
			runCargoRpl(["rpl", "--locked", "--", "-D", "x"], deps).pipe(withEnv({})),
		);
		expect(code).toBe(0);
		expect(deps.commands).toEqual([
			{
				program: "cargo",
				args: ["check", "--locked"],
				environment: {
					RUSTC_WORKSPACE_WRAPPER: TEST_DRIVER_PATH,
					RPL_ARGS: "-D__RPL_HACKERY__x__RPL_HACKERY__",
				},
			},
		]);
	});

	it("uses $CARGO as the orchestrator and fix mode adds --no-deps", (): void => {
		const deps = recordingDependencies();
		Effect.runSync(
			runCargoRpl(["rpl", "--fix"], deps).pipe(withEnv({ CARGO: "/opt/cargo" })),
		);
		expect(deps.commands).toEqual([
			{
				program: "/opt/cargo",
				args: ["fix"],
				environment: {
					RUSTC_WORKSPACE_WRAPPER: TEST_DRIVER_PATH,
					RPL_ARGS: "--no-deps__RPL_HACKERY__",
				},
			},
		]);
	});

	it("propagates a failing child status", (): void => {
		const deps = recordingDependencies(Effect.succeed({ status: 101, signal: null }));
		expect(Effect.runSync(runCargoRpl([], deps).pipe(withEnv({})))).toBe(101);
	});

	it("maps a missing status to -1", (): void => {
		const deps = recordingDependencies(Effect.succeed({ status: null, signal: "SIGKILL" }));
		expect(Effect.runSync(runCargoRpl([], deps).pipe(withEnv({})))).toBe(-1);
	});

	it("surfaces launch failures as typed errors", (): void => {
		const deps = recordingDependencies(
			Effect.fail(new LaunchFailed({ program: "cargo", reason: "spawn cargo ENOENT" })),
		);
		const result = Effect.runSync(
			Effect.either(runCargoRpl(["rpl"], deps).pipe(withEnv({}))),
		);
		expect(Either.isLeft(result)).toBeTruthy();
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("LaunchFailed");
		}
	});
});
