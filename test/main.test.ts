// INVARIANT: main never throws for handled errors; each typed error maps to its own exit code

import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { LaunchFailed } from "../src/core/errors.js";
import { main } from "../src/main.js";
import { recordingDependencies } from "./utils/fakes.js";

const argv = (...tokens: string[]): string[] => ["/usr/bin/node", "/opt/rpl/bin/cargo-rpl", ...tokens];

const silence = () => ({
	out: vi.spyOn(console, "log").mockImplementation(() => {
		// sink
	}),
	err: vi.spyOn(console, "error").mockImplementation(() => {
		// sink
	}),
});

beforeEach((): void => {
	vi.stubEnv("CARGO", "cargo");
	vi.stubEnv("CARGO_RPL_LOG", "info");
});

afterEach((): void => {
	vi.unstubAllEnvs();
	vi.restoreAllMocks();
});

describe("main", () => {
	it("returns 0 for help", (): void => {
		const { out } = silence();
		expect(main(argv("rpl", "--help"), recordingDependencies())).toBe(0);
		expect(out).toHaveBeenCalledTimes(1);
	});

	it("returns the child's status on a build", (): void => {
		silence();
		const deps = recordingDependencies(Effect.succeed({ status: 4, signal: null }));
		expect(main(argv("rpl", "--fix"), deps)).toBe(4);
		expect(deps.commands.map((c) => c.args)).toEqual([["fix"]]);
	});

	it("reports launch failures and returns 101", (): void => {
		const { err } = silence();
		const deps = recordingDependencies(
			Effect.fail(new LaunchFailed({ program: "cargo", reason: "spawn cargo ENOENT" })),
		);
		expect(main(argv("rpl"), deps)).toBe(101);
		expect(err).toHaveBeenCalledWith("error: could not run cargo: spawn cargo ENOENT");
	});

	it("warns about an unknown log level and carries on", (): void => {
		const { out, err } = silence();
		vi.stubEnv("CARGO_RPL_LOG", "loud");
		expect(main(argv("rpl", "-V"), recordingDependencies())).toBe(0);
		expect(err).toHaveBeenCalledWith(
			"cargo-rpl [WARN] CARGO_RPL_LOG=loud is not a log level (expected one of: all, trace, debug, info, warn, warning, error, fatal, none, off)",
		);
		expect(out).toHaveBeenCalledWith("cargo-rpl 9.9.9");
	});

	it("logs the command at debug level", (): void => {
		const { err } = silence();
		vi.stubEnv("CARGO_RPL_LOG", "debug");
		main(argv("rpl", "--", "-D", "x"), recordingDependencies());
		expect(err).toHaveBeenCalledWith(
			'cargo-rpl [DEBUG] running cargo check (RUSTC_WORKSPACE_WRAPPER="/opt/rpl/bin/rpl-driver" RPL_ARGS="-D__RPL_HACKERY__x__RPL_HACKERY__")',
		);
		expect(err).toHaveBeenCalledWith("cargo-rpl [DEBUG] cargo finished: status=0 signal=null");
	});
});
