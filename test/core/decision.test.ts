// FORMAT THEOREM: ∀o: o.status = 0 ↔ computeExitCode(o) = 0

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { computeExitCode } from "../../src/core/decision.js";

describe("computeExitCode", () => {
	it("succeeds when the child succeeded", (): void => {
		expect(computeExitCode({ status: 0, signal: null })).toBe(0);
	});

	it("propagates the child's failure status unchanged", (): void => {
		expect(computeExitCode({ status: 101, signal: null })).toBe(101);
		expect(computeExitCode({ status: 1, signal: null })).toBe(1);
	});

	it("returns -1 when the child was killed and left no status", (): void => {
		expect(computeExitCode({ status: null, signal: "SIGKILL" })).toBe(-1);
	});

	it("returns -1 when neither status nor signal is known", (): void => {
		expect(computeExitCode({ status: null, signal: null })).toBe(-1);
	});

	it("is the identity on every reported status", (): void => {
		fc.assert(
			fc.property(fc.integer({ min: 0, max: 255 }), (status) => {
				expect(computeExitCode({ status, signal: null })).toBe(status);
			}),
		);
	});
});
