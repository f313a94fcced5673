import { describe, expect, it } from "vitest";

import {
	siblingExecutablePath,
	toPlatform,
} from "../../src/core/driver-path.js";

describe("siblingExecutablePath", () => {
	it("replaces the file name on POSIX", (): void => {
		expect(siblingExecutablePath("/opt/bin/cargo-rpl", "posix")).toBe(
			"/opt/bin/rpl-driver",
		);
	});

	it("replaces a script file name with the driver", (): void => {
		expect(
			siblingExecutablePath("/usr/lib/node_modules/.bin/cargo-rpl.js", "posix"),
		).toBe("/usr/lib/node_modules/.bin/rpl-driver");
	});

	it("adds .exe on Windows", (): void => {
		expect(siblingExecutablePath("C:\\tools\\cargo-rpl.exe", "win32")).toBe(
			"C:\\tools\\rpl-driver.exe",
		);
	});

	it("stays relative for a bare executable name", (): void => {
		expect(siblingExecutablePath("cargo-rpl", "posix")).toBe("rpl-driver");
	});
});

describe("toPlatform", () => {
	it.each([
		["win32", "win32"],
		["linux", "posix"],
		["darwin", "posix"],
	])("%s → %s", (nodePlatform, expected): void => {
		expect(toPlatform(nodePlatform)).toBe(expected);
	});
});
