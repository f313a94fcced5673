// PURITY: CORE (node:path is pure string manipulation)
// INVARIANT: The driver is looked up beside the running executable, never on PATH
// COMPLEXITY: O(n) where n = |currentExecutable|

import * as path from "node:path";

import { DRIVER_EXECUTABLE_NAME, type Platform } from "./models.js";

/**
 * Replaces the file name of the running executable with the driver's,
 * adding `.exe` on Windows.
 *
 * @param currentExecutable - Path of the running `cargo-rpl`
 * @param platform - Naming rules to apply
 *
 * @pure true
 * @invariant dirname(result) = dirname(currentExecutable)
 * @complexity O(n)
 *
 * @example
 * ```ts
 * siblingExecutablePath("/opt/bin/cargo-rpl", "posix"); // "/opt/bin/rpl-driver"
 * siblingExecutablePath("C:\\tools\\cargo-rpl.exe", "win32"); // "C:\\tools\\rpl-driver.exe"
 * ```
 */
export function siblingExecutablePath(
	currentExecutable: string,
	platform: Platform,
): string {
	const paths = platform === "win32" ? path.win32 : path.posix;
	const file =
		platform === "win32"
			? `${DRIVER_EXECUTABLE_NAME}.exe`
			: DRIVER_EXECUTABLE_NAME;
	return paths.join(paths.dirname(currentExecutable), file);
}

/**
 * Maps a Node.js platform id onto the naming rules used above.
 *
 * @pure true
 * @invariant result = "win32" ↔ nodePlatform = "win32"
 * @complexity O(1)
 */
export function toPlatform(nodePlatform: string): Platform {
	return nodePlatform === "win32" ? "win32" : "posix";
}
