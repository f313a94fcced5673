// PURITY: SHELL (reads process globals)
// INVARIANT: locate() returns the same path for the lifetime of a locator
// COMPLEXITY: O(1)

import * as path from "node:path";

import { siblingExecutablePath, toPlatform } from "../../core/driver-path.js";

/**
 * Finds the analysis driver executable. Swapped for a fixed path in tests.
 */
export interface DriverLocator {
	readonly locate: () => string;
}

/**
 * Locator for the running process: `rpl-driver` beside the script that
 * was started (`process.argv[1]`), or beside the runtime when there is none.
 * Symlinks are not followed: an npm bin link is looked up in its own directory.
 */
export function processDriverLocator(
	argv: readonly string[],
	execPath: string = process.execPath,
	platform: string = process.platform,
): DriverLocator {
	const current = path.resolve(argv[1] ?? execPath);
	const driverPath = siblingExecutablePath(current, toPlatform(platform));
	return { locate: () => driverPath };
}

export function fixedDriverLocator(driverPath: string): DriverLocator {
	return { locate: () => driverPath };
}
