// PURITY: SHELL (reads the filesystem)
// INVARIANT: Never fails; an unreadable manifest yields version "unknown" and a warning
// COMPLEXITY: O(d) where d = directory depth

import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

import { Effect } from "effect";

import { ManifestUnreadable } from "../../core/errors.js";
import type { PackageInfo } from "../../core/help.js";

const MANIFEST = "package.json";

export const FALLBACK_PACKAGE_INFO: PackageInfo = {
	name: "cargo-rpl",
	version: "unknown",
};

type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

function isJSONObject(
	value: JSONValue,
): value is { readonly [key: string]: JSONValue } {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Walks up from `startDir` to the closest directory holding a manifest.
 *
 * @returns Absolute manifest path, or null when the root is reached
 */
export function findManifest(startDir: string): string | null {
	let dir = path.resolve(startDir);
	for (;;) {
		const candidate = path.join(dir, MANIFEST);
		if (fs.existsSync(candidate)) return candidate;
		const parent = path.dirname(dir);
		if (parent === dir) return null;
		dir = parent;
	}
}

function toPackageInfo(
	manifestPath: string,
	parsed: JSONValue,
): Effect.Effect<PackageInfo, ManifestUnreadable> {
	const name = isJSONObject(parsed) ? parsed["name"] : undefined;
	const version = isJSONObject(parsed) ? parsed["version"] : undefined;
	if (typeof name === "string" && typeof version === "string") {
		return Effect.succeed({ name, version });
	}
	return Effect.fail(
		new ManifestUnreadable({
			path: manifestPath,
			detail: "missing string fields 'name' and 'version'",
		}),
	);
}

/**
 * Loads name and version from a manifest file.
 */
export function loadPackageInfo(
	manifestPath: string,
): Effect.Effect<PackageInfo, ManifestUnreadable> {
	return Effect.try({
		try: (): JSONValue => JSON.parse(fs.readFileSync(manifestPath, "utf8")),
		catch: (error) =>
			new ManifestUnreadable({
				path: manifestPath,
				detail: error instanceof Error ? error.message : String(error),
			}),
	}).pipe(Effect.flatMap((parsed) => toPackageInfo(manifestPath, parsed)));
}

/**
 * Package name and version for `--version`, looked up from `startDir`
 * (this module's directory by default).
 */
export function readPackageInfo(
	startDir: string = path.dirname(fileURLToPath(import.meta.url)),
): Effect.Effect<PackageInfo> {
	return Effect.suspend((): Effect.Effect<PackageInfo, ManifestUnreadable> => {
		const manifestPath = findManifest(startDir);
		return manifestPath === null
			? Effect.fail(
					new ManifestUnreadable({
						path: path.join(startDir, MANIFEST),
						detail: "no package.json found in any parent directory",
					}),
				)
			: loadPackageInfo(manifestPath);
	}).pipe(
		Effect.catchTag("ManifestUnreadable", (error) =>
			Effect.logWarning(`cannot read ${error.path}: ${error.detail}`).pipe(
				Effect.as(FALLBACK_PACKAGE_INFO),
			),
		),
	);
}
