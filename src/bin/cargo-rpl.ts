#!/usr/bin/env node

// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) (delegates to APP)

import { main } from "../main.js";

/**
 * CLI entry point, run by cargo as `cargo-rpl rpl [ARGS]...`.
 *
 * @remarks
 * - @postcondition process terminates exactly once with main's exit code
 * - an unexpected defect is reported and exits with 1
 */
try {
	process.exit(main(process.argv));
} catch (error) {
	console.error("Fatal error:", error);
	process.exit(1);
}
