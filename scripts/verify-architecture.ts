#!/usr/bin/env npx tsx

// PURITY: SHELL (reads the project via ts-morph, exits the process)
// INVARIANT: errors.length = 0 → exit(0), else exit(1); warnings never fail the run

import { Project } from "ts-morph";

import {
	type ArchitectureViolation,
	collectViolations,
} from "./architecture-rules.js";

function report(
	label: string,
	violations: readonly ArchitectureViolation[],
	print: (line: string) => void,
): void {
	for (const v of violations) {
		print(`  [${label}] ${v.file}:${v.line}\n  Rule: ${v.rule}\n  ${v.message}\n`);
	}
}

const project = new Project({ tsConfigFilePath: "tsconfig.json" });
const violations = collectViolations(project.getSourceFiles());
const errors = violations.filter((v) => v.severity === "error");
const warnings = violations.filter((v) => v.severity === "warning");

report("ERROR", errors, (line) => {
	console.error(line);
});
report("WARN", warnings, (line) => {
	console.warn(line);
});

if (violations.length === 0) {
	console.log("✅ Architecture verification passed!");
	console.log("   - CORE does not import SHELL or APP");
	console.log("   - CORE has no console, process.env or process.exit");
	console.log("   - process.exit only in BIN");
	console.log("   - exported CORE functions document their contract");
} else {
	console.error(`\n📊 Total: ${errors.length} errors, ${warnings.length} warnings\n`);
}

process.exit(errors.length > 0 ? 1 : 0);
