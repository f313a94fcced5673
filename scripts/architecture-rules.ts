// PURITY: SHELL (inspects ts-morph ASTs; reports, never exits)
// FORMAT THEOREM: ∀ file ∈ Core: dependencies(file) ⊆ PureModules
// INVARIANT: Returns violations or an empty array
// COMPLEXITY: O(n) where n = number of AST nodes inspected

import { type SourceFile, SyntaxKind } from "ts-morph";

export interface ArchitectureViolation {
	readonly file: string;
	readonly line: number;
	readonly rule: string;
	readonly message: string;
	readonly severity: "error" | "warning";
}

type Layer = "core" | "shell" | "app" | "bin" | "other";

function layerOf(sourceFile: SourceFile): Layer {
	const filePath = sourceFile.getFilePath();
	if (filePath.includes("/src/core/")) return "core";
	if (filePath.includes("/src/shell/")) return "shell";
	if (filePath.includes("/src/app/")) return "app";
	if (filePath.includes("/src/bin/")) return "bin";
	return "other";
}

function isSourceFile(sourceFile: SourceFile): boolean {
	const filePath = sourceFile.getFilePath();
	return filePath.includes("/src/") && !filePath.includes("node_modules");
}

/** Node built-ins CORE may import: pure string/data helpers only. */
const PURE_BUILTINS: readonly string[] = ["node:path"];

/** Frameworks APP may import directly. */
const APP_FRAMEWORKS: readonly string[] = ["effect", "ts-pattern"];

const IMPURE_ACCESSES: readonly string[] = [
	"console.log",
	"console.error",
	"console.warn",
	"console.info",
	"console.debug",
	"process.exit",
	"process.env",
	"process.argv",
];

const REQUIRED_DOC_TAGS: readonly string[] = ["@pure", "@invariant", "@complexity"];

function violation(
	sourceFile: SourceFile,
	line: number,
	rule: string,
	message: string,
	severity: ArchitectureViolation["severity"] = "error",
): ArchitectureViolation {
	return { file: sourceFile.getFilePath(), line, rule, message, severity };
}

/**
 * CORE must not import SHELL, APP or effectful Node built-ins.
 *
 * @invariant ∀ f ∈ Core: imports(f) ∩ (Shell ∪ App) = ∅
 */
export function checkCoreImports(
	sourceFile: SourceFile,
): readonly ArchitectureViolation[] {
	if (layerOf(sourceFile) !== "core") return [];

	const violations: ArchitectureViolation[] = [];
	for (const importDecl of sourceFile.getImportDeclarations()) {
		const specifier = importDecl.getModuleSpecifierValue();
		const line = importDecl.getStartLineNumber();

		if (specifier.includes("/shell/")) {
			violations.push(
				violation(sourceFile, line, "core-no-shell-imports", `CORE file imports SHELL: ${specifier}`),
			);
		}
		if (specifier.includes("/app/")) {
			violations.push(
				violation(sourceFile, line, "core-no-app-imports", `CORE file imports APP: ${specifier}`),
			);
		}
		if (specifier.startsWith("node:") && !PURE_BUILTINS.includes(specifier)) {
			violations.push(
				violation(sourceFile, line, "core-no-effectful-builtins", `CORE file imports ${specifier}`),
			);
		}
	}
	return violations;
}

/**
 * CORE must not print, read the environment or terminate the process.
 *
 * @invariant ∀ f ∈ CoreFunctions: ¬hasSideEffects(f)
 */
export function checkCorePurity(
	sourceFile: SourceFile,
): readonly ArchitectureViolation[] {
	if (layerOf(sourceFile) !== "core") return [];

	return sourceFile
		.getDescendantsOfKind(SyntaxKind.PropertyAccessExpression)
		.filter((access) => IMPURE_ACCESSES.includes(access.getText()))
		.map((access) =>
			violation(
				sourceFile,
				access.getStartLineNumber(),
				"core-purity",
				`CORE contains side effect: ${access.getText()}`,
			),
		);
}

/**
 * Only the BIN layer may terminate the process.
 */
export function checkSingleExit(
	sourceFile: SourceFile,
): readonly ArchitectureViolation[] {
	const layer = layerOf(sourceFile);
	if (layer === "bin" || !isSourceFile(sourceFile)) return [];

	return sourceFile
		.getDescendantsOfKind(SyntaxKind.PropertyAccessExpression)
		.filter((access) => access.getText() === "process.exit")
		.map((access) =>
			violation(
				sourceFile,
				access.getStartLineNumber(),
				"single-exit",
				"process.exit outside the BIN layer",
			),
		);
}

/**
 * Exported CORE functions document their contract.
 */
export function checkContractDocs(
	sourceFile: SourceFile,
): readonly ArchitectureViolation[] {
	if (layerOf(sourceFile) !== "core") return [];

	const violations: ArchitectureViolation[] = [];
	for (const func of sourceFile.getFunctions()) {
		if (!func.isExported()) continue;

		const docText = func
			.getJsDocs()
			.map((doc) => doc.getFullText())
			.join("\n");
		const missing = REQUIRED_DOC_TAGS.filter((tag) => !docText.includes(tag));
		if (missing.length > 0) {
			violations.push(
				violation(
					sourceFile,
					func.getStartLineNumber(),
					"contract-docs",
					`Function '${func.getName() ?? "<anonymous>"}' missing tags: ${missing.join(", ")}`,
					"warning",
				),
			);
		}
	}
	return violations;
}

/**
 * APP talks to the outside world through SHELL, not through packages.
 */
export function checkAppDependencies(
	sourceFile: SourceFile,
): readonly ArchitectureViolation[] {
	if (layerOf(sourceFile) !== "app") return [];

	return sourceFile
		.getImportDeclarations()
		.filter((importDecl) => {
			const specifier = importDecl.getModuleSpecifierValue();
			return (
				!specifier.startsWith(".") &&
				!APP_FRAMEWORKS.some(
					(fw) => specifier === fw || specifier.startsWith(`${fw}/`),
				)
			);
		})
		.map((importDecl) =>
			violation(
				sourceFile,
				importDecl.getStartLineNumber(),
				"app-layer-dependencies",
				`APP layer imports unexpected dependency: ${importDecl.getModuleSpecifierValue()}`,
				"warning",
			),
		);
}

/**
 * Runs every rule over the project's source files.
 */
export function collectViolations(
	sourceFiles: readonly SourceFile[],
): readonly ArchitectureViolation[] {
	return sourceFiles.filter(isSourceFile).flatMap((sourceFile) => [
		...checkCoreImports(sourceFile),
		...checkCorePurity(sourceFile),
		...checkSingleExit(sourceFile),
		...checkContractDocs(sourceFile),
		...checkAppDependencies(sourceFile),
	]);
}
