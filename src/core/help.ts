// PURITY: CORE
// INVARIANT: Static text; no dependency on the command line being handled
// COMPLEXITY: O(1)

/** Name and version shown by `--version`. */
export interface PackageInfo {
	readonly name: string;
	readonly version: string;
}

const HELP_MESSAGE = `Checks a package to catch common mistakes and improve your Rust code.

Usage:
    cargo rpl [OPTIONS] [--] [<ARGS>...]

Common options:
    --no-deps                Run RPL only on the given crate, without linting the dependencies
    --fix                    Automatically apply lint suggestions. This flag implies --no-deps
    -h, --help               Print this message
    -V, --version            Print version info and exit
    --explain [LINT]         Print the documentation for a given lint

See all options with cargo check --help.

Allowing / Denying lints

To allow or deny a lint from the command line you can use cargo rpl -- with:

    -W / --warn [LINT]       Set lint warnings
    -A / --allow [LINT]      Set lint allowed
    -D / --deny [LINT]       Set lint denied
    -F / --forbid [LINT]     Set lint forbidden

Manifest Options:
    --manifest-path <PATH>  Path to Cargo.toml
    --frozen                Require Cargo.lock and cache are up to date
    --locked                Require Cargo.lock is up to date
    --offline               Run without accessing the network
`;

/**
 * Usage text printed for `-h`, `--help` and a bare `--explain`.
 *
 * @pure true
 * @invariant result is constant
 * @complexity O(1)
 */
export function helpMessage(): string {
	return HELP_MESSAGE;
}

/**
 * Version line printed for `-V` and `--version`.
 *
 * @pure true
 * @invariant result = `${info.name} ${info.version}`
 * @complexity O(1)
 */
export function versionMessage(info: PackageInfo): string {
	return `${info.name} ${info.version}`;
}
