// CHANGE: Configuration and CLI option types for the verhoeff CLI
// PURITY: CORE
// INVARIANT: all fields are readonly; optional fields are absent rather than undefined

import type { Command } from "../commands.js";

/**
 * Settings read from verhoeff.config.json.
 *
 * @property idLength Required length of IDs checked by the `id` command
 */
export interface VerhoeffConfig {
	readonly idLength: number;
}

/**
 * Options for one CLI run.
 *
 * @property command Command applied to every input
 * @property inputs Digit strings in command-line order
 * @property idLength `--length` override of the configured ID length
 * @property configPath `--config` path of the configuration file
 */
export interface CLIOptions {
	readonly command: Command;
	readonly inputs: ReadonlyArray<string>;
	readonly idLength?: number;
	readonly configPath?: string;
}

/**
 * Parsed command line: either a help request or options for a run.
 */
export type ParsedArgs =
	| { readonly kind: "help" }
	| { readonly kind: "run"; readonly options: CLIOptions };
