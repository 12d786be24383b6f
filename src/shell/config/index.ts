// CHANGE: Central export file for CLI parsing and config loading
// PURITY: SHELL (re-exports only)

export { parseCLIArgs, USAGE } from "./cli.js";
export {
	CONFIG_FILE_NAME,
	DEFAULT_CONFIG,
	decodeConfig,
	type JSONValue,
	loadVerhoeffConfig,
} from "./loader.js";
