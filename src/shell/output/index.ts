// CHANGE: Central export for output module
// PURITY: SHELL (re-exports only)

export {
	printConfigError,
	printLine,
	printOutcomes,
	printUsage,
	printUsageError,
} from "./printer.js";
