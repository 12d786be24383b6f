// CHANGE: Central export file for type definitions
// PURITY: CORE (types only)

export type { CLIOptions, ParsedArgs, VerhoeffConfig } from "./config.js";
