// CHANGE: Console printing of command outcomes and CLI errors
// PURITY: SHELL (console I/O)
// EFFECT: Effect<void>
// INVARIANT: results go to stdout, failures to stderr; one line per outcome
// COMPLEXITY: O(n) where n = |outcomes|

import { Effect } from "effect";

import type { ConfigError, UsageError } from "../../core/errors.js";
import { formatOutcome, type OutputLine } from "../../core/format/messages.js";
import type { Outcome } from "../../core/models.js";
import { USAGE } from "../config/index.js";

/**
 * Writes one formatted line to its stream.
 */
export const printLine = (line: OutputLine): Effect.Effect<void> =>
	Effect.sync(() => {
		if (line.stream === "stdout") {
			console.log(line.text);
		} else {
			console.error(line.text);
		}
	});

/**
 * Prints every outcome in input order.
 *
 * @effect Effect<void>
 */
export const printOutcomes = (
	outcomes: ReadonlyArray<Outcome>,
): Effect.Effect<void> =>
	Effect.forEach(outcomes, (outcome) => printLine(formatOutcome(outcome)), {
		discard: true,
	});

export const printUsage = (): Effect.Effect<void> =>
	Effect.sync(() => {
		console.log(USAGE);
	});

/**
 * Reports a usage error followed by the usage text on stderr.
 */
export const printUsageError = (error: UsageError): Effect.Effect<void> =>
	Effect.sync(() => {
		console.error(`Error: ${error.detail}`);
		console.error(USAGE);
	});

export const printConfigError = (error: ConfigError): Effect.Effect<void> =>
	Effect.sync(() => {
		console.error(`Config error in ${error.path}: ${error.detail}`);
	});
