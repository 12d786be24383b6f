// CHANGE: Pure dispatch from CLI command + input to an Outcome
// PURITY: CORE
// INVARIANT: one Outcome per input; no outcome is produced by throwing
// COMPLEXITY: O(n) per input

import { Either } from "effect";
import { match } from "ts-pattern";

import {
	appendChecksumStrict,
	computeChecksumStrict,
	validateStrict,
} from "./checksum.js";
import type { IdValidationError } from "./errors.js";
import { validateFixedLengthId } from "./fixed-length.js";
import type { Outcome } from "./models.js";

/**
 * Commands accepted by the CLI.
 */
export const COMMANDS = ["compute", "validate", "append", "id"] as const;

export type Command = (typeof COMMANDS)[number];

/**
 * Type guard for command names.
 *
 * @pure true
 */
export const isCommand = (value: string): value is Command =>
	COMMANDS.some((command) => command === value);

const toOutcome = <A>(
	input: string,
	result: Either.Either<A, IdValidationError>,
	onRight: (value: A) => Outcome,
): Outcome =>
	Either.match(result, {
		onLeft: (error): Outcome => ({ kind: "failed", input, error }),
		onRight,
	});

/**
 * Runs one command on one input.
 *
 * @param idLength - required length for the `id` command
 *
 * @pure true
 * @complexity O(|input|)
 */
export const runCommand = (
	command: Command,
	input: string,
	idLength: number,
): Outcome =>
	match(command)
		.with("compute", () =>
			toOutcome(input, computeChecksumStrict(input), (digit) => ({
				kind: "computed",
				input,
				digit,
			})),
		)
		.with("append", () =>
			toOutcome(input, appendChecksumStrict(input), (output) => ({
				kind: "appended",
				input,
				output,
			})),
		)
		.with("validate", () =>
			toOutcome(input, validateStrict(input), (valid) => ({
				kind: "verdict",
				input,
				valid,
			})),
		)
		.with("id", () =>
			toOutcome(input, validateFixedLengthId(input, idLength), (valid) => ({
				kind: "verdict",
				input,
				valid,
			})),
		)
		.exhaustive();
