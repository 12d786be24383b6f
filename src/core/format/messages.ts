// CHANGE: Pure message formatting for errors and command outcomes
// PURITY: CORE
// INVARIANT: every error tag and outcome kind maps to exactly one line
// COMPLEXITY: O(1) per message (plus O(n) string concatenation)

import { match } from "ts-pattern";

import type { IdValidationError } from "../errors.js";
import type { Outcome } from "../models.js";

/**
 * Target stream of a formatted line.
 */
export type OutputStream = "stdout" | "stderr";

/**
 * One printable line with its target stream.
 */
export interface OutputLine {
	readonly stream: OutputStream;
	readonly text: string;
}

/**
 * Human-readable message for a parse or validation error.
 *
 * @pure true
 * @complexity O(1)
 *
 * @example
 * ```ts
 * formatChecksumError(new InvalidLength({ expected: 12, actual: 5 }));
 * // "ID numbers must be 12 digits, got 5 digits"
 * ```
 */
export const formatChecksumError = (error: IdValidationError): string =>
	match(error)
		.with(
			{ _tag: "InvalidCharacter" },
			(e) =>
				`Invalid character '${e.character}' at position ${e.position} - only digits allowed`,
		)
		.with({ _tag: "EmptyInput" }, () => "Input cannot be empty")
		.with(
			{ _tag: "InvalidLength" },
			(e) => `ID numbers must be ${e.expected} digits, got ${e.actual} digits`,
		)
		.exhaustive();

/**
 * Renders a command outcome as `<input> -> <result>`.
 *
 * @pure true
 * @postcondition outcome.kind = "failed" ↔ result.stream = "stderr"
 */
export const formatOutcome = (outcome: Outcome): OutputLine =>
	match(outcome)
		.with({ kind: "computed" }, (o) => ({
			stream: "stdout" as const,
			text: `${o.input} -> ${o.digit}`,
		}))
		.with({ kind: "appended" }, (o) => ({
			stream: "stdout" as const,
			text: `${o.input} -> ${o.output}`,
		}))
		.with({ kind: "verdict" }, (o) => ({
			stream: "stdout" as const,
			text: `${o.input} -> ${o.valid ? "valid" : "invalid"}`,
		}))
		.with({ kind: "failed" }, (o) => ({
			stream: "stderr" as const,
			text: `${o.input} -> error: ${formatChecksumError(o.error)}`,
		}))
		.exhaustive();
