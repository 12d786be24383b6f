// CHANGE: Functional Core domain models for checksum computation
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

import type { IdValidationError } from "./errors.js";

/**
 * Decimal digit value.
 *
 * @remarks
 * - @pure true
 * - @invariant Digit ∈ [0, 9]
 */
export type Digit = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

/**
 * One row of a 10-column lookup table, indexed by {@link Digit}.
 */
export type DigitRow = readonly [
	Digit,
	Digit,
	Digit,
	Digit,
	Digit,
	Digit,
	Digit,
	Digit,
	Digit,
	Digit,
];

/**
 * Row selector of the permutation table: (position + offset) mod 8.
 *
 * @invariant PermutationRow ∈ [0, 7]
 */
export type PermutationRow = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7;

/**
 * Exit code for the CLI process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Result of running one CLI command on one input.
 *
 * @remarks
 * - @pure true
 * - @invariant exactly one variant per input, in input order
 */
export type Outcome =
	| { readonly kind: "computed"; readonly input: string; readonly digit: Digit }
	| { readonly kind: "appended"; readonly input: string; readonly output: string }
	| { readonly kind: "verdict"; readonly input: string; readonly valid: boolean }
	| {
			readonly kind: "failed";
			readonly input: string;
			readonly error: IdValidationError;
	  };
