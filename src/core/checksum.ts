// CHANGE: Verhoeff checksum engine (compute / validate / append) over the lookup tables
// PURITY: CORE
// FORMAT THEOREM: ∀s ∈ Digits⁺: validate(s ++ computeChecksum(s)) = true
// INVARIANT: accumulator c ∈ Digit at every step; results depend only on the input
// COMPLEXITY: O(n) time / O(n) space where n = |input|

import { Effect, Either, pipe } from "effect";

import { parseDigits } from "./digits.js";
import type { ChecksumError } from "./errors.js";
import type { Digit, PermutationRow } from "./models.js";
import { INVERSE, NEXT_ROW, step } from "./tables.js";

/**
 * Folds digits right-to-left, the last digit using permutation row `firstRow`.
 *
 * @pure true
 * @invariant row after k steps = (firstRow + k) mod 8
 * @complexity O(n)
 */
const fold = (
	digits: ReadonlyArray<Digit>,
	firstRow: PermutationRow,
): Digit =>
	digits.reduceRight<{ readonly c: Digit; readonly row: PermutationRow }>(
		(acc, digit) => ({ c: step(acc.c, acc.row, digit), row: NEXT_ROW[acc.row] }),
		{ c: 0, row: firstRow },
	).c;

/**
 * Computes the check digit for a payload of digits.
 *
 * The payload is folded from row 1, leaving row 0 for the check digit that
 * will be appended after it.
 *
 * @returns Right(check digit), or the parser's failure unchanged
 *
 * @pure true
 * @complexity O(n)
 *
 * @example
 * ```ts
 * computeChecksumStrict("236"); // Right(3)
 * computeChecksumStrict("");    // Left(EmptyInput)
 * ```
 */
export const computeChecksumStrict = (
	input: string,
): Either.Either<Digit, ChecksumError> =>
	pipe(
		parseDigits(input),
		Either.map((digits) => INVERSE[fold(digits, 1)]),
	);

/**
 * Checks a digit string whose last character is its check digit.
 *
 * @returns Right(true) iff the fold over the whole sequence reaches 0
 *
 * @pure true
 * @postcondition input = "" → Left(EmptyInput)
 * @complexity O(n)
 */
export const validateStrict = (
	input: string,
): Either.Either<boolean, ChecksumError> =>
	pipe(
		parseDigits(input),
		Either.map((digits) => fold(digits, 0) === 0),
	);

/**
 * Permissive form of {@link computeChecksumStrict}.
 *
 * Returns 0 for empty or malformed input. That is also a legitimate check
 * digit, so callers cannot tell failure from success here; use the strict
 * form wherever failures matter.
 *
 * @pure true
 */
export const computeChecksum = (input: string): Digit =>
	Either.getOrElse(computeChecksumStrict(input), (): Digit => 0);

/**
 * Permissive form of {@link validateStrict}: false for empty or malformed input.
 *
 * @pure true
 */
export const validate = (input: string): boolean =>
	Either.getOrElse(validateStrict(input), () => false);

/**
 * Appends the computed check digit to the input.
 *
 * @pure true
 */
export const appendChecksumStrict = (
	input: string,
): Either.Either<string, ChecksumError> =>
	pipe(
		computeChecksumStrict(input),
		Either.map((digit) => `${input}${digit}`),
	);

/**
 * Permissive form of {@link appendChecksumStrict}: the input is returned
 * unchanged when it cannot be parsed, so a result without a new trailing
 * digit is the only sign of failure.
 *
 * @pure true
 *
 * @example
 * ```ts
 * appendChecksum("12345"); // "123451"
 * appendChecksum("12a45"); // "12a45"
 * ```
 */
export const appendChecksum = (input: string): string =>
	Either.getOrElse(appendChecksumStrict(input), () => input);

/**
 * Lifts {@link computeChecksumStrict} into Effect for composition.
 *
 * @effect Effect<Digit, ChecksumError, never>
 */
export const computeChecksumEffect = (
	input: string,
): Effect.Effect<Digit, ChecksumError> =>
	Either.match(computeChecksumStrict(input), {
		onLeft: (error) => Effect.fail(error),
		onRight: (digit) => Effect.succeed(digit),
	});

/**
 * Lifts {@link validateStrict} into Effect for composition.
 *
 * @effect Effect<boolean, ChecksumError, never>
 */
export const validateEffect = (
	input: string,
): Effect.Effect<boolean, ChecksumError> =>
	Either.match(validateStrict(input), {
		onLeft: (error) => Effect.fail(error),
		onRight: (valid) => Effect.succeed(valid),
	});
