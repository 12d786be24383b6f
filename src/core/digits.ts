// CHANGE: Digit parser turning an input string into digit values
// PURITY: CORE
// INVARIANT: ∀s: parseDigits(s) = Right(ds) → |ds| = |s| ∧ ds[i] = s[i] - '0'
// COMPLEXITY: O(n) time / O(n) space where n = |input|

import { Either } from "effect";

import { EmptyInput, InvalidCharacter, type ChecksumError } from "./errors.js";
import type { Digit } from "./models.js";

const DIGIT_VALUES: ReadonlyMap<string, Digit> = new Map<string, Digit>([
	["0", 0],
	["1", 1],
	["2", 2],
	["3", 3],
	["4", 4],
	["5", 5],
	["6", 6],
	["7", 7],
	["8", 8],
	["9", 9],
]);

/**
 * Parses a string of ASCII decimal digits.
 *
 * No trimming and no sign handling; leading zeros are kept. Characters are
 * read by code point, so a numeral outside the BMP is reported whole.
 *
 * @returns digits in input order, or the first parse failure
 *
 * @pure true
 * @postcondition input = "" → Left(EmptyInput)
 * @complexity O(n)
 *
 * @example
 * ```ts
 * parseDigits("0123"); // Right([0, 1, 2, 3])
 * parseDigits("12a4"); // Left(InvalidCharacter { character: "a", position: 2 })
 * ```
 */
export const parseDigits = (
	input: string,
): Either.Either<ReadonlyArray<Digit>, ChecksumError> => {
	if (input.length === 0) {
		return Either.left(new EmptyInput());
	}

	const digits: Digit[] = [];
	for (const [position, character] of Array.from(input).entries()) {
		const digit = DIGIT_VALUES.get(character);
		if (digit === undefined) {
			return Either.left(new InvalidCharacter({ character, position }));
		}
		digits.push(digit);
	}
	return Either.right(digits);
};
