// CHANGE: Fixed-length ID validation (payload + trailing check digit)
// PURITY: CORE
// INVARIANT: length errors take precedence over parse errors, parse errors over checksum mismatch
// COMPLEXITY: O(n)

import { Either, pipe } from "effect";

import { computeChecksumStrict } from "./checksum.js";
import { parseDigits } from "./digits.js";
import { type IdValidationError, InvalidLength } from "./errors.js";

/**
 * Length of an Aadhaar number, check digit included.
 */
export const AADHAAR_LENGTH = 12;

const utf8 = new TextEncoder();

/**
 * Validates an ID of exactly `requiredLength` characters whose last digit is
 * the Verhoeff check digit of the rest.
 *
 * Length is counted in UTF-8 bytes, so any non-ASCII character makes a
 * twelve-character input too long.
 *
 * @returns Right(true) on a matching check digit, Right(false) on a mismatch
 *
 * @pure true
 * @precondition requiredLength ≥ 2 for a non-empty payload
 * @complexity O(n)
 *
 * @example
 * ```ts
 * validateFixedLengthId("123456789010"); // Right(true)
 * validateFixedLengthId("12345");        // Left(InvalidLength { expected: 12, actual: 5 })
 * ```
 */
export const validateFixedLengthId = (
	input: string,
	requiredLength: number = AADHAAR_LENGTH,
): Either.Either<boolean, IdValidationError> => {
	const byteLength = utf8.encode(input).length;
	if (byteLength !== requiredLength) {
		return Either.left(
			new InvalidLength({
				expected: requiredLength,
				actual: byteLength,
			}),
		);
	}

	return pipe(
		parseDigits(input),
		Either.flatMap((digits) => {
			const check = digits.at(-1);
			// all-ASCII here: byte length = character length
			const payload = input.slice(0, -1);
			return pipe(
				computeChecksumStrict(payload),
				Either.map((expected) => expected === check),
			);
		}),
	);
};

/**
 * Validates a 12-digit Aadhaar number.
 *
 * @pure true
 */
export const validateAadhaar = (
	input: string,
): Either.Either<boolean, IdValidationError> =>
	validateFixedLengthId(input, AADHAAR_LENGTH);
