// CHANGE: Typed domain error ADT for checksum parsing and ID validation using Effect.Data
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Input contains a character outside the ASCII range '0'–'9'
 *
 * @pure true (Data class)
 * @invariant position ≥ 0 ∧ character is a single code point
 */
export class InvalidCharacter extends Data.TaggedError("InvalidCharacter")<{
	readonly character: string;
	readonly position: number;
}> {}

/**
 * Input has zero length
 *
 * @pure true (Data class)
 */
export class EmptyInput extends Data.TaggedError("EmptyInput")<{}> {}

/**
 * Fixed-length ID has the wrong number of characters
 *
 * @pure true (Data class)
 * @invariant expected ≠ actual
 */
export class InvalidLength extends Data.TaggedError("InvalidLength")<{
	readonly expected: number;
	readonly actual: number;
}> {}

/**
 * Errors produced by the digit parser and the checksum engine
 */
export type ChecksumError = InvalidCharacter | EmptyInput;

/**
 * Errors produced by fixed-length ID validation
 */
export type IdValidationError = ChecksumError | InvalidLength;

/**
 * Command line could not be turned into options
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class UsageError extends Data.TaggedError("UsageError")<{
	readonly detail: string;
}> {}

/**
 * Configuration file is missing, unreadable or malformed
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly path: string;
	readonly detail: string;
}> {}
