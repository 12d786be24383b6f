// CHANGE: Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are pure functions, immutable tables or typed errors; no SHELL internals
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// CHECKSUM ENGINE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Check digit computation and validation.
 *
 * The permissive forms never fail: `computeChecksum` returns 0,
 * `validate` returns false and `appendChecksum` returns its input unchanged
 * on empty or malformed input. A permissive 0 cannot be told apart from a
 * real check digit of 0; use the `*Strict` forms when failures matter.
 *
 * @example
 * ```typescript
 * import { appendChecksum, computeChecksumStrict, validate } from 'verhoeff-checksum';
 * import { Either } from 'effect';
 *
 * appendChecksum('236');                 // '2363'
 * validate('2363');                      // true
 * Either.isLeft(computeChecksumStrict('12a45')); // true
 * ```
 *
 * @pure true
 */
export {
	appendChecksum,
	appendChecksumStrict,
	computeChecksum,
	computeChecksumEffect,
	computeChecksumStrict,
	validate,
	validateEffect,
	validateStrict,
} from "./core/checksum.js";

/**
 * Digit parsing (ASCII '0'–'9' only).
 *
 * @pure true
 */
export { parseDigits } from "./core/digits.js";

/**
 * Fixed-length ID validation (Aadhaar: 12 digits).
 *
 * @pure true
 */
export {
	AADHAAR_LENGTH,
	validateAadhaar,
	validateFixedLengthId,
} from "./core/fixed-length.js";

// ═══════════════════════════════════════════════════════════════════════════════
// TABLES
// ═══════════════════════════════════════════════════════════════════════════════

export { INVERSE, MULTIPLICATION, PERMUTATION } from "./core/tables.js";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Typed errors, discriminated by `_tag`.
 *
 * @pure true
 */
export {
	EmptyInput,
	InvalidCharacter,
	InvalidLength,
	type ChecksumError,
	type IdValidationError,
} from "./core/errors.js";
export { formatChecksumError } from "./core/format/messages.js";

export type { Digit } from "./core/models.js";
