// CHANGE: Verhoeff lookup tables as immutable tuples
// PURITY: CORE
// INVARIANT: tables are never written after module load
// COMPLEXITY: O(1) lookup

import type { Digit, DigitRow, PermutationRow } from "./models.js";

/**
 * Multiplication table of the dihedral group D5.
 *
 * @invariant ∀a,b ∈ Digit: MULTIPLICATION[a][b] ∈ Digit
 */
export const MULTIPLICATION: readonly [
	DigitRow,
	DigitRow,
	DigitRow,
	DigitRow,
	DigitRow,
	DigitRow,
	DigitRow,
	DigitRow,
	DigitRow,
	DigitRow,
] = Object.freeze([
	Object.freeze([0, 1, 2, 3, 4, 5, 6, 7, 8, 9] as const),
	Object.freeze([1, 2, 3, 4, 0, 6, 7, 8, 9, 5] as const),
	Object.freeze([2, 3, 4, 0, 1, 7, 8, 9, 5, 6] as const),
	Object.freeze([3, 4, 0, 1, 2, 8, 9, 5, 6, 7] as const),
	Object.freeze([4, 0, 1, 2, 3, 9, 5, 6, 7, 8] as const),
	Object.freeze([5, 9, 8, 7, 6, 0, 4, 3, 2, 1] as const),
	Object.freeze([6, 5, 9, 8, 7, 1, 0, 4, 3, 2] as const),
	Object.freeze([7, 6, 5, 9, 8, 2, 1, 0, 4, 3] as const),
	Object.freeze([8, 7, 6, 5, 9, 3, 2, 1, 0, 4] as const),
	Object.freeze([9, 8, 7, 6, 5, 4, 3, 2, 1, 0] as const),
] as const);

/**
 * Position-dependent permutations. Row 0 is the identity.
 */
export const PERMUTATION: readonly [
	DigitRow,
	DigitRow,
	DigitRow,
	DigitRow,
	DigitRow,
	DigitRow,
	DigitRow,
	DigitRow,
] = Object.freeze([
	Object.freeze([0, 1, 2, 3, 4, 5, 6, 7, 8, 9] as const),
	Object.freeze([1, 5, 7, 6, 2, 8, 3, 0, 9, 4] as const),
	Object.freeze([5, 8, 0, 3, 7, 9, 6, 1, 4, 2] as const),
	Object.freeze([8, 9, 1, 6, 0, 4, 3, 5, 2, 7] as const),
	Object.freeze([9, 4, 5, 3, 1, 2, 6, 8, 7, 0] as const),
	Object.freeze([4, 2, 8, 6, 5, 7, 3, 9, 0, 1] as const),
	Object.freeze([2, 7, 9, 3, 8, 0, 6, 4, 1, 5] as const),
	Object.freeze([7, 0, 4, 6, 9, 1, 3, 2, 5, 8] as const),
] as const);

/**
 * INVERSE[x] is the unique y with MULTIPLICATION[x][y] = 0.
 */
export const INVERSE: DigitRow = Object.freeze([
	0, 4, 3, 2, 1, 5, 6, 7, 8, 9,
] as const);

/**
 * Successor of a permutation row: NEXT_ROW[r] = (r + 1) mod 8.
 */
export const NEXT_ROW: readonly [
	PermutationRow,
	PermutationRow,
	PermutationRow,
	PermutationRow,
	PermutationRow,
	PermutationRow,
	PermutationRow,
	PermutationRow,
] = Object.freeze([1, 2, 3, 4, 5, 6, 7, 0] as const);

/**
 * One fold step: c' = D[c][P[row][digit]].
 *
 * @pure true
 * @complexity O(1)
 */
export const step = (c: Digit, row: PermutationRow, digit: Digit): Digit =>
	MULTIPLICATION[c][PERMUTATION[row][digit]];
