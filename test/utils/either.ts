// CHANGE: Test helpers unwrapping Either results
// PURITY: CORE (throws only when the test expectation is already broken)

import { Either, Option } from "effect";

/**
 * Right value of a result; throws when the result is a Left.
 */
export const getRight = <A, E>(result: Either.Either<A, E>): A =>
	Either.getOrThrow(result);

/**
 * Left value of a result; throws when the result is a Right.
 */
export const getLeft = <A, E>(result: Either.Either<A, E>): E =>
	Option.getOrThrow(Either.getLeft(result));
