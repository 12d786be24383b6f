// CHANGE: Pure decision function computing the CLI exit code from outcomes
// SOURCE: https://effect.website/docs/introduction
// FORMAT THEOREM: ∀os: computeExitCode(os) = 0 ↔ ∀o ∈ os: succeeded(o)
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping Outcome[] → ExitCode
// COMPLEXITY: O(n) time / O(1) space

import { Effect, pipe } from "effect";

import type { ExitCode, Outcome } from "./models.js";

/**
 * Whether a single outcome counts as success.
 *
 * @pure true
 * @postcondition failed → false; verdict → valid; computed/appended → true
 */
export const succeeded = (outcome: Outcome): boolean =>
	outcome.kind === "failed"
		? false
		: outcome.kind === "verdict"
			? outcome.valid
			: true;

/**
 * Computes process exit code from command outcomes (pure function).
 *
 * @returns 0 when every input succeeded; otherwise 1
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @complexity O(n)
 *
 * @example
 * ```ts
 * computeExitCode([{ kind: "verdict", input: "2363", valid: true }]); // 0
 * computeExitCode([{ kind: "verdict", input: "2364", valid: false }]); // 1
 * ```
 */
export const computeExitCode = (outcomes: ReadonlyArray<Outcome>): ExitCode =>
	pipe(
		outcomes,
		(os) => os.every(succeeded),
		(ok): ExitCode => (ok ? 0 : 1),
	);

/**
 * Computes exit code as an Effect for composition with other Effects.
 *
 * @effect Effect<ExitCode, never, never>
 */
export const computeExitCodeEffect = (
	outcomes: ReadonlyArray<Outcome>,
): Effect.Effect<ExitCode> => Effect.sync(() => computeExitCode(outcomes));
