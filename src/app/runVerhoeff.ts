// CHANGE: Application layer orchestration (APP) for the verhoeff CLI
// PURITY: APP (no process.exit; console output only through SHELL printers)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Returns ExitCode as value; every typed error is reported and mapped to 1
// COMPLEXITY: O(Σ|input|)

import { Effect, Either } from "effect";

import { runCommand } from "../core/commands.js";
import { computeExitCodeEffect } from "../core/decision.js";
import type { ExitCode } from "../core/models.js";
import type { CLIOptions } from "../core/types/index.js";
import { loadVerhoeffConfig, parseCLIArgs } from "../shell/config/index.js";
import {
	printConfigError,
	printOutcomes,
	printUsage,
	printUsageError,
} from "../shell/output/index.js";

/**
 * Runs one command over all inputs and returns the exit code.
 *
 * `--length` takes precedence over the configured `idLength`.
 *
 * @pure false (reads config file, prints results), but does not terminate the process
 * @effect Effect<ExitCode, never> - config errors are reported and yield 1
 * @invariant ExitCode ∈ {0,1}
 * @postcondition result = 0 ↔ every input computed or validated as valid
 */
export function runVerhoeff(
	cliOptions: CLIOptions,
): Effect.Effect<ExitCode, never> {
	return Effect.gen(function* () {
		const config = yield* loadVerhoeffConfig(cliOptions.configPath);
		const idLength = cliOptions.idLength ?? config.idLength;

		const outcomes = cliOptions.inputs.map((input) =>
			runCommand(cliOptions.command, input, idLength),
		);
		yield* printOutcomes(outcomes);
		return yield* computeExitCodeEffect(outcomes);
	}).pipe(
		Effect.catchTag("ConfigError", (error) =>
			printConfigError(error).pipe(Effect.as<ExitCode>(1)),
		),
	);
}

/**
 * Full CLI pipeline: parse arguments, then help, usage error or run.
 *
 * @param args Arguments after the node binary and script path
 * @effect Effect<ExitCode, never>
 */
export function runCli(
	args: ReadonlyArray<string>,
): Effect.Effect<ExitCode, never> {
	return Either.match(parseCLIArgs(args), {
		onLeft: (error) => printUsageError(error).pipe(Effect.as<ExitCode>(1)),
		onRight: (parsed) =>
			parsed.kind === "help"
				? printUsage().pipe(Effect.as<ExitCode>(0))
				: runVerhoeff(parsed.options),
	});
}
