// CHANGE: CLI argument parsing for the verhoeff command
// PURITY: SHELL (reads process.argv by default)
// INVARIANT: returns either ParsedArgs or a UsageError; never throws
// COMPLEXITY: O(n) where n = |args|

import { Either } from "effect";

import { isCommand } from "../../core/commands.js";
import { UsageError } from "../../core/errors.js";
import type { CLIOptions, ParsedArgs } from "../../core/types/index.js";

/**
 * Usage text printed for `--help` and after usage errors.
 */
export const USAGE = [
	"Usage: verhoeff <command> <input...> [--length N] [--config PATH]",
	"",
	"Commands:",
	"  compute   print the check digit of each input",
	"  validate  check inputs that end in their check digit",
	"  append    print each input with its check digit appended",
	"  id        validate fixed-length IDs (12 digits unless configured)",
	"",
	"Options:",
	"  --length N     required ID length for the id command",
	"  --config PATH  configuration file (default: verhoeff.config.json)",
	"  --help         show this message",
].join("\n");

interface ArgState {
	readonly positionals: ReadonlyArray<string>;
	readonly idLength: number | undefined;
	readonly configPath: string | undefined;
	readonly help: boolean;
}

// Value flags consume the following argument.
type ValueFlagHandler = (
	value: string,
	current: ArgState,
) => Either.Either<ArgState, UsageError>;

const parsePositiveInteger = (
	flag: string,
	value: string,
): Either.Either<number, UsageError> =>
	/^[0-9]+$/.test(value) && Number.parseInt(value, 10) > 0
		? Either.right(Number.parseInt(value, 10))
		: Either.left(
				new UsageError({ detail: `Invalid value for ${flag}: '${value}'` }),
			);

const valueHandlers: ReadonlyMap<string, ValueFlagHandler> = new Map<
	string,
	ValueFlagHandler
>([
	[
		"--length",
		(value, current) =>
			Either.map(parsePositiveInteger("--length", value), (idLength) => ({
				...current,
				idLength,
			})),
	],
	[
		"--config",
		(value, current) => Either.right({ ...current, configPath: value }),
	],
]);

const toParsedArgs = (state: ArgState): Either.Either<ParsedArgs, UsageError> => {
	if (state.help) return Either.right<ParsedArgs>({ kind: "help" });

	const [command, ...inputs] = state.positionals;
	if (command === undefined) {
		return Either.left(new UsageError({ detail: "Missing command" }));
	}
	if (!isCommand(command)) {
		return Either.left(
			new UsageError({ detail: `Unknown command: ${command}` }),
		);
	}
	if (inputs.length === 0) {
		return Either.left(
			new UsageError({ detail: `No inputs given for ${command}` }),
		);
	}

	const base: CLIOptions = { command, inputs };
	// exactOptionalPropertyTypes: absent flags stay absent
	const withLength: CLIOptions =
		state.idLength === undefined ? base : { ...base, idLength: state.idLength };
	const options: CLIOptions =
		state.configPath === undefined
			? withLength
			: { ...withLength, configPath: state.configPath };
	return Either.right<ParsedArgs>({ kind: "run", options });
};

/**
 * Parses command-line arguments.
 *
 * Arguments that do not start with `--` are positionals: the first is the
 * command, the rest are inputs. Empty strings are kept as inputs so that they
 * are reported as empty input.
 *
 * @param args Arguments after the node binary and script path
 *
 * @example
 * ```ts
 * // Command: verhoeff id 123456789010 --length 12
 * parseCLIArgs(["id", "123456789010", "--length", "12"]);
 * // Right({ kind: "run", options: { command: "id", inputs: ["123456789010"], idLength: 12 } })
 * ```
 */
export function parseCLIArgs(
	args: ReadonlyArray<string> = process.argv.slice(2),
): Either.Either<ParsedArgs, UsageError> {
	let state: ArgState = {
		positionals: [],
		idLength: undefined,
		configPath: undefined,
		help: false,
	};

	for (let i = 0; i < args.length; i++) {
		const arg: string = args.at(i) ?? "";

		if (arg === "--help" || arg === "-h") {
			state = { ...state, help: true };
			continue;
		}

		if (!arg.startsWith("--")) {
			state = { ...state, positionals: [...state.positionals, arg] };
			continue;
		}

		const handler = valueHandlers.get(arg);
		if (handler === undefined) {
			return Either.left(new UsageError({ detail: `Unknown option: ${arg}` }));
		}
		const value = args.at(i + 1);
		if (value === undefined) {
			return Either.left(
				new UsageError({ detail: `Missing value for ${arg}` }),
			);
		}
		const next = handler(value, state);
		if (Either.isLeft(next)) return Either.left(next.left);
		state = next.right;
		i++;
	}

	return toParsedArgs(state);
}
