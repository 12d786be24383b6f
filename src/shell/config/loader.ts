// CHANGE: Load verhoeff.config.json with typed validation
// PURITY: SHELL (filesystem reads)
// EFFECT: Effect<VerhoeffConfig, ConfigError>
// INVARIANT: a returned config always satisfies idLength ∈ ℕ⁺
// COMPLEXITY: O(|file|)

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect } from "effect";

import { ConfigError } from "../../core/errors.js";
import { AADHAAR_LENGTH } from "../../core/fixed-length.js";
import type { VerhoeffConfig } from "../../core/types/index.js";

/**
 * File name looked up in the working directory when no path is given.
 */
export const CONFIG_FILE_NAME = "verhoeff.config.json";

export const DEFAULT_CONFIG: VerhoeffConfig = { idLength: AADHAAR_LENGTH };

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

function isJSONObject(
	value: JSONValue,
): value is { readonly [key: string]: JSONValue } {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isPositiveInteger(value: JSONValue | undefined): value is number {
	return typeof value === "number" && Number.isInteger(value) && value > 0;
}

const parseJSON = (raw: string, configPath: string) =>
	Effect.try({
		try: (): JSONValue => JSON.parse(raw),
		catch: (error) =>
			new ConfigError({
				path: configPath,
				detail: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
			}),
	});

/**
 * Validates parsed JSON against the config shape; absent keys take defaults.
 *
 * @pure true
 */
export const decodeConfig = (
	value: JSONValue,
	configPath: string,
): Effect.Effect<VerhoeffConfig, ConfigError> => {
	if (!isJSONObject(value)) {
		return Effect.fail(
			new ConfigError({ path: configPath, detail: "Expected a JSON object" }),
		);
	}
	const idLength = value["idLength"];
	if (idLength === undefined) {
		return Effect.succeed(DEFAULT_CONFIG);
	}
	if (!isPositiveInteger(idLength)) {
		return Effect.fail(
			new ConfigError({
				path: configPath,
				detail: "idLength must be a positive integer",
			}),
		);
	}
	return Effect.succeed({ idLength });
};

/**
 * Loads the CLI configuration.
 *
 * @param explicitPath Path given with `--config`; a missing file there is an error
 * @returns Defaults when no path is given and the default file does not exist
 *
 * @effect Effect<VerhoeffConfig, ConfigError>
 */
export function loadVerhoeffConfig(
	explicitPath?: string,
): Effect.Effect<VerhoeffConfig, ConfigError> {
	const configPath = path.resolve(
		process.cwd(),
		explicitPath ?? CONFIG_FILE_NAME,
	);

	return Effect.gen(function* () {
		if (explicitPath === undefined && !fs.existsSync(configPath)) {
			return DEFAULT_CONFIG;
		}
		const raw = yield* Effect.try({
			try: () => fs.readFileSync(configPath, "utf8"),
			catch: (error) =>
				new ConfigError({
					path: configPath,
					detail: `Cannot read file: ${error instanceof Error ? error.message : String(error)}`,
				}),
		});
		const parsed = yield* parseJSON(raw, configPath);
		return yield* decodeConfig(parsed, configPath);
	});
}
