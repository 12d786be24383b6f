// CHANGE: Tests for verhoeff.config.json loading
// PURITY: SHELL (temporary directories)
// INVARIANT: a loaded config always has a positive integer idLength

import * as path from "node:path";

import { Effect } from "effect";
import { afterEach, describe, expect, it, vi } from "vitest";

import {
	CONFIG_FILE_NAME,
	DEFAULT_CONFIG,
	decodeConfig,
	type JSONValue,
	loadVerhoeffConfig,
} from "../../src/shell/config/index.js";
import { getLeft } from "../utils/either.js";
import { createTempDir, type TempDir } from "../utils/tempDir.js";

let dir: TempDir | undefined;

const inDir = (files: Readonly<Record<string, string>>): TempDir => {
	dir = createTempDir(files);
	vi.spyOn(process, "cwd").mockReturnValue(dir.cwd);
	return dir;
};

const loadEither = (explicitPath?: string) =>
	Effect.runSync(Effect.either(loadVerhoeffConfig(explicitPath)));

afterEach(() => {
	dir?.cleanup();
	dir = undefined;
});

describe("loadVerhoeffConfig", () => {
	it("falls back to defaults when the default file is absent", () => {
		inDir({});
		expect(Effect.runSync(loadVerhoeffConfig())).toEqual({ idLength: 12 });
	});

	it("reads the default file from the working directory", () => {
		inDir({ [CONFIG_FILE_NAME]: '{ "idLength": 10 }' });
		expect(Effect.runSync(loadVerhoeffConfig())).toEqual({ idLength: 10 });
	});

	it("resolves an explicit path against the working directory", () => {
		inDir({ "custom.json": '{ "idLength": 16 }' });
		expect(Effect.runSync(loadVerhoeffConfig("custom.json"))).toEqual({
			idLength: 16,
		});
	});

	it("fails when an explicit file is missing", () => {
		const { cwd } = inDir({});
		const error = getLeft(loadEither("missing.json"));
		expect(error._tag).toBe("ConfigError");
		expect(error.path).toBe(path.join(cwd, "missing.json"));
		expect(error.detail).toMatch(/^Cannot read file: /);
	});

	it("fails on invalid JSON", () => {
		inDir({ [CONFIG_FILE_NAME]: "{ idLength: 10" });
		expect(getLeft(loadEither()).detail).toMatch(/^Invalid JSON: /);
	});

	it("fails on a malformed idLength", () => {
		inDir({ [CONFIG_FILE_NAME]: '{ "idLength": "12" }' });
		expect(getLeft(loadEither()).detail).toBe(
			"idLength must be a positive integer",
		);
	});
});

describe("decodeConfig", () => {
	it("uses defaults for an empty object", () => {
		expect(Effect.runSync(decodeConfig({}, "x.json"))).toBe(DEFAULT_CONFIG);
	});

	it("rejects non-object JSON", () => {
		const values: ReadonlyArray<JSONValue> = [[12], null, 12, "12"];
		for (const value of values) {
			const result = Effect.runSync(Effect.either(decodeConfig(value, "x.json")));
			expect(getLeft(result).detail).toBe("Expected a JSON object");
		}
	});

	it.each([0, -3, 2.5])("rejects idLength %s", (idLength) => {
		const result = Effect.runSync(
			Effect.either(decodeConfig({ idLength }, "x.json")),
		);
		expect(getLeft(result).detail).toBe("idLength must be a positive integer");
	});
});
