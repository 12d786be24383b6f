// CHANGE: Unit tests for CLI argument parsing
// PURITY: SHELL (argv only; no I/O)
// INVARIANT: parseCLIArgs never throws; failures are UsageError values

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import type { ParsedArgs } from "../../src/core/types/index.js";
import { parseCLIArgs, USAGE } from "../../src/shell/config/index.js";
import { getLeft, getRight } from "../utils/either.js";

const runOptions = (args: readonly string[]) => {
	const parsed: ParsedArgs = getRight(parseCLIArgs(args));
	if (parsed.kind !== "run") {
		throw new Error("expected run options");
	}
	return parsed.options;
};

describe("parseCLIArgs: commands and inputs", () => {
	it("takes the first positional as command and the rest as inputs", () => {
		expect(runOptions(["compute", "236", "12345"])).toEqual({
			command: "compute",
			inputs: ["236", "12345"],
		});
	});

	it("keeps empty strings as inputs", () => {
		expect(runOptions(["validate", ""]).inputs).toEqual([""]);
	});

	it("reads process.argv when no args are given", () => {
		const original = process.argv.slice();
		try {
			process.argv = [original[0] ?? "node", original[1] ?? "script.js", "append", "236"];
			const parsed = getRight(parseCLIArgs());
			expect(parsed).toEqual({
				kind: "run",
				options: { command: "append", inputs: ["236"] },
			});
		} finally {
			process.argv = original;
		}
	});
});

describe("parseCLIArgs: flags", () => {
	it("--length sets idLength", () => {
		expect(runOptions(["id", "1234567890", "--length", "10"])).toEqual({
			command: "id",
			inputs: ["1234567890"],
			idLength: 10,
		});
	});

	it("--config sets configPath anywhere on the line", () => {
		expect(runOptions(["--config", "custom.json", "id", "123456789010"])).toEqual({
			command: "id",
			inputs: ["123456789010"],
			configPath: "custom.json",
		});
	});

	it("--help wins over everything else", () => {
		expect(getRight(parseCLIArgs(["compute", "--help"]))).toEqual({
			kind: "help",
		});
		expect(getRight(parseCLIArgs(["-h"]))).toEqual({ kind: "help" });
	});
});

describe("parseCLIArgs: usage errors", () => {
	it.each([
		[[], "Missing command"],
		[["check", "1"], "Unknown command: check"],
		[["compute"], "No inputs given for compute"],
		[["id", "1", "--length"], "Missing value for --length"],
		[["id", "1", "--length", "0"], "Invalid value for --length: '0'"],
		[["id", "1", "--length", "1.5"], "Invalid value for --length: '1.5'"],
		[["id", "1", "--verbose"], "Unknown option: --verbose"],
	])("%j -> %s", (args, detail) => {
		const result = parseCLIArgs(args);
		expect(Either.isLeft(result)).toBe(true);
		expect(getLeft(result).detail).toBe(detail);
	});
});

describe("USAGE", () => {
	it("lists every command", () => {
		for (const command of ["compute", "validate", "append", "id"]) {
			expect(USAGE).toContain(`  ${command} `);
		}
	});
});
