// CHANGE: Specs for command dispatch
// PURITY: CORE

import { describe, expect, it } from "vitest";

import { COMMANDS, isCommand, runCommand } from "../../src/core/commands.js";

describe("isCommand", () => {
	it("accepts the four commands", () => {
		expect(COMMANDS).toEqual(["compute", "validate", "append", "id"]);
		for (const command of COMMANDS) {
			expect(isCommand(command)).toBe(true);
		}
	});

	it("rejects anything else", () => {
		expect(isCommand("check")).toBe(false);
		expect(isCommand("")).toBe(false);
	});
});

describe("runCommand", () => {
	it("compute yields the check digit", () => {
		expect(runCommand("compute", "236", 12)).toEqual({
			kind: "computed",
			input: "236",
			digit: 3,
		});
	});

	it("append yields the extended string", () => {
		expect(runCommand("append", "12345", 12)).toEqual({
			kind: "appended",
			input: "12345",
			output: "123451",
		});
	});

	it("validate yields a verdict", () => {
		expect(runCommand("validate", "2364", 12)).toEqual({
			kind: "verdict",
			input: "2364",
			valid: false,
		});
	});

	it("id uses the given length", () => {
		expect(runCommand("id", "1234567890", 10)).toEqual({
			kind: "verdict",
			input: "1234567890",
			valid: true,
		});
	});

	it("turns errors into failed outcomes", () => {
		const outcome = runCommand("compute", "12a45", 12);
		expect(outcome.kind).toBe("failed");
		if (outcome.kind === "failed") {
			expect(outcome.input).toBe("12a45");
			expect(outcome.error._tag).toBe("InvalidCharacter");
		}
	});

	it("reports InvalidLength for id", () => {
		const outcome = runCommand("id", "12345", 12);
		if (outcome.kind !== "failed") {
			throw new Error(`unexpected ${outcome.kind}`);
		}
		expect(outcome.error._tag).toBe("InvalidLength");
	});
});
